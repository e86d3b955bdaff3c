/**
 * @lazyview/views — Lazy sequence views
 *
 * Composable, deferred pipelines over arrays, ranges, generated series and
 * external row cursors. Chain operations build a tree of views; a terminal
 * operation runs one traversal through it with no intermediate arrays.
 *
 * @example
 * ```typescript
 * import { lazy, range, iota } from "@lazyview/views";
 *
 * lazy([2, 3, 4]).map((x) => x * x).sum(); // 29
 *
 * range(0, 10, 3).toArray(); // [0, 3, 6, 9]
 *
 * // Infinite series must be bounded before a finite-only operation
 * iota(1).filter((x) => x % 7 === 0).take(3).toArray(); // [7, 14, 21]
 * ```
 */

export { LazyView } from "./lazy-view.js";
export {
  lazy,
  lazySlice,
  one,
  range,
  iterate,
  arithmetic,
  geometric,
  iota,
  freeStream,
  generate,
  repeat,
  accessView,
} from "./lazy-entry.js";

export { Slot } from "./slot.js";
export { StatInfo } from "./stat.js";
export { MISSING } from "./types.js";

export type {
  Consumer,
  TraversalHints,
  Traversable,
  Missing,
  ViewNode,
  ViewTraits,
  Or,
  And,
  Ordered,
  Predicate,
  Indexed,
  Pair,
  KeyArgs,
  ProjectionArgs,
} from "./types.js";
export type { RowCursor } from "./views/sources.js";
