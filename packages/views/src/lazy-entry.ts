/**
 * Entry points for creating lazy views.
 *
 * `lazy()` and `lazySlice()` wrap arrays and typed arrays without copying;
 * `range()` and `one()` compute their elements. The series sources
 * (`iterate()`, `arithmetic()`, `repeat()`, ...) are unbounded and can only
 * be walked once per traversal.
 */

import { requireArgument } from "@lazyview/core";
import { LazyView } from "./lazy-view.js";
import { compareKeys, isOrdered } from "./ordering.js";
import type { Ordered } from "./types.js";
import {
  ArraySource,
  CursorSource,
  RangeSource,
  SeriesSource,
  SingleSource,
  type RowCursor,
} from "./views/sources.js";

const PERMANENT_SOURCE = { finite: true, permanent: true } as const;
const SERIES_SOURCE = { finite: false, permanent: false } as const;

/** View over the elements of an array or typed array */
export function lazy<T>(data: ArrayLike<T>): LazyView<T, true, true> {
  return new LazyView<T, true, true>(new ArraySource(data, 0, data.length), PERMANENT_SOURCE);
}

/** View over `data[begin..end)` */
export function lazySlice<T>(
  data: ArrayLike<T>,
  begin: number,
  end: number = data.length,
): LazyView<T, true, true> {
  requireArgument(
    Number.isInteger(begin) && Number.isInteger(end) && 0 <= begin && begin <= end && end <= data.length,
    `slice [${begin}, ${end}) is outside of [0, ${data.length})`,
  );
  return new LazyView<T, true, true>(new ArraySource(data, begin, end), PERMANENT_SOURCE);
}

/** View of exactly one value */
export function one<T>(value: T): LazyView<T, true, true> {
  return new LazyView<T, true, true>(new SingleSource(value), PERMANENT_SOURCE);
}

/**
 * Numbers from `begin` towards `end` (exclusive) in increments of `step`.
 * The step must be non-zero and point from `begin` to `end`.
 */
export function range(begin: number, end: number, step: number = 1): LazyView<number, true, true> {
  requireArgument(
    Number.isFinite(begin) && Number.isFinite(end) && Number.isFinite(step),
    `range bounds and step must be finite numbers`,
  );
  requireArgument(step !== 0, "range() step must not be zero");
  requireArgument(
    begin === end || end - begin > 0 === step > 0,
    `range() step ${step} does not lead from ${begin} to ${end}`,
  );
  return new LazyView<number, true, true>(new RangeSource(begin, end, step), PERMANENT_SOURCE);
}

// ---------------------------------------------------------------------------
// Series sources
// ---------------------------------------------------------------------------

/**
 * `seed, step(seed), step(step(seed)), ...`. With a `stop` bound the series
 * ends at the first value that is not below it, and the view is finite.
 */
export function iterate<T>(
  seed: T,
  step: (value: T) => T,
  stop: T & Ordered,
): LazyView<T, true, false>;
export function iterate<T>(seed: T, step: (value: T) => T): LazyView<T, false, false>;
export function iterate<T>(
  seed: T,
  step: (value: T) => T,
  stop?: T & Ordered,
): LazyView<T, boolean, false> {
  const bound = stop;
  if (bound === undefined) {
    return new LazyView<T, false, false>(new SeriesSource(step, () => seed), SERIES_SOURCE);
  }
  const proceed = (current: T) => isOrdered(current) && compareKeys(current, bound) < 0;
  return new LazyView<T, true, false>(
    new SeriesSource(step, () => seed, proceed),
    { finite: true, permanent: false },
  );
}

/** `initial, initial + increment, initial + 2 * increment, ...` */
export function arithmetic(initial: number, increment: number): LazyView<number, false, false> {
  return iterate(initial, (x) => x + increment);
}

/** `coefficient, coefficient * ratio, coefficient * ratio^2, ...` */
export function geometric(coefficient: number, ratio: number): LazyView<number, false, false> {
  return iterate(coefficient, (x) => x * ratio);
}

/** `initial, initial + 1, initial + 2, ...` */
export function iota(initial: number = 0): LazyView<number, false, false> {
  return arithmetic(initial, 1);
}

/**
 * Each element computed from the previous one; the first is `f(undefined)`.
 */
export function freeStream<T>(f: (previous: T | undefined) => T): LazyView<T, false, false> {
  return new LazyView<T, false, false>(new SeriesSource(f, () => f(undefined)), SERIES_SOURCE);
}

/** Values of repeated calls to `f` */
export function generate<T>(f: () => T): LazyView<T, false, false> {
  return freeStream<T>(() => f());
}

/** The same value forever */
export function repeat<T>(value: T): LazyView<T, false, false> {
  return iterate(value, () => value);
}

/**
 * Present an external row cursor as a view of itself, one element per row.
 * Each traversal continues from wherever the cursor currently is.
 */
export function accessView<C extends RowCursor>(cursor: C): LazyView<C, false, false> {
  return new LazyView<C, false, false>(new CursorSource(cursor), SERIES_SOURCE);
}
