/**
 * Views over two upstreams.
 */

import type { Consumer, Missing, Pair, TraversalHints, Traversable } from "../types.js";
import { MISSING } from "../types.js";

/** Everything from `first`, then (unless stopped) everything from `second`. */
export class ChainedView<A, B> implements Traversable<A | B> {
  constructor(
    private readonly first: Traversable<A>,
    private readonly second: Traversable<B>,
  ) {}

  traverse(consumer: Consumer<A | B>, hints?: TraversalHints): void {
    let stopped = false;
    this.first.traverse((element) => {
      if (consumer(element)) return true;
      stopped = true;
      return false;
    }, hints);
    if (stopped) return;
    this.second.traverse(consumer, hints);
  }
}

/** Positional access into a view, `MISSING` past its end. */
export type Indexer<T> = (index: number) => T | Missing;

/**
 * How a zip is evaluated: one side is walked, the other is read by position.
 */
export type ZipPlan<A, B> =
  | { readonly walk: "first"; readonly first: Traversable<A>; readonly second: Indexer<B> }
  | { readonly walk: "second"; readonly first: Indexer<A>; readonly second: Traversable<B> };

/**
 * Pairs elements by position. Ends when the indexed side has no element at
 * the current position or the walked side runs out.
 */
export class ZippedView<A, B> implements Traversable<Pair<A, B>> {
  constructor(private readonly plan: ZipPlan<A, B>) {}

  traverse(consumer: Consumer<Pair<A, B>>, hints?: TraversalHints): void {
    const plan = this.plan;
    let index = 0;
    if (plan.walk === "first") {
      plan.first.traverse((a) => {
        const b = plan.second(index++);
        return b !== MISSING && consumer([a, b]);
      }, hints);
    } else {
      plan.second.traverse((b) => {
        const a = plan.first(index++);
        return a !== MISSING && consumer([a, b]);
      }, hints);
    }
  }
}

/** Every ordered pair, outer loop over `first`, inner loop over `second`. */
export class CartesianView<A, B> implements Traversable<Pair<A, B>> {
  constructor(
    private readonly first: Traversable<A>,
    private readonly second: Traversable<B>,
  ) {}

  traverse(consumer: Consumer<Pair<A, B>>, hints?: TraversalHints): void {
    let go = true;
    this.first.traverse((a) => {
      this.second.traverse((b) => {
        go = consumer([a, b]);
        return go;
      }, hints);
      return go;
    }, hints);
  }
}
