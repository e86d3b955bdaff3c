/**
 * Positional and predicate-driven selection.
 */

import type { Consumer, TraversalHints, Traversable } from "../types.js";

export type SelectionLogic = "take" | "skip";

/**
 * `take`: the first `count` upstream elements, keeping every `stride`-th of
 * them. The upstream is stopped right after the `count`-th element.
 *
 * `skip`: everything after the first `count` elements, keeping those whose
 * upstream position is a multiple of `stride`.
 */
export class TakeSkipNView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly logic: SelectionLogic,
    private readonly count: number,
    private readonly stride: number,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    if (this.logic === "take") this.take(consumer, hints);
    else this.skip(consumer, hints);
  }

  private take(consumer: Consumer<T>, hints?: TraversalHints): void {
    if (this.count === 0) return;
    let n = 0;
    this.upstream.traverse((element) => {
      const selected = n % this.stride === 0;
      n++;
      if (selected && !consumer(element)) return false;
      return n < this.count;
    }, hints);
  }

  private skip(consumer: Consumer<T>, hints?: TraversalHints): void {
    let n = 0;
    this.upstream.traverse((element) => {
      const selected = n >= this.count && n % this.stride === 0;
      n++;
      return !selected || consumer(element);
    }, hints);
  }
}

/**
 * `take`: elements up to (excluding) the first one failing the predicate.
 *
 * `skip`: elements from the first one failing the predicate onwards; the
 * predicate is not consulted again after that.
 */
export class TakeSkipWhileView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly logic: SelectionLogic,
    private readonly predicate: (value: T) => boolean,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    if (this.logic === "take") {
      this.upstream.traverse((element) => this.predicate(element) && consumer(element), hints);
      return;
    }
    let passing = false;
    this.upstream.traverse((element) => {
      if (!passing && !this.predicate(element)) passing = true;
      return !passing || consumer(element);
    }, hints);
  }
}
