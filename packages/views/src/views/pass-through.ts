/**
 * Element-wise views: each element is handled on its own as it flows past.
 */

import type { Consumer, Indexed, TraversalHints, Traversable } from "../types.js";

/** The mapping or side effect may keep the element it is handed. */
function retaining(hints?: TraversalHints): TraversalHints {
  return { ...hints, retain: true };
}

export class FilteredView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly predicate: (value: T) => boolean,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    this.upstream.traverse((element) => !this.predicate(element) || consumer(element), hints);
  }
}

export class MappedView<T, U> implements Traversable<U> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly mapping: (value: T) => U,
  ) {}

  traverse(consumer: Consumer<U>, hints?: TraversalHints): void {
    this.upstream.traverse((element) => consumer(this.mapping(element)), retaining(hints));
  }
}

/** Runs a side effect on every element before passing it on unchanged. */
export class InspectedView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly subroutine: (value: T) => void,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    this.upstream.traverse((element) => {
      this.subroutine(element);
      return consumer(element);
    }, retaining(hints));
  }
}

export class EnumeratedView<T> implements Traversable<Indexed<T>> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly offset: number,
  ) {}

  traverse(consumer: Consumer<Indexed<T>>, hints?: TraversalHints): void {
    let index = this.offset;
    this.upstream.traverse((element) => consumer([index++, element]), hints);
  }
}
