/**
 * Views that need to see the whole upstream before emitting anything.
 * They only accept finite upstreams and ask them to retain elements.
 */

import { log } from "../log.js";
import { compareKeys } from "../ordering.js";
import { Slot } from "../slot.js";
import type { Consumer, Ordered, TraversalHints, Traversable } from "../types.js";

function retaining(hints?: TraversalHints): TraversalHints {
  return { ...hints, retain: true };
}

/** Stable sort by key, replayed in ascending key order. */
export class SortedView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly key: (value: T) => Ordered,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    const lookup: { key: Ordered; element: T }[] = [];
    this.upstream.traverse((element) => {
      lookup.push({ key: this.key(element), element });
      return true;
    }, retaining(hints));

    lookup.sort((a, b) => compareKeys(a.key, b.key));
    log.debug(`sorted ${lookup.length} elements`);

    for (const entry of lookup) {
      if (!consumer(entry.element)) break;
    }
  }
}

export class ReversedView<T> implements Traversable<T> {
  constructor(private readonly upstream: Traversable<T>) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    const lookup: T[] = [];
    this.upstream.traverse((element) => {
      lookup.push(element);
      return true;
    }, retaining(hints));
    log.debug(`reversed ${lookup.length} elements`);

    for (let i = lookup.length - 1; i >= 0; i--) {
      if (!consumer(lookup[i])) break;
    }
  }
}

export type ExtremeLogic = "min" | "max";

/**
 * Zero or one element: the one with the smallest or largest key.
 *
 * For max a later element with an equal key replaces the current one; for
 * min the first one stays.
 */
export class ExtremeView<T> implements Traversable<T> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly key: (value: T) => Ordered,
    private readonly logic: ExtremeLogic,
  ) {}

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    const extremeKey = new Slot<Ordered>();
    const extremeElement = new Slot<T>();

    this.upstream.traverse((element) => {
      const key = this.key(element);
      if (extremeKey.isEmpty()) {
        extremeKey.insert(key);
        extremeElement.insert(element);
        return true;
      }
      const order = compareKeys(key, extremeKey.get());
      if ((this.logic === "max" && order >= 0) || (this.logic === "min" && order < 0)) {
        extremeKey.replace(key);
        extremeElement.replace(element);
      }
      return true;
    }, retaining(hints));

    if (!extremeElement.isEmpty()) {
      consumer(extremeElement.get());
    }
  }
}
