import type { Consumer, TraversalHints, Traversable } from "../types.js";

/**
 * Rolling windows of `size` elements. After a window is emitted it is either
 * cleared (`jump == size`) or its first `jump` elements are dropped, so
 * windows overlap when `jump < size`. Elements that never complete a window
 * are not emitted.
 *
 * Unless the caller asked to retain elements, the same window array is
 * reused between emissions.
 */
export class GroupedView<T> implements Traversable<readonly T[]> {
  constructor(
    private readonly upstream: Traversable<T>,
    private readonly windowSize: number,
    private readonly jump: number,
  ) {}

  traverse(consumer: Consumer<readonly T[]>, hints?: TraversalHints): void {
    const retain = hints?.retain ?? false;
    const window: T[] = [];
    this.upstream.traverse((element) => {
      window.push(element);
      if (window.length < this.windowSize) return true;
      if (!consumer(retain ? window.slice() : window)) return false;
      if (this.jump === this.windowSize) window.length = 0;
      else window.splice(0, this.jump);
      return true;
    }, { ...hints, retain: true });
  }
}
