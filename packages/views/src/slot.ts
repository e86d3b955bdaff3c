import { InvariantError } from "@lazyview/core";

/**
 * Holds at most one element. Used by terminal operations and min/max to
 * capture a single element out of a traversal.
 */
export class Slot<T> {
  private content: { readonly value: T } | undefined;

  /** Fill an empty slot. */
  insert(value: T): void {
    if (this.content) {
      throw new InvariantError("slot already has content");
    }
    this.content = { value };
  }

  replace(value: T): void {
    this.content = { value };
  }

  isEmpty(): boolean {
    return this.content === undefined;
  }

  get(): T {
    if (!this.content) {
      throw new InvariantError("slot is empty");
    }
    return this.content.value;
  }

  /** The value, or `fallback` when empty. */
  getOr<U>(fallback: U): T | U {
    return this.content ? this.content.value : fallback;
  }
}
