/**
 * Source nodes: views with no upstream.
 *
 * Array, staged, singleton and range sources hold (or can compute) every
 * element, so they also answer `lookup` and `size` in constant time.
 * Series and cursor sources can only be walked.
 */

import { MISSING, type Consumer, type Missing, type ViewNode } from "../types.js";

/** Walk over `data[begin..end)` of an array or typed array, without copying. */
export class ArraySource<T> implements ViewNode<T> {
  constructor(
    private readonly data: ArrayLike<T>,
    private readonly begin: number,
    private readonly end: number,
  ) {}

  traverse(consumer: Consumer<T>): void {
    for (let i = this.begin; i < this.end; i++) {
      if (!consumer(this.data[i])) break;
    }
  }

  lookup(index: number): T | Missing {
    if (index >= 0 && index < this.end - this.begin) return this.data[this.begin + index];
    return MISSING;
  }

  size(): number {
    return this.end - this.begin;
  }
}

/** Buffer owned by a staged view. Nothing else holds a reference to it. */
export class StagedSource<T> implements ViewNode<T> {
  constructor(private readonly buffer: readonly T[]) {}

  traverse(consumer: Consumer<T>): void {
    for (const element of this.buffer) {
      if (!consumer(element)) break;
    }
  }

  lookup(index: number): T | Missing {
    if (index >= 0 && index < this.buffer.length) return this.buffer[index];
    return MISSING;
  }

  size(): number {
    return this.buffer.length;
  }
}

/** Exactly one value. */
export class SingleSource<T> implements ViewNode<T> {
  constructor(private readonly value: T) {}

  traverse(consumer: Consumer<T>): void {
    consumer(this.value);
  }

  lookup(index: number): T | Missing {
    return index === 0 ? this.value : MISSING;
  }

  size(): number {
    return 1;
  }
}

/**
 * `begin, begin + step, ...` while below `end` (above it for a negative
 * step). Elements are computed as `begin + i * step` so positional access and
 * traversal agree exactly.
 */
export class RangeSource implements ViewNode<number> {
  private readonly length: number;

  constructor(
    private readonly begin: number,
    end: number,
    private readonly step: number,
  ) {
    this.length = Math.ceil(Math.abs(end - begin) / Math.abs(step));
  }

  traverse(consumer: Consumer<number>): void {
    for (let i = 0; i < this.length; i++) {
      if (!consumer(this.begin + i * this.step)) break;
    }
  }

  lookup(index: number): number | Missing {
    if (index >= 0 && index < this.length) return this.begin + index * this.step;
    return MISSING;
  }

  size(): number {
    return this.length;
  }
}

/**
 * Generated progression: `first()`, `next(first())`, `next(next(first()))`,
 * ... for as long as `proceed` accepts the current value. `first` runs at the
 * start of every traversal.
 */
export class SeriesSource<T> implements ViewNode<T> {
  constructor(
    private readonly next: (current: T) => T,
    private readonly first: () => T,
    private readonly proceed: (current: T) => boolean = () => true,
  ) {}

  traverse(consumer: Consumer<T>): void {
    let current = this.first();
    while (this.proceed(current)) {
      if (!consumer(current)) break;
      current = this.next(current);
    }
  }
}

/**
 * External row cursor: a current row, a validity check and a way to move on.
 * Implemented by row sources such as CSV readers.
 */
export interface RowCursor {
  /** True while the cursor points at a row. */
  valid(): boolean;
  advance(): void;
}

/**
 * Presents the cursor itself as the element of each step. Stopping leaves the
 * cursor on the row the consumer rejected.
 */
export class CursorSource<C extends RowCursor> implements ViewNode<C> {
  constructor(private readonly cursor: C) {}

  traverse(consumer: Consumer<C>): void {
    for (; this.cursor.valid(); this.cursor.advance()) {
      if (!consumer(this.cursor)) break;
    }
  }
}
