/**
 * Traversal protocol types for @lazyview/views
 *
 * Every view, source or transformation, is evaluated the same way: it is
 * asked to visit its elements in order and hand each one to a consumer,
 * stopping as soon as the consumer returns `false`.
 */

/** Receives one element; return `false` to stop the traversal. */
export type Consumer<T> = (element: T) => boolean;

/** Hints passed down a traversal chain. */
export interface TraversalHints {
  /**
   * The caller keeps elements after its consumer returns (staging, sorting,
   * grouping, or handing them to user code in `forEach`, `accumulate`,
   * `map` and `inspect`). Views that would otherwise hand out reused buffers
   * must hand out copies.
   */
  readonly retain?: boolean;
}

/** The one operation every view implements. */
export interface Traversable<T> {
  traverse(consumer: Consumer<T>, hints?: TraversalHints): void;
}

/** Marks "no element at this position" in positional lookups. */
export const MISSING: unique symbol = Symbol("lazyview.missing");
export type Missing = typeof MISSING;

/**
 * A node backing a view. Sources that hold their elements can also answer
 * positional and size queries without traversing.
 */
export interface ViewNode<T> extends Traversable<T> {
  lookup?(index: number): T | Missing;
  size?(): number;
}

/** Run-time mirror of the finite/permanent type tags. */
export interface ViewTraits {
  readonly finite: boolean;
  readonly permanent: boolean;
}

export type Or<A extends boolean, B extends boolean> = A extends true ? true : B;
export type And<A extends boolean, B extends boolean> = A extends true ? B : false;

/** Values ordered by the built-in `<` operator. */
export type Ordered = number | string | bigint | Date;

export type Predicate<T> = (value: T) => boolean;

/** Element paired with its position, produced by `enumerate`. */
export type Indexed<T> = readonly [index: number, value: T];

/** Positional pair, produced by `zip` and `cartesian`. */
export type Pair<A, B> = readonly [A, B];

/** Key extractor argument: optional when the elements are ordered themselves. */
export type KeyArgs<T> = [T] extends [Ordered]
  ? [key?: (value: T) => Ordered]
  : [key: (value: T) => Ordered];

/** Numeric projection argument: optional when the elements are numbers. */
export type ProjectionArgs<T> = [T] extends [number]
  ? [projection?: (value: T) => number]
  : [projection: (value: T) => number];
