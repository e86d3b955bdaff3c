/**
 * Lazy sequence views
 *
 * A `LazyView` wraps a node that knows how to traverse its elements. Chain
 * operations (`filter`, `map`, `take`, `zip`, ...) wrap it in another node
 * and return a new view; nothing is visited until a terminal operation
 * (`forEach`, `sum`, `size`, `stage`, ...) starts a traversal at the
 * outermost view.
 */

import { PreconditionError, requireArgument, requirePrecondition } from "@lazyview/core";
import { log } from "./log.js";
import { numericIdentity, orderedIdentity } from "./ordering.js";
import { Slot } from "./slot.js";
import { StatInfo } from "./stat.js";
import {
  MISSING,
  type And,
  type Consumer,
  type Indexed,
  type KeyArgs,
  type Missing,
  type Or,
  type Ordered,
  type Pair,
  type Predicate,
  type ProjectionArgs,
  type TraversalHints,
  type Traversable,
  type ViewNode,
  type ViewTraits,
} from "./types.js";
import {
  EnumeratedView,
  FilteredView,
  InspectedView,
  MappedView,
} from "./views/pass-through.js";
import { TakeSkipNView, TakeSkipWhileView } from "./views/take-skip.js";
import { ExtremeView, ReversedView, SortedView } from "./views/materialized.js";
import { CartesianView, ChainedView, ZippedView, type ZipPlan } from "./views/combined.js";
import { GroupedView } from "./views/grouped.js";
import { StagedSource } from "./views/sources.js";

function isPredicate<T>(candidate: T | Predicate<T>): candidate is Predicate<T> {
  return typeof candidate === "function";
}

function strictlyEqual(a: unknown, b: unknown): boolean {
  return a === b;
}

function keyOf<T>(key: KeyArgs<T>): (value: T) => Ordered {
  const [extract]: [((value: T) => Ordered)?] = key;
  return extract ?? orderedIdentity;
}

function projectionOf<T>(projection: ProjectionArgs<T>): (value: T) => number {
  const [project]: [((value: T) => number)?] = projection;
  return project ?? numericIdentity;
}

function requireCount(n: number, what: string): void {
  requireArgument(Number.isInteger(n) && n >= 0, `${what} must be a non-negative integer, got ${n}`);
}

function requirePositive(n: number, what: string): void {
  requireArgument(Number.isInteger(n) && n > 0, `${what} must be a positive integer, got ${n}`);
}

/**
 * A deferred sequence of `T`.
 *
 * @typeParam F - `true` when traversal is guaranteed to terminate
 * @typeParam P - `true` when repeated traversals yield the same elements in
 *   the same order and positional access is deterministic
 *
 * Operations that need a finite (or permanent) view declare it on `this`, so
 * misuse does not compile. The same requirement is re-checked when the view
 * is built, before any element is visited.
 *
 * @example
 * ```typescript
 * const top = lazy([1, 19, 4, 2, 5, -1, 5])
 *   .filter((x) => x > 2)
 *   .stage()
 *   .sort()
 *   .take(2)
 *   .toArray(); // [4, 5]
 * ```
 */
export class LazyView<T, F extends boolean = boolean, P extends boolean = boolean>
  implements Traversable<T>
{
  /** Type brand for finiteness */
  readonly __finite!: F;
  /** Type brand for permanence */
  readonly __permanent!: P;

  readonly isFinite: boolean;
  readonly isPermanent: boolean;

  private readonly node: ViewNode<T>;

  constructor(node: ViewNode<T>, traits: ViewTraits) {
    this.node = node;
    this.isFinite = traits.finite;
    this.isPermanent = traits.permanent;
  }

  traverse(consumer: Consumer<T>, hints?: TraversalHints): void {
    this.node.traverse(consumer, hints);
  }

  private wrap<U, G extends boolean, Q extends boolean>(
    node: ViewNode<U>,
    finite: boolean,
    permanent: boolean,
  ): LazyView<U, G, Q> {
    return new LazyView<U, G, Q>(node, { finite, permanent });
  }

  /** Whether the node answers `lookup`: arrays, ranges, staged buffers. */
  private get indexable(): boolean {
    return this.node.lookup !== undefined;
  }

  /** Element at `index`, by O(1) lookup where the source offers it. */
  private locate(index: number): T | Missing {
    if (this.node.lookup) return this.node.lookup(index);
    const found = new Slot<T>();
    let i = 0;
    this.node.traverse((element) => {
      if (i === index) {
        found.insert(element);
        return false;
      }
      i++;
      return true;
    });
    return found.isEmpty() ? MISSING : found.get();
  }

  // ---------------------------------------------------------------------------
  // Lazy transformations
  // ---------------------------------------------------------------------------

  /** Transform each element */
  map<U>(f: (value: T) => U): LazyView<U, F, false> {
    return this.wrap(new MappedView(this, f), this.isFinite, false);
  }

  /** Keep only elements that satisfy the predicate */
  filter<S extends T>(predicate: (value: T) => value is S): LazyView<S, F, false>;
  filter(predicate: Predicate<T>): LazyView<T, F, false>;
  filter(predicate: Predicate<T>): LazyView<T, F, false> {
    return this.wrap(new FilteredView(this, predicate), this.isFinite, false);
  }

  /** Run a side effect on each element as it passes */
  inspect(subroutine: (value: T) => void): LazyView<T, F, P> {
    return this.wrap(new InspectedView(this, subroutine), this.isFinite, this.isPermanent);
  }

  /** At most the first `n` elements, every `stride`-th of them */
  take(n: number, stride: number = 1): LazyView<T, true, P> {
    requireCount(n, "take count");
    requirePositive(stride, "stride");
    return this.wrap(new TakeSkipNView(this, "take", n, stride), true, this.isPermanent);
  }

  /** Elements after the first `n`, those at a multiple of `stride` */
  skip(n: number, stride: number = 1): LazyView<T, F, P> {
    requireCount(n, "skip count");
    requirePositive(stride, "stride");
    return this.wrap(new TakeSkipNView(this, "skip", n, stride), this.isFinite, this.isPermanent);
  }

  /** Elements while the predicate holds; stops at the first failure */
  takeWhile(predicate: Predicate<T>): LazyView<T, true, false> {
    return this.wrap(new TakeSkipWhileView(this, "take", predicate), true, false);
  }

  /** Elements from the first one failing the predicate onwards */
  skipWhile(predicate: Predicate<T>): LazyView<T, F, false> {
    return this.wrap(new TakeSkipWhileView(this, "skip", predicate), this.isFinite, false);
  }

  /** Pair each element with a running index starting at `offset` */
  enumerate(offset: number = 0): LazyView<Indexed<T>, F, false> {
    return this.wrap(new EnumeratedView(this, offset), this.isFinite, false);
  }

  /**
   * Stable ascending sort by key. Elements are collected on each traversal
   * and replayed in order.
   */
  sort(this: LazyView<T, true, true>, ...key: KeyArgs<T>): LazyView<T, true, true> {
    requirePrecondition(this.isFinite, "Can't sort an infinite view");
    requirePrecondition(
      this.isPermanent,
      "Can't sort a view that generates elements on the fly, stage() it first"
    );
    return this.wrap(new SortedView(this, keyOf<T>(key)), true, true);
  }

  reverse(this: LazyView<T, true, P>): LazyView<T, true, P> {
    requirePrecondition(this.isFinite, "Can't reverse an infinite view");
    return this.wrap(new ReversedView(this), true, this.isPermanent);
  }

  /** View of the element with the largest key; later ties win */
  max(this: LazyView<T, true, P>, ...key: KeyArgs<T>): LazyView<T, true, P> {
    requirePrecondition(this.isFinite, "Can't find max in an infinite view");
    return this.wrap(new ExtremeView(this, keyOf<T>(key), "max"), true, this.isPermanent);
  }

  /** View of the element with the smallest key; earlier ties win */
  min(this: LazyView<T, true, P>, ...key: KeyArgs<T>): LazyView<T, true, P> {
    requirePrecondition(this.isFinite, "Can't find min in an infinite view");
    return this.wrap(new ExtremeView(this, keyOf<T>(key), "min"), true, this.isPermanent);
  }

  /** All elements of this view, then all elements of `other` */
  chain<U, Q extends boolean>(
    this: LazyView<T, true, P>,
    other: LazyView<U, true, Q>
  ): LazyView<T | U, true, And<P, Q>> {
    requirePrecondition(this.isFinite && other.isFinite, "Can't chain infinite views");
    return this.wrap(new ChainedView(this, other), true, this.isPermanent && other.isPermanent);
  }

  /**
   * Pair elements by position, up to the shorter side. One side is read by
   * position, so at least one of them must be permanent and answer lookups in
   * constant time (an array, a range, a staged view). Sorted, reversed or
   * sliced views need stage() first.
   */
  zip<U, G extends boolean, Q extends boolean>(
    this: LazyView<T, F, true>,
    other: LazyView<U, G, Q>
  ): LazyView<Pair<T, U>, Or<F, G>, Q>;
  zip<U, G extends boolean>(other: LazyView<U, G, true>): LazyView<Pair<T, U>, Or<F, G>, P>;
  zip<U>(other: LazyView<U>): LazyView<Pair<T, U>> {
    return this.zipped(other);
  }

  private zipped<U>(other: LazyView<U>): LazyView<Pair<T, U>> {
    requirePrecondition(this.isFinite || other.isFinite, "Can't combine two infinite views");
    requirePrecondition(
      this.isPermanent || other.isPermanent,
      "At least one view must provide positional access, consider calling stage()"
    );
    let plan: ZipPlan<T, U>;
    if (other.indexable) {
      plan = { walk: "first", first: this, second: (index) => other.locate(index) };
    } else if (this.indexable) {
      plan = { walk: "second", first: (index) => this.locate(index), second: other };
    } else {
      throw new PreconditionError(
        "Neither view offers constant-time positional access, consider calling stage()"
      );
    }
    return this.wrap(
      new ZippedView(plan),
      this.isFinite || other.isFinite,
      this.isPermanent && other.isPermanent
    );
  }

  /** Every ordered pair of elements, outer loop over this view */
  cartesian<U, Q extends boolean>(
    this: LazyView<T, true, P>,
    other: LazyView<U, true, Q>
  ): LazyView<Pair<T, U>, true, false> {
    requirePrecondition(
      this.isFinite && other.isFinite,
      "Cartesian product makes sense only for finite views"
    );
    return this.wrap(new CartesianView(this, other), true, false);
  }

  /**
   * Windows of `size` consecutive elements, advancing by `jump`.
   *
   * With `[0, 1, 2, 3]`, `group(2)` gives `[0, 1], [2, 3]` and `group(2, 1)`
   * gives `[0, 1], [1, 2], [2, 3]`. Trailing elements that do not fill a
   * window are dropped. The window array is reused between emissions unless
   * the traversal retains elements: `toArray`, `stage`, `forEach`,
   * `accumulate`, `map` and `inspect` all get a copy per window.
   */
  group(size: number = 2, jump: number = size): LazyView<readonly T[], F, false> {
    requirePositive(size, "group size");
    requirePositive(jump, "group jump");
    requireArgument(jump <= size, `group jump (${jump}) can't exceed group size (${size})`);
    return this.wrap(new GroupedView(this, size, jump), this.isFinite, false);
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Copy every element into an owned buffer, traversed and indexed cheaply */
  stage(this: LazyView<T, true, P>): LazyView<T, true, true> {
    requirePrecondition(this.isFinite, "Can't stage an infinite view");
    const buffer = this.pushTo([]);
    log.debug(`staged ${buffer.length} elements`);
    return this.wrap(new StagedSource(buffer), true, true);
  }

  /** Append every element to `target` and return it */
  pushTo(this: LazyView<T, true, P>, target: T[]): T[] {
    requirePrecondition(this.isFinite, "Can't save an infinite view");
    this.traverse((element) => {
      target.push(element);
      return true;
    }, { retain: true });
    return target;
  }

  /** Collect all elements into a new array */
  toArray(this: LazyView<T, true, P>): T[] {
    return this.pushTo([]);
  }

  /** Run `fn` on every element; there is no early exit */
  forEach(fn: (value: T) => void): this {
    this.traverse((element) => {
      fn(element);
      return true;
    }, { retain: true });
    return this;
  }

  /** Number of elements */
  size(this: LazyView<T, true, P>): number {
    requirePrecondition(this.isFinite, "Can't count an infinite view");
    if (this.node.size) return this.node.size();
    let n = 0;
    this.traverse(() => {
      n++;
      return true;
    });
    return n;
  }

  isEmpty(): boolean {
    let empty = true;
    this.traverse(() => {
      empty = false;
      return false;
    });
    return empty;
  }

  /** Number of elements satisfying the predicate (all elements without one) */
  count(this: LazyView<T, true, P>, predicate?: Predicate<T>): number {
    if (!predicate) return this.size();
    let n = 0;
    this.traverse((element) => {
      if (predicate(element)) n++;
      return true;
    });
    return n;
  }

  /**
   * True if some element satisfies the predicate, or equals (`===`) the
   * value. False for an empty view. A function argument is always taken as
   * a predicate.
   */
  contains(predicateOrValue: Predicate<T> | T): boolean {
    const predicate = isPredicate(predicateOrValue)
      ? predicateOrValue
      : (element: T) => element === predicateOrValue;
    let found = false;
    this.traverse((element) => {
      if (!predicate(element)) return true;
      found = true;
      return false;
    });
    return found;
  }

  /**
   * True if every element satisfies the predicate. False for an empty view.
   */
  all(predicate: Predicate<T>): boolean {
    let hasElements = false;
    let satisfied = true;
    this.traverse((element) => {
      hasElements = true;
      if (predicate(element)) return true;
      satisfied = false;
      return false;
    });
    return satisfied && hasElements;
  }

  /** First element satisfying the predicate, or null */
  firstOf(predicate: Predicate<T>): T | null {
    const found = new Slot<T>();
    this.traverse((element) => {
      if (!predicate(element)) return true;
      found.insert(element);
      return false;
    });
    return found.getOr(null);
  }

  /** Position of the first element satisfying the predicate, or null */
  firstOfIndex(predicate: Predicate<T>): number | null {
    let index = 0;
    let found: number | null = null;
    this.traverse((element) => {
      if (predicate(element)) {
        found = index;
        return false;
      }
      index++;
      return true;
    });
    return found;
  }

  /** Element at position `n`, or null past the end */
  elementAt(n: number): T | null {
    requireCount(n, "element index");
    const element = this.locate(n);
    return element === MISSING ? null : element;
  }

  /** First element, or null if empty */
  first(): T | null {
    return this.elementAt(0);
  }

  /** Sum of the elements, or of a numeric projection of them */
  sum(this: LazyView<T, true, P>, ...projection: ProjectionArgs<T>): number {
    requirePrecondition(this.isFinite, "Can't sum an infinite view");
    const f = projectionOf<T>(projection);
    let total = 0;
    this.traverse((element) => {
      total += f(element);
      return true;
    });
    return total;
  }

  /** Fold left-to-right: `total = fn(total, element)` */
  accumulate<R>(this: LazyView<T, true, P>, fn: (total: R, element: T) => R, initial: R): R {
    requirePrecondition(this.isFinite, "Can't accumulate an infinite view");
    let total = initial;
    this.traverse((element) => {
      total = fn(total, element);
      return true;
    }, { retain: true });
    return total;
  }

  /** Count, sum and sum of squares of the elements or a numeric projection */
  stat(this: LazyView<T, true, P>, ...projection: ProjectionArgs<T>): StatInfo {
    requirePrecondition(this.isFinite, "Can't compute statistics of an infinite view");
    const f = projectionOf<T>(projection);
    const info = new StatInfo();
    this.traverse((element) => {
      info.add(f(element));
      return true;
    });
    return info;
  }

  /**
   * Compare with `other` pairwise (as `zip` pairs them). Only the overlap is
   * compared: views of different lengths are "same" when the shorter one is
   * a prefix of the longer.
   */
  isSame<U, G extends boolean, Q extends boolean>(
    this: LazyView<T, F, true>,
    other: LazyView<U, G, Q>,
    comparator?: (pair: Pair<T, U>) => boolean
  ): boolean;
  isSame<U, G extends boolean>(
    other: LazyView<U, G, true>,
    comparator?: (pair: Pair<T, U>) => boolean
  ): boolean;
  isSame<U>(other: LazyView<U>, comparator?: (pair: Pair<T, U>) => boolean): boolean {
    const compare = comparator ?? (([a, b]: Pair<T, U>) => strictlyEqual(a, b));
    let same = true;
    this.zipped(other).traverse((pair) => {
      if (compare(pair)) return true;
      same = false;
      return false;
    });
    return same;
  }
}
