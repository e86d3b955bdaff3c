/**
 * Pushing a finite view into a numeric sink (a histogram, an accumulator).
 */

import type { LazyView } from "@lazyview/views";

/** Anything that accepts one, two or three numbers per entry. */
export interface Fillable {
  fill(...values: number[]): void;
}

/** An optional value; absent values are not filled. */
export type FillValue = number | null | undefined;

/** A bare value, or a tuple such as `(value, weight)` or `(x, y, weight)`. */
export type FillElement = FillValue | readonly FillValue[];

function isPresent(value: FillValue): value is number {
  return value !== null && value !== undefined;
}

function isTuple(element: FillElement): element is readonly FillValue[] {
  return Array.isArray(element);
}

/**
 * Fill `sink` once per element of `view`. A tuple is filled as its members;
 * an element with any absent member is skipped.
 *
 * @returns the number of fills performed
 */
export function fill<T extends FillElement, P extends boolean>(
  view: LazyView<T, true, P>,
  sink: Fillable,
): number {
  let fills = 0;
  view.forEach((element) => {
    const entry: FillElement = element;
    const values: readonly FillValue[] = isTuple(entry) ? entry : [entry];
    const present = values.filter(isPresent);
    if (present.length !== values.length) return;
    sink.fill(...present);
    fills++;
  });
  return fills;
}
