import { PreconditionError } from "@lazyview/core";
import type { Ordered } from "./types.js";

export function isOrdered(value: unknown): value is Ordered {
  return (
    typeof value === "number" ||
    typeof value === "string" ||
    typeof value === "bigint" ||
    value instanceof Date
  );
}

/** Identity key for elements that are expected to be ordered themselves. */
export function orderedIdentity(value: unknown): Ordered {
  if (isOrdered(value)) return value;
  throw new PreconditionError(
    `element of type ${typeof value} is not ordered, provide a key extractor`
  );
}

/** Identity projection for elements that are expected to be numbers. */
export function numericIdentity(value: unknown): number {
  if (typeof value === "number") return value;
  throw new PreconditionError(
    `element of type ${typeof value} is not numeric, provide a projection`
  );
}

function isNaNKey(key: Ordered): boolean {
  if (typeof key === "number") return Number.isNaN(key);
  return key instanceof Date && Number.isNaN(key.getTime());
}

/**
 * Total order over keys. NaN (and invalid dates) sort after every other key
 * and equal to each other, so `sort` puts them last, `min` skips them and
 * `max` returns the last of them.
 */
export function compareKeys(a: Ordered, b: Ordered): number {
  const nanA = isNaNKey(a);
  const nanB = isNaNKey(b);
  if (nanA || nanB) return nanA === nanB ? 0 : nanA ? 1 : -1;
  return a < b ? -1 : b < a ? 1 : 0;
}
