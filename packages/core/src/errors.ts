/**
 * Contract Error Types
 *
 * Error classes for contract violations raised while a view pipeline is
 * being built, and for malformed key-value configuration.
 */

import { config } from "./config.js";

/**
 * Base class for all contract violations.
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly contractType: "precondition" | "invariant"
  ) {
    super(message);
    this.name = "ContractError";
  }
}

/**
 * Thrown when an operation is applied to a view (or with arguments) it does
 * not accept, e.g. sorting an infinite view or a range with a zero step.
 */
export class PreconditionError extends ContractError {
  constructor(message: string) {
    super(message, "precondition");
    this.name = "PreconditionError";
  }
}

/**
 * Thrown when internal bookkeeping is misused, e.g. filling a
 * single-element slot twice.
 */
export class InvariantError extends ContractError {
  constructor(message: string) {
    super(message, "invariant");
    this.name = "InvariantError";
  }
}

/** Reason codes for key-value configuration failures. */
export type ConfigErrorReason =
  | "missing_separator"
  | "duplicate_key"
  | "unreadable_file"
  | "invalid_value";

/** Error thrown when a key-value configuration cannot be loaded or read. */
export class ConfigError extends Error {
  constructor(
    readonly key: string,
    readonly reason: ConfigErrorReason,
    message: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Re-check a type-level requirement at run time.
 *
 * Skipped when `contracts.mode` is `"none"`.
 */
export function requirePrecondition(condition: boolean, message: string): void {
  if (!condition && config.contractsEnabled()) {
    throw new PreconditionError(message);
  }
}

/**
 * Validate an argument. Never skipped.
 */
export function requireArgument(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new PreconditionError(message);
  }
}
