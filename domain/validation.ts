/**
 * Domain validation: assertions and invariants.
 * Framework-independent. No business logic.
 */

import { InvariantViolation, ValidationError, type ErrorMetadata } from "./errors.js";

/** Throws ValidationError if condition is falsy. TypeScript narrows after a successful call. */
export function assert(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new ValidationError(message, metadata);
  }
}

/** Same as assert, for conditions that only a programming error can break. */
export function invariant(condition: unknown, message: string, metadata?: ErrorMetadata): asserts condition {
  if (!condition) {
    throw new InvariantViolation(message, metadata);
  }
}

/** Call in unreachable branches (e.g. exhaustive switch). Always throws. */
export function neverReached(value: never, message = "Unreachable"): never {
  throw new InvariantViolation(message, { value });
}
