/**
 * Result Type for Functional Error Handling
 *
 * Extraction failures are expected outcomes of malformed documentation, so
 * every fallible operation returns a Result instead of throwing.
 *
 * @module
 */

// =============================================================================
// Result Type Definition
// =============================================================================

/**
 * Result type representing either success (Ok) or failure (Err)
 */
export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates a successful Result containing a value
 */
export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

// =============================================================================
// Type Guards
// =============================================================================

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

// =============================================================================
// Unwrapping
// =============================================================================

/**
 * Extracts the value from a Result, throwing if it's an error
 *
 * @throws The contained error if Result is Err
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

/**
 * Extracts the error from a Result, throwing if it's Ok
 *
 * @throws Error if Result is Ok
 */
export function unwrapErr<T, E>(result: Result<T, E>): E {
  if (!result.ok) return result.error;
  throw new Error("Called unwrapErr on an Ok result");
}

// =============================================================================
// Transformations
// =============================================================================

/**
 * Maps the Ok value of a Result using the provided function
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Chains Result operations (flatMap/andThen)
 */
export function andThen<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

// =============================================================================
// Collection Utilities
// =============================================================================

/**
 * Collects an array of Results into a Result of array
 * Returns Err with the first error encountered, or Ok with all values
 */
export function collect<T, E>(results: Result<T, E>[]): Result<T[], E> {
  const values: T[] = [];
  for (const result of results) {
    if (!result.ok) return result;
    values.push(result.value);
  }
  return ok(values);
}
