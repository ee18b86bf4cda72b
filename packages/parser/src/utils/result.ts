/**
 * Result type for explicit error handling.
 *
 * Used where a failure is an expected outcome for one input (a file that
 * does not parse) rather than a reason to stop the caller.
 *
 * @example
 * ```typescript
 * const result = extractFunctions('src/app.py', source);
 * if (result.ok) {
 *   console.log(result.value.length);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Creates a successful Result containing a value
 */
export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

/**
 * Creates a failed Result containing an error
 */
export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

