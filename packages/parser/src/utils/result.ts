/**
 * Result type for failures that must stay local to one file.
 *
 * Parsing returns a Result instead of throwing so that one malformed file
 * never aborts a run over the rest of the directory.
 *
 * @example
 * ```typescript
 * const parsed = parseSource(content, 'Foo.cs');
 * if (isOk(parsed)) {
 *   extractFunctions(parsed.value.root);
 * } else {
 *   logger.warning(parsed.error.message);
 * }
 * ```
 */

/**
 * Result type representing either success (Ok) or failure (Err)
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

/**
 * Type guard to check if a Result is Ok
 */
export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

/**
 * Type guard to check if a Result is Err
 */
export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}

/**
 * Split a list of Results into successful values and errors, preserving order.
 */
export function partitionResults<T, E>(results: readonly Result<T, E>[]): { values: T[]; errors: E[] } {
  const values: T[] = [];
  const errors: E[] = [];
  for (const result of results) {
    if (result.ok) {
      values.push(result.value);
    } else {
      errors.push(result.error);
    }
  }
  return { values, errors };
}
