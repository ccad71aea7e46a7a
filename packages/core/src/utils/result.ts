/**
 * Result type for per-item outcomes where one failure must not abort a batch.
 *
 * @example
 * ```typescript
 * const results = await engine.categorizeMany(questions);
 * for (const result of results) {
 *   if (isOk(result)) console.log(result.value.categoryId);
 *   else console.error(result.error.kind);
 * }
 * ```
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function Ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function Err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is { ok: false; error: E } {
  return !result.ok;
}
