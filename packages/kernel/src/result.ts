/**
 * Result values
 *
 * Transformers, the executor and the router return a Result rather than
 * throw; the error side stays a typed layer error until the caller lifts it.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Transform the value of a successful result
 */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Transform the error of a failed result. Layer conversions go through
 * here, e.g. `mapErr(step, processingStepErrorToRouterError)`.
 */
export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return result.ok ? result : err(fn(result.error));
}

/**
 * Feed a successful value into the next fallible step
 */
export function chain<T, U, E, F = E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, F>
): Result<U, E | F> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Value of a result known to succeed; throws the error otherwise.
 * Configuration bootstrap and tests.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}
