/**
 * Result Type Module
 *
 * A discriminated union for operations that report failure as a value
 * instead of throwing.
 *
 * @module @logfan/shared/types/result
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = Error> = Ok<T> | Err<E>;

/**
 * Create a successful result.
 */
export function Ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/**
 * Create a failed result.
 */
export function Err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Run a synchronous function and capture a throw as an Err.
 *
 * @example
 * ```typescript
 * const parsed = tryCatch(() => JSON.parse(text));
 * if (!parsed.ok) return;
 * ```
 */
export function tryCatch<T>(fn: () => T): Result<T, unknown> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(error);
  }
}
