import type { StructuredError } from '../errors/structured-error.js';

/**
 * Successful branch of a {@link Result}
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

/**
 * Failed branch of a {@link Result}
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * Uniform success/failure value returned by every gateway, repository and
 * use-case operation in place of a thrown exception.
 *
 * @typeParam T - The success value type
 * @typeParam E - The failure type (a {@link StructuredError} unless overridden)
 *
 * @example
 * ```typescript
 * const result = await gateway.read('user-1');
 * if (result.ok) {
 *   console.log(result.value.name);
 * } else {
 *   console.warn(result.error.code);
 * }
 * ```
 */
export type Result<T, E = StructuredError> = Ok<T> | Err<E>;

/** Wrap a value in a successful result */
export function ok(): Ok<void>;
export function ok<T>(value: T): Ok<T>;
export function ok<T>(value?: T): Ok<T | undefined> {
  return { ok: true, value };
}

/** Wrap an error in a failed result */
export function err<E = StructuredError>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Transform the success value, passing failures through untouched.
 */
export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

/**
 * Chain a computation that itself returns a result.
 */
export function flatMapResult<T, U, E>(
  result: Result<T, E>,
  fn: (value: T) => Result<U, E>
): Result<U, E> {
  return result.ok ? fn(result.value) : result;
}

/**
 * Collapse both branches into a single value.
 */
export function foldResult<T, E, R>(
  result: Result<T, E>,
  onErr: (error: E) => R,
  onOk: (value: T) => R
): R {
  return result.ok ? onOk(result.value) : onErr(result.error);
}

/** Return the success value, or `fallback` for a failure */
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
