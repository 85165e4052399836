/**
 * Result type for explicit error handling
 * Backs the non-throwing `try*` variants of parsing and calling
 */

import type { EthBindError } from './errors.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

export interface Err<E> {
  readonly ok: false;
  readonly value?: never;
  readonly error: E;
}

export type Result<T, E = EthBindError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok;
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return !result.ok;
}

/**
 * Unwrap a result, throwing the carried error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return isOk(result) ? result.value : defaultValue;
}

export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return isOk(result) ? ok(fn(result.value)) : result;
}

export function mapErr<T, E, F>(result: Result<T, E>, fn: (error: E) => F): Result<T, F> {
  return isErr(result) ? err(fn(result.error)) : result;
}

/**
 * Catch errors of class `kind` into an Err; anything else is rethrown
 */
export function fromThrowable<T, E extends Error>(
  fn: () => T,
  kind: abstract new (...args: never[]) => E
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    if (error instanceof kind) {
      return err(error);
    }
    throw error;
  }
}

/**
 * Async counterpart of {@link fromThrowable}
 */
export async function fromPromise<T, E extends Error>(
  promise: Promise<T>,
  kind: abstract new (...args: never[]) => E
): Promise<Result<T, E>> {
  try {
    return ok(await promise);
  } catch (error) {
    if (error instanceof kind) {
      return err(error);
    }
    throw error;
  }
}
