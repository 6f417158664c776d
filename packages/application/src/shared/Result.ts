/**
 * @fileoverview Result Type for Functional Error Handling
 *
 * Use cases return a Result instead of throwing, so driving adapters (HTTP
 * routes, CLIs) map failures without try/catch.
 *
 * @module application/shared/Result
 */

import { AppError, toError } from '@leadflow/core';

/**
 * Success result variant
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

/**
 * Error result variant
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

export type Result<T, E = AppError> = Ok<T> | Err<E>;

export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}

/**
 * Unwrap a result, throwing if it's an error
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (isOk(result)) {
    return result.value;
  }
  throw result.error;
}

/**
 * Run `fn`, turning a thrown value into an Err. Errors that are not an
 * AppError become a generic INTERNAL_ERROR and are handed to `onUnexpected`.
 */
export async function tryCatch<T>(
  fn: () => Promise<T>,
  onUnexpected?: (error: Error) => void
): Promise<Result<T, AppError>> {
  try {
    return Ok(await fn());
  } catch (error) {
    if (error instanceof AppError) {
      return Err(error);
    }
    onUnexpected?.(toError(error));
    return Err(new AppError('An unexpected error occurred', 'INTERNAL_ERROR', 500));
  }
}
