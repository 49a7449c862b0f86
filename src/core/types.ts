/**
 * calcexpr – Core / public types
 *
 * The `Result` union every grammar rule returns with its `ok`/`fail`
 * constructors, and re-exports so consumers can import all public types
 * from one place.
 *
 *   import type { EvalResult, CalcErrorKind } from 'calcexpr/core/types';
 *
 * License: Apache-2.0
 */

import type { CalcError } from './errors';

export type { CalcErrorKind, CalcErrorCode, CalcErrorOptions } from './errors';

/**
 * Success or failure, without exceptions.
 */
export type Result<T, E = CalcError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/**
 * Outcome of one `evaluate(text)` call.
 */
export type EvalResult = Result<number, CalcError>;

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
