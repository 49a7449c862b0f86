/**
 * calcexpr – Public entry point
 *
 *   import { evaluate, formatResult } from 'calcexpr';
 *
 *   const result = evaluate('2^3^2 + 2(3+4)');
 *   if (result.ok) {
 *     console.log(formatResult(result.value)); // 526
 *   } else {
 *     console.error(result.error.kind, result.error.index);
 *   }
 *
 * License: Apache-2.0
 */

// Core
export { evaluate, evaluateOrThrow } from './core/evaluator';
export { CalcError, isCalcError } from './core/errors';
export type {
  CalcErrorKind,
  CalcErrorCode,
  CalcErrorOptions,
  Result,
  EvalResult,
} from './core/types';

// Utilities
export { formatResult, formatCalcError } from './utils/inspect';
export type { FormatResultOptions, FormattedCalcError } from './utils/inspect';

// Interactive loop
export { runRepl, isQuitCommand, DEFAULT_PROMPT, DEFAULT_BANNER } from './cli/repl';
export type { ReplOptions, ReplSummary } from './cli/repl';
