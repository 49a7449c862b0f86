/**
 * calcexpr – Evaluator entry point
 *
 * `evaluate(text)` is the one operation the core exposes. Each call builds
 * its own parser and scanner, so calls are independent and re-entrant.
 *
 *   const result = evaluate('2(3+4)');
 *   if (result.ok) console.log(result.value); // 14
 *   else console.error(result.error.message);
 *
 * License: Apache-2.0
 */

import { parseExpression } from './parser';
import type { EvalResult } from './types';

/**
 * Evaluate one arithmetic expression.
 *
 * Never throws for bad input: failures come back as `{ ok: false, error }`
 * with a `CalcError` describing the first problem found. Nesting depth is
 * bounded only by the call stack, so input nested tens of thousands of
 * parentheses deep throws the engine's `RangeError`.
 */
export function evaluate(text: string): EvalResult {
  return parseExpression(text);
}

/**
 * Like `evaluate`, but returns the number directly and throws the
 * `CalcError` on failure.
 */
export function evaluateOrThrow(text: string): number {
  const result = parseExpression(text);
  if (!result.ok) throw result.error;
  return result.value;
}
