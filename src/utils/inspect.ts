/**
 * calcexpr – Inspection & formatting utilities
 *
 * Display helpers shared by the REPL and the CLI:
 *
 *  - `formatResult`    – print a computed value so it reads back as a
 *                        literal the evaluator accepts.
 *  - `formatCalcError` – one-line summary plus a caret snippet.
 *
 * License: Apache-2.0
 */

import { buildSnippet, isCalcError } from '../core/errors';

export interface FormatResultOptions {
  /**
   * Round to this many significant digits (1–21) and drop trailing zeros,
   * e.g. `precision: 6` prints `1/3` as `0.333333`.
   * Default (also used for a non-finite value): shortest round-trip
   * representation.
   */
  precision?: number;
}

/**
 * Render a result value. Finite values print in a form that `evaluate`
 * parses back to the same number (`1e+21`, `-0.5`, `2.5e-7`); negative
 * zero prints as `0`.
 */
export function formatResult(
  value: number,
  options: FormatResultOptions = {},
): string {
  if (!Number.isFinite(value)) return String(value);

  const { precision } = options;
  if (precision === undefined || !Number.isFinite(precision)) return String(value);

  const digits = Math.min(21, Math.max(1, Math.trunc(precision)));
  return String(Number(value.toPrecision(digits)));
}

export interface FormattedCalcError {
  /**
   * One-line summary, e.g. `[E_PARSE] Expected number at position 4`.
   */
  summary: string;

  /**
   * Summary followed by the source line and a caret, when known.
   */
  detail: string;

  error: unknown;
}

/**
 * Turn any thrown or returned error into display text. `source` is used to
 * build a snippet when the error does not carry one already.
 */
export function formatCalcError(
  err: unknown,
  source?: string,
): FormattedCalcError {
  if (!isCalcError(err)) {
    const message = err instanceof Error ? err.message : String(err);
    const summary = `Error: ${message}`;
    return { summary, detail: summary, error: err };
  }

  let snippet = err.snippet;
  if (snippet === '' && source !== undefined && err.index != null) {
    snippet = buildSnippet(source, err.index).snippet;
  }

  const summary = `[${err.code}] ${err.message}`;
  const detail = snippet !== '' ? `${summary}\n\n${snippet}` : summary;

  return { summary, detail, error: err };
}
