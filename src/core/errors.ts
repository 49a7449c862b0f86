/**
 * calcexpr – Error types & helpers
 *
 * One error class (`CalcError`) is shared by the scanner, the parser and the
 * evaluator entry point. Every failure carries a stable `kind`, a coarse
 * `code`, and the offset where the problem was detected, plus a caret
 * snippet for display.
 *
 * License: Apache-2.0
 */

/**
 * The five ways an evaluation can fail.
 *
 *  - `ExpectedNumber`      – a factor was required but no literal, sign or
 *                            opening parenthesis was found.
 *  - `UnclosedParenthesis` – `(` without a matching `)`.
 *  - `DivisionByZero`      – right operand of `/` is exactly zero.
 *  - `ModuloByZero`        – truncated right operand of `%` is zero.
 *  - `TrailingInput`       – characters left over after a complete expression.
 */
export type CalcErrorKind =
  | 'ExpectedNumber'
  | 'UnclosedParenthesis'
  | 'DivisionByZero'
  | 'ModuloByZero'
  | 'TrailingInput';

/**
 * High-level category: syntax problems vs. arithmetic on a zero divisor.
 */
export type CalcErrorCode = 'E_PARSE' | 'E_ARITHMETIC';

const ERROR_CODES: Record<CalcErrorKind, CalcErrorCode> = {
  ExpectedNumber: 'E_PARSE',
  UnclosedParenthesis: 'E_PARSE',
  TrailingInput: 'E_PARSE',
  DivisionByZero: 'E_ARITHMETIC',
  ModuloByZero: 'E_ARITHMETIC',
};

export interface CalcErrorOptions {
  kind: CalcErrorKind;

  /**
   * Overrides the default message for `kind`.
   */
  message?: string;

  /**
   * The full expression text, used to compute line/column and the snippet.
   */
  source?: string;

  /**
   * 0-based offset where the error was detected. May equal `source.length`
   * when the input ended too early.
   */
  index?: number;

  cause?: unknown;
}

export class CalcError extends Error {
  public readonly name = 'CalcError';
  public readonly kind: CalcErrorKind;
  public readonly code: CalcErrorCode;

  /** 0-based offset in the source (if known). */
  public readonly index: number | null;

  /** 1-based line number (if known). */
  public readonly line: number | null;

  /** 1-based column number (if known). */
  public readonly column: number | null;

  /**
   * The offending source line with a caret under the error position:
   *
   *   3 q
   *     ^
   */
  public readonly snippet: string;

  constructor(opts: CalcErrorOptions) {
    const index =
      typeof opts.index === 'number' && opts.index >= 0 ? opts.index : null;

    super(
      opts.message ?? defaultMessage(opts.kind, index),
      opts.cause !== undefined ? { cause: opts.cause } : undefined,
    );

    Object.setPrototypeOf(this, new.target.prototype);

    this.kind = opts.kind;
    this.code = ERROR_CODES[opts.kind];
    this.index = index;

    if (opts.source !== undefined && index != null) {
      const snip = buildSnippet(opts.source, index);
      this.line = snip.line;
      this.column = snip.column;
      this.snippet = snip.snippet;
    } else {
      this.line = null;
      this.column = null;
      this.snippet = '';
    }
  }
}

export function isCalcError(err: unknown): err is CalcError {
  return err instanceof CalcError;
}

/**
 * Shorthand used by the parser: an error of `kind` at `index` in `source`.
 */
export function createCalcError(
  kind: CalcErrorKind,
  source: string,
  index: number,
): CalcError {
  return new CalcError({ kind, source, index });
}

function defaultMessage(kind: CalcErrorKind, index: number | null): string {
  const at = index != null ? ` at position ${index}` : '';
  switch (kind) {
    case 'ExpectedNumber':
      return `Expected number${at}`;
    case 'UnclosedParenthesis':
      return `Missing closing parenthesis${at}`;
    case 'DivisionByZero':
      return 'Division by zero';
    case 'ModuloByZero':
      return 'Modulo by zero';
    case 'TrailingInput':
      return `Unexpected trailing input${at}`;
  }
}

/////////////////////////////
// Snippet & position util //
/////////////////////////////

interface SnippetInfo {
  line: number;
  column: number;
  snippet: string;
}

/**
 * Line and column (both 1-based) of `index` in `source`. `\r\n` counts as a
 * single line break. An index at the very end of the source maps to the
 * column just past the last character.
 */
export function computeLineAndColumn(
  source: string,
  index: number,
): { line: number; column: number } {
  const end = Math.min(Math.max(index, 0), source.length);

  let line = 1;
  let lineStart = 0;

  for (let i = 0; i < end; i++) {
    const ch = source[i];
    if (ch === '\n') {
      line++;
      lineStart = i + 1;
    } else if (ch === '\r') {
      if (source[i + 1] === '\n' && i + 1 < end) i++;
      line++;
      lineStart = i + 1;
    }
  }

  return { line, column: end - lineStart + 1 };
}

/**
 * The line holding `index`, and a caret line pointing at it.
 */
export function buildSnippet(source: string, index: number): SnippetInfo {
  const { line, column } = computeLineAndColumn(source, index);
  const errorLine = source.split(/\r\n|\r|\n/)[line - 1] ?? '';

  const caretLine = `${' '.repeat(column - 1)}^`;

  return { line, column, snippet: `${errorLine}\n${caretLine}` };
}
