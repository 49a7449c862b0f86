/**
 * calcexpr – Scanner
 *
 * Character-level access to one expression: the input buffer, the cursor,
 * and the primitives the parser uses to recognize operators and numeric
 * literals on demand. There is no separate tokenization pass.
 *
 * A scanner belongs to a single `evaluate()` call and is discarded with it.
 *
 * License: Apache-2.0
 */

import { createCalcError } from './errors';
import { ok, fail } from './types';
import type { Result } from './types';

export class Scanner {
  readonly src: string;
  private readonly len: number;
  private cursor = 0;

  constructor(source: string) {
    this.src = source;
    this.len = source.length;
  }

  /** Current cursor offset. */
  get pos(): number {
    return this.cursor;
  }

  atEnd(): boolean {
    return this.cursor >= this.len;
  }

  skipWhitespace(): void {
    while (
      this.cursor < this.len &&
      isWhitespace(this.src.charCodeAt(this.cursor))
    ) {
      this.cursor++;
    }
  }

  /**
   * Next non-whitespace character, or `''` at end of input.
   */
  peek(): string {
    this.skipWhitespace();
    return this.cursor < this.len ? this.src[this.cursor] : '';
  }

  /**
   * Consume `ch` if it is the next non-whitespace character.
   */
  match(ch: string): boolean {
    this.skipWhitespace();
    if (this.cursor < this.len && this.src[this.cursor] === ch) {
      this.cursor++;
      return true;
    }
    return false;
  }

  /**
   * Consume `text` if the input continues with it (after whitespace).
   * The characters of `text` must be adjacent: `* *` does not match `**`.
   */
  matchString(text: string): boolean {
    this.skipWhitespace();
    if (this.src.startsWith(text, this.cursor)) {
      this.cursor += text.length;
      return true;
    }
    return false;
  }

  /**
   * Whether the next non-whitespace character can open a factor without a
   * sign: `(`, a digit or `.`. Drives implicit multiplication.
   */
  startsFactor(): boolean {
    const ch = this.peek();
    return ch === '(' || ch === '.' || (ch !== '' && isDigit(ch.charCodeAt(0)));
  }

  /**
   * Lex a numeric literal at the cursor and convert it.
   *
   *   digits [ '.' digits ] [ ('e' | 'E') [ '+' | '-' ] digits ]
   *
   * Either digit run may be empty, but the mantissa must hold at least one
   * digit. An exponent marker with no digits after it is left unconsumed.
   */
  readNumber(): Result<number> {
    this.skipWhitespace();
    const start = this.cursor;

    let sawDot = false;
    while (this.cursor < this.len) {
      const ch = this.src.charCodeAt(this.cursor);
      if (isDigit(ch)) {
        this.cursor++;
      } else if (ch === 46 /* . */ && !sawDot) {
        sawDot = true;
        this.cursor++;
      } else {
        break;
      }
    }

    if (this.cursor < this.len && isExponentMarker(this.src.charCodeAt(this.cursor))) {
      const mark = this.cursor;
      this.cursor++;

      const sign = this.src.charCodeAt(this.cursor);
      if (sign === 43 /* + */ || sign === 45 /* - */) this.cursor++;

      const digitsStart = this.cursor;
      while (this.cursor < this.len && isDigit(this.src.charCodeAt(this.cursor))) {
        this.cursor++;
      }

      if (this.cursor === digitsStart) this.cursor = mark;
    }

    const value = Number.parseFloat(this.src.slice(start, this.cursor));
    if (this.cursor === start || Number.isNaN(value)) {
      return fail(createCalcError('ExpectedNumber', this.src, start));
    }

    return ok(value);
  }
}

/////////////////////
// Char classes    //
/////////////////////

function isWhitespace(ch: number): boolean {
  return (
    ch === 32 || // space
    ch === 9 || // \t
    ch === 10 || // \n
    ch === 11 || // \v
    ch === 12 || // \f
    ch === 13 // \r
  );
}

function isDigit(ch: number): boolean {
  return ch >= 48 && ch <= 57; // 0-9
}

function isExponentMarker(ch: number): boolean {
  return ch === 101 /* e */ || ch === 69 /* E */;
}
