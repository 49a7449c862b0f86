/**
 * calcexpr – Parser core
 *
 * Recursive-descent parser that computes the value of an arithmetic
 * expression while it reads it. No tree is built: every grammar rule
 * returns the number its input denotes, or the first error it hit.
 *
 *   expression := term (('+' | '-') term)*
 *   term       := power (('*' | '/' | '%' | <implicit>) power)*
 *   power      := factor (('**' | '^') power)?
 *   factor     := '+' factor | '-' factor | '(' expression ')' | number
 *
 * `<implicit>` is multiplication inferred when a power is directly followed
 * by `(`, a digit or `.`, as in `2(3+4)` or `(1+2)(3+4)`.
 *
 * Character-level work (whitespace, operator matching, numeric literals) is
 * done by `scanner.ts`; the public entry point lives in `evaluator.ts`.
 *
 * License: Apache-2.0
 */

import { createCalcError } from './errors';
import type { CalcErrorKind } from './errors';
import { Scanner } from './scanner';
import { ok, fail } from './types';
import type { Result } from './types';

/**
 * Parse and evaluate `source` as one complete expression.
 */
export function parseExpression(source: string): Result<number> {
  const parser = new Parser(source);
  return parser.parseExpressionRoot();
}

/////////////////////
// Parser class    //
/////////////////////

class Parser {
  private readonly scanner: Scanner;

  constructor(source: string) {
    this.scanner = new Scanner(source);
  }

  parseExpressionRoot(): Result<number> {
    const result = this.parseExpression();
    if (!result.ok) return result;

    this.scanner.skipWhitespace();
    if (!this.scanner.atEnd()) {
      return this.error('TrailingInput', this.scanner.pos);
    }

    return result;
  }

  /**
   * Additive level, left-associative.
   */
  private parseExpression(): Result<number> {
    const first = this.parseTerm();
    if (!first.ok) return first;

    let value = first.value;

    for (;;) {
      if (this.scanner.match('+')) {
        const right = this.parseTerm();
        if (!right.ok) return right;
        value += right.value;
      } else if (this.scanner.match('-')) {
        const right = this.parseTerm();
        if (!right.ok) return right;
        value -= right.value;
      } else {
        return ok(value);
      }
    }
  }

  /**
   * Multiplicative level: `*`, `/`, `%` and implicit multiplication share
   * one precedence and apply left to right.
   */
  private parseTerm(): Result<number> {
    const first = this.parsePower();
    if (!first.ok) return first;

    let value = first.value;
    const s = this.scanner;

    for (;;) {
      s.skipWhitespace();
      const opIndex = s.pos;

      if (s.match('*')) {
        const right = this.parsePower();
        if (!right.ok) return right;
        value *= right.value;
      } else if (s.match('/')) {
        const right = this.parsePower();
        if (!right.ok) return right;
        if (right.value === 0) return this.error('DivisionByZero', opIndex);
        value /= right.value;
      } else if (s.match('%')) {
        const right = this.parsePower();
        if (!right.ok) return right;

        // Integer remainder of both operands truncated toward zero.
        const dividend = Math.trunc(value);
        const divisor = Math.trunc(right.value);
        if (divisor === 0) return this.error('ModuloByZero', opIndex);
        value = (dividend % divisor) + 0; // + 0 turns -0 into 0
      } else if (s.startsFactor()) {
        const right = this.parsePower();
        if (!right.ok) return right;
        value *= right.value;
      } else {
        return ok(value);
      }
    }
  }

  /**
   * Exponentiation, right-associative: the exponent is a full power.
   * `**` is tried before `^`.
   */
  private parsePower(): Result<number> {
    const base = this.parseFactor();
    if (!base.ok) return base;

    if (this.scanner.matchString('**') || this.scanner.match('^')) {
      const exponent = this.parsePower();
      if (!exponent.ok) return exponent;
      return ok(Math.pow(base.value, exponent.value));
    }

    return base;
  }

  /**
   * Unary signs, parenthesized sub-expressions and numeric literals.
   */
  private parseFactor(): Result<number> {
    const s = this.scanner;

    if (s.match('+')) return this.parseFactor();

    if (s.match('-')) {
      const operand = this.parseFactor();
      return operand.ok ? ok(-operand.value) : operand;
    }

    if (s.match('(')) {
      const inner = this.parseExpression();
      if (!inner.ok) return inner;

      s.skipWhitespace();
      const closeIndex = s.pos;
      if (!s.match(')')) return this.error('UnclosedParenthesis', closeIndex);

      return inner;
    }

    return s.readNumber();
  }

  private error(kind: CalcErrorKind, index: number): Result<number> {
    return fail(createCalcError(kind, this.scanner.src, index));
  }
}
