// tests/unit/inspect.spec.ts
//
// Unit tests for display helpers: result formatting (including the
// print-then-reparse round trip) and error formatting.

import { describe, it, expect } from 'vitest';
import {
  evaluate,
  formatResult,
  formatCalcError,
  CalcError,
} from '../../src';

describe('formatResult', () => {
  it('prints the shortest round-trip form by default', () => {
    expect(formatResult(14)).toBe('14');
    expect(formatResult(2.5)).toBe('2.5');
    expect(formatResult(-0)).toBe('0');
    expect(formatResult(1e21)).toBe('1e+21');
  });

  it('prints non-finite values by name', () => {
    expect(formatResult(NaN)).toBe('NaN');
    expect(formatResult(Infinity)).toBe('Infinity');
    expect(formatResult(-Infinity)).toBe('-Infinity');
  });

  it('rounds to significant digits and drops trailing zeros', () => {
    expect(formatResult(1 / 3, { precision: 6 })).toBe('0.333333');
    expect(formatResult(2.5, { precision: 6 })).toBe('2.5');
    expect(formatResult(123456789, { precision: 3 })).toBe('123000000');
  });

  it('ignores a non-finite precision', () => {
    expect(formatResult(1 / 4, { precision: NaN })).toBe('0.25');
    expect(formatResult(1 / 4, { precision: Infinity })).toBe('0.25');
  });

  it('clamps precision into 1..21', () => {
    expect(formatResult(1234, { precision: 0 })).toBe('1000');
    expect(formatResult(2.5, { precision: 99 })).toBe('2.5');
  });

  it('prints values that evaluate back to themselves', () => {
    for (const text of ['1/3', '2^70', '-2.5e-7', '0.1+0.2', '-(10/4)', '7 % 3']) {
      const first = evaluate(text);
      expect(first.ok).toBe(true);
      if (!first.ok) continue;

      const again = evaluate(formatResult(first.value));
      expect(again).toEqual({ ok: true, value: first.value });
    }
  });
});

describe('formatCalcError', () => {
  it('formats evaluation errors with code, message and snippet', () => {
    const result = evaluate('3 q');
    expect(result.ok).toBe(false);
    if (result.ok) return;

    const formatted = formatCalcError(result.error);
    expect(formatted.summary).toBe('[E_PARSE] Unexpected trailing input at position 2');
    expect(formatted.detail).toBe(
      '[E_PARSE] Unexpected trailing input at position 2\n\n3 q\n  ^',
    );
    expect(formatted.error).toBe(result.error);
  });

  it('builds the snippet from the given source when the error has none', () => {
    const err = new CalcError({ kind: 'ExpectedNumber', index: 1 });
    expect(formatCalcError(err, '+)').detail).toBe(
      '[E_PARSE] Expected number at position 1\n\n+)\n ^',
    );
  });

  it('falls back to the summary when no location is known', () => {
    const err = new CalcError({ kind: 'DivisionByZero' });
    const formatted = formatCalcError(err);
    expect(formatted.summary).toBe('[E_ARITHMETIC] Division by zero');
    expect(formatted.detail).toBe(formatted.summary);
  });

  it('formats foreign errors', () => {
    expect(formatCalcError(new Error('boom')).summary).toBe('Error: boom');
    expect(formatCalcError('plain').detail).toBe('Error: plain');
  });
});
