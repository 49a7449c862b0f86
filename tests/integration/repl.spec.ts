// tests/integration/repl.spec.ts
//
// End-to-end transcripts of the interactive loop over in-memory streams.

import { describe, it, expect } from 'vitest';
import { runRepl, isQuitCommand, DEFAULT_BANNER, DEFAULT_PROMPT } from '../../src';
import { capture, inputOf } from './helpers';

async function session(text: string, extra: Parameters<typeof runRepl>[0] = {}) {
  const out = capture();
  const summary = await runRepl({
    input: inputOf(text),
    output: out.stream,
    prompt: '> ',
    banner: false,
    ...extra,
  });
  return { summary, transcript: out.text() };
}

describe('REPL – transcripts', () => {
  it('prints results and errors until q', async () => {
    const { summary, transcript } = await session('2+3*4\n5/0\nq\n');

    expect(transcript).toBe(
      '> Result: 14\n\n' +
        '> Error: Division by zero\n\n' +
        '> Goodbye!\n',
    );
    expect(summary).toEqual({ evaluated: 2, failed: 1 });
  });

  it('ignores lines after the quit command', async () => {
    const { summary, transcript } = await session('1\nQ\n2\n');

    expect(transcript).toBe('> Result: 1\n\n> Goodbye!\n');
    expect(summary).toEqual({ evaluated: 1, failed: 0 });
  });

  it('stops at end of input', async () => {
    const { transcript } = await session('1+1\n7');
    expect(transcript).toBe('> Result: 2\n\n> Result: 7\n\n> Goodbye!\n');
  });

  it('evaluates a line that merely contains q', async () => {
    const { transcript } = await session('quit\n');
    expect(transcript).toBe('> Error: Expected number at position 0\n\n> Goodbye!\n');
  });

  it('shows a caret snippet when asked', async () => {
    const { transcript } = await session('3 q\nq\n', { showSnippet: true });
    expect(transcript).toBe(
      '> Error: Unexpected trailing input at position 2\n3 q\n  ^\n\n> Goodbye!\n',
    );
  });

  it('rounds results to the configured precision', async () => {
    const { transcript } = await session('1/3\n', { precision: 4 });
    expect(transcript).toBe('> Result: 0.3333\n\n> Goodbye!\n');
  });

  it('prints the banner and default prompt by default', async () => {
    const out = capture();
    await runRepl({ input: inputOf('q\n'), output: out.stream });

    expect(out.text()).toBe(`${DEFAULT_BANNER}${DEFAULT_PROMPT}Goodbye!\n`);
  });
});

describe('isQuitCommand', () => {
  it('accepts q in either case, alone on the line', () => {
    expect(isQuitCommand('q')).toBe(true);
    expect(isQuitCommand('Q')).toBe(true);
    expect(isQuitCommand('  q \r')).toBe(true);
    expect(isQuitCommand('qq')).toBe(false);
    expect(isQuitCommand('')).toBe(false);
  });
});
