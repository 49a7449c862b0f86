/**
 * calcexpr – interactive calculator loop
 *
 * Reads one expression per line, prints `Result: …` or `Error: …`, and stops
 * on a line holding only `q`/`Q` or at end of input.
 *
 *   Enter expression (or Q to quit): 2(3+4)
 *   Result: 14
 *
 *   Enter expression (or Q to quit): 5/0
 *   Error: Division by zero
 *
 * Streams are injectable so the loop can run over anything line-oriented.
 *
 * License: Apache-2.0
 */

import { createInterface } from 'node:readline';

import { evaluate } from '../core/evaluator';
import { formatResult } from '../utils/inspect';

export const DEFAULT_PROMPT = 'Enter expression (or Q to quit): ';

export const DEFAULT_BANNER = [
  '=============================',
  '     Calculator (PEMDAS)',
  '=============================',
  '',
  '',
].join('\n');

export interface ReplOptions {
  /** Default: `process.stdin`. */
  input?: NodeJS.ReadableStream;

  /** Default: `process.stdout`. */
  output?: NodeJS.WritableStream;

  prompt?: string;

  /**
   * Text printed once before the first prompt; `false` prints nothing.
   */
  banner?: string | false;

  /**
   * Print the source line and a caret under each error message.
   * Default: false.
   */
  showSnippet?: boolean;

  /**
   * Significant digits for printed results (see `formatResult`).
   */
  precision?: number;
}

export interface ReplSummary {
  /** Lines handed to the evaluator. */
  evaluated: number;

  /** Of those, how many failed. */
  failed: number;
}

export async function runRepl(options: ReplOptions = {}): Promise<ReplSummary> {
  const {
    input = process.stdin,
    output = process.stdout,
    prompt = DEFAULT_PROMPT,
    banner = DEFAULT_BANNER,
    showSnippet = false,
    precision,
  } = options;

  const write = (text: string) => {
    output.write(text);
  };

  const summary: ReplSummary = { evaluated: 0, failed: 0 };

  // No `output` here: readline would echo input on TTYs, and every byte
  // we print goes through `write`.
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });

  if (banner !== false) write(banner);
  write(prompt);

  try {
    for await (const line of rl) {
      if (isQuitCommand(line)) break;

      summary.evaluated++;
      const result = evaluate(line);

      if (result.ok) {
        write(`Result: ${formatResult(result.value, { precision })}\n\n`);
      } else {
        summary.failed++;
        const snippet =
          showSnippet && result.error.snippet !== ''
            ? `\n${result.error.snippet}`
            : '';
        write(`Error: ${result.error.message}${snippet}\n\n`);
      }

      write(prompt);
    }
  } finally {
    rl.close();
  }

  write('Goodbye!\n');
  return summary;
}

/**
 * `q` or `Q` alone on its line (surrounding whitespace ignored).
 */
export function isQuitCommand(line: string): boolean {
  return line.trim().toLowerCase() === 'q';
}
