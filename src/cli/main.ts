/**
 * calcexpr – command-line driver
 *
 * Usage:
 *
 *   calcexpr                 # interactive loop on stdin/stdout
 *   calcexpr "2(3+4) ^ 2"    # evaluate once, print the value
 *
 * In one-shot mode all arguments are joined with spaces, so shells that
 * split `2 * 3` into three words still work. Exit code 1 on error.
 *
 * License: Apache-2.0
 */

import { evaluate } from '../core/evaluator';
import { formatCalcError, formatResult } from '../utils/inspect';
import { runRepl } from './repl';

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

/**
 * Run the CLI and resolve with the process exit code.
 */
export async function main(
  args: string[],
  io: CliIO = {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  },
): Promise<number> {
  if (args.length === 0) {
    await runRepl({ input: io.stdin, output: io.stdout });
    return 0;
  }

  const expression = args.join(' ');
  const result = evaluate(expression);

  if (result.ok) {
    io.stdout.write(`${formatResult(result.value)}\n`);
    return 0;
  }

  io.stderr.write(`${formatCalcError(result.error, expression).detail}\n`);
  return 1;
}
