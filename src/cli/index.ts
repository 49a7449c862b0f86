#!/usr/bin/env node
/**
 * calcexpr – executable entry point (see `main.ts`).
 *
 * License: Apache-2.0
 */

import { log } from '../utils/log';
import { main } from './main';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    log('error', err instanceof Error ? err.stack ?? err.message : String(err));
    process.exitCode = 1;
  });
