#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   tableparity verify -t orders -d legacy -a migrated -o 20250101 -m m1
 */

import { run } from './run.js';

void run(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = 2;
  }
);
