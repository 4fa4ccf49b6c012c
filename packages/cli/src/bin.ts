#!/usr/bin/env node
/**
 * bftsim executable.
 *
 * Usage:
 *   bftsim run --nodes 7 --faulty 2 --block "Block 1" --block "Block 2"
 */

import { run } from './index';

run(process.argv.slice(2)).then(
  (result) => {
    if (result.stdout.length > 0) process.stdout.write(result.stdout + '\n');
    if (result.stderr.length > 0) process.stderr.write(result.stderr + '\n');
    process.exitCode = result.exitCode;
  },
  (err: unknown) => {
    process.stderr.write(`[bftsim] ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
