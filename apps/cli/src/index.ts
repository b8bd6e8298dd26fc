#!/usr/bin/env node
/**
 * botkeeper CLI entry point.
 */

import { main } from './cli.js';

main(process.argv.slice(2)).catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : String(err));
  process.exitCode = 1;
});
