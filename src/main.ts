#!/usr/bin/env node
/**
 * roundloop entry point.
 *
 * Run: npx tsx src/main.ts run "Summarise the README" --dry-run
 */

// Load environment
import { config } from 'dotenv';
config();

import { runCli } from './cli.js';
import { formatError } from './errors/index.js';

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`Fatal error: ${formatError(error)}\n`);
    process.exitCode = 1;
  }
);
