#!/usr/bin/env node
import { runCli } from './cli.js';

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error('\nError:', err instanceof Error ? err.message : err);
    process.exit(1);
  }
);
