#!/usr/bin/env node
import { runCli } from './cli/program.js';

runCli(process.argv.slice(2)).catch((error: unknown) => {
  console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
