#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram, watchOutputErrors } from './cli/program.js';
import { processGetenv } from './action/index.js';
import { EXIT_BUG } from './runner/index.js';

const io = {
  stdout: process.stdout,
  stderr: process.stderr,
  getenv: processGetenv,
  exit: (code: number) => process.exit(code),
};

watchOutputErrors(process.stdout, io);

const program = createProgram(io);

program.parseAsync(process.argv).catch((err: unknown) => {
  // Commander has already reported usage errors and chosen an exit code.
  if (err instanceof CommanderError) return;
  process.stderr.write(`Error [INTERNAL_ERROR]: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(EXIT_BUG);
});
