#!/usr/bin/env node
/**
 * board-sync CLI
 *
 * Invoked by the scheduler: `board-sync run <job>`. Credentials come from
 * the environment; see sync.config.example.yaml for the configuration file.
 */

import { createProgram } from './cli/program.js';

const program = createProgram({
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

program.parseAsync(process.argv).catch((error: unknown) => {
  process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 2;
});
