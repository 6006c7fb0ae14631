#!/usr/bin/env node
/**
 * clusterwright CLI
 */

import { CommanderError } from 'commander';
import { argv, exit, stderr, stdout } from 'node:process';
import { createApp } from '@/app';
import { createLogger } from '@/lib/logger';
import { createTerminalPrompter } from '@/lib/prompt';
import { buildProgram } from './program';

const program = buildProgram(
  (logLevel) =>
    createApp({
      logger: createLogger({ name: 'cli', level: logLevel }),
      prompter: createTerminalPrompter(),
      progress: (message) => stderr.write(`> ${message}\n`),
    }),
  {
    out: (line) => stdout.write(`${line}\n`),
    err: (line) => stderr.write(`${line}\n`),
    setExitCode: (code) => {
      process.exitCode = code;
    },
  },
);

async function main(): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) exit(error.exitCode);
    throw error;
  }
}

main().catch((error: unknown) => {
  stderr.write(`Unexpected failure: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  exit(1);
});
