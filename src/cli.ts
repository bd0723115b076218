#!/usr/bin/env node
/**
 * @module Main
 * This is the entry point for the curlparse CLI application.
 * It loads the environment and hands the arguments to the program.
 */

import { hideBin } from 'yargs/helpers';
import { runCli } from './program.js';

async function main(): Promise<void> {
  // Conditionally load a .env file in non-production environments
  if (process.env.NODE_ENV !== 'production') {
    await import('dotenv/config');
  }

  process.exitCode = await runCli(hideBin(process.argv));
}

main().catch((error: unknown) => {
  process.stderr.write(
    `Fatal: ${error instanceof Error ? error.message : String(error)}\n`
  );
  process.exitCode = 1;
});
