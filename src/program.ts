/**
 * @module Program
 * The `curlparse` command-line program: argument handling and the two
 * subcommands. Kept separate from the executable so it can run in-process.
 */

import * as fs from 'fs';
import * as path from 'path';
import { type Readable, Writable } from 'stream';
import { pipeline } from 'stream/promises';
import yargs from 'yargs';
import type { CommandModule } from 'yargs';
import {
  CurlCommandProcessor,
  type ProcessingSummary,
} from './lib/CurlCommandProcessor.js';
import { CurlCommandSplitter } from './lib/CurlCommandSplitter.js';
import { type CurlparseConfig, loadConfig } from './lib/config.js';
import { parseCurlCommandDetailed } from './lib/curlParser.js';
import { CurlparseError } from './lib/errors.js';
import { ENTRY_KINDS, type EntryKind, isEntryKind } from './lib/types.js';

export interface CliIO {
  stdout(message: string): void;
  stderr(message: string): void;
  stdin(): Readable;
  cwd(): string;
  env: NodeJS.ProcessEnv;
}

interface OutputOptions {
  part?: string;
  strict: boolean;
  pretty: boolean;
}

export interface ParseCommandOptions extends OutputOptions {
  command: string;
}

export interface BatchCommandOptions extends OutputOptions {
  file?: string;
}

export function createDefaultIO(): CliIO {
  return {
    stdout: (message) => {
      process.stdout.write(message);
    },
    stderr: (message) => {
      process.stderr.write(message);
    },
    stdin: () => process.stdin,
    cwd: () => process.cwd(),
    env: process.env,
  };
}

function outputBuilder(config: CurlparseConfig) {
  return {
    part: {
      type: 'string' as const,
      alias: 'p',
      choices: ENTRY_KINDS,
      describe: 'Only print entries of this kind',
    },
    strict: {
      type: 'boolean' as const,
      default: config.strict,
      describe: 'Fail on unrecognized trailing input',
    },
    pretty: {
      type: 'boolean' as const,
      default: config.pretty,
      describe: 'Pretty-print JSON output',
    },
  };
}

function selectedPart(options: OutputOptions): EntryKind | undefined {
  return isEntryKind(options.part) ? options.part : undefined;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Parses one command and prints each entry as a JSON line.
 * @returns The process exit code.
 */
export function runParse(options: ParseCommandOptions, io: CliIO): number {
  const part = selectedPart(options);

  try {
    const { entries, remainder } = parseCurlCommandDetailed(options.command, {
      strict: options.strict,
    });

    for (const entry of entries) {
      if (part === undefined || entry.kind === part) {
        const json = options.pretty
          ? JSON.stringify(entry, null, 2)
          : JSON.stringify(entry);
        io.stdout(`${json}\n`);
      }
    }
    if (remainder !== '') {
      io.stderr(`[TRAILING INPUT] ${remainder}\n`);
    }
    return 0;
  } catch (error) {
    if (error instanceof CurlparseError) {
      io.stderr(`Error: ${error.message}\n`);
      return 1;
    }
    throw error;
  }
}

/**
 * Streams a file (or stdin) of curl commands through the splitter and the
 * processor to stdout.
 * @returns The process exit code: 1 if the input was unusable or any
 * command failed to parse.
 */
export async function runBatch(
  options: BatchCommandOptions,
  io: CliIO
): Promise<number> {
  let input: Readable;

  if (options.file) {
    const filePath = path.resolve(io.cwd(), options.file);
    if (!fs.existsSync(filePath)) {
      io.stderr(`Error: File not found: ${filePath}\n`);
      return 1;
    }
    if (fs.statSync(filePath).isDirectory()) {
      io.stderr(`Error: Path is a directory, not a file: ${filePath}\n`);
      return 1;
    }
    input = fs.createReadStream(filePath, { encoding: 'utf8' });
  } else {
    input = io.stdin();
  }

  const processor = new CurlCommandProcessor({
    part: selectedPart(options),
    strict: options.strict,
    pretty: options.pretty,
    stderr: io.stderr,
  });
  let summary: ProcessingSummary = { parsed: 0, failed: 0 };
  processor.on('summary', (result: ProcessingSummary) => {
    summary = result;
  });

  const output = new Writable({
    objectMode: true,
    write(chunk, _encoding, callback) {
      io.stdout(String(chunk));
      callback();
    },
  });

  try {
    await pipeline(input, new CurlCommandSplitter(), processor, output);
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}\n`);
    return 1;
  }

  return summary.failed > 0 ? 1 : 0;
}

/**
 * Runs the program against the given arguments (without the node and script
 * paths).
 * @returns The process exit code.
 */
export async function runCli(
  args: string[],
  io: CliIO = createDefaultIO()
): Promise<number> {
  let config: CurlparseConfig;
  try {
    config = loadConfig(io.env);
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}\n`);
    return 1;
  }

  let exitCode = 0;

  const parseCommand: CommandModule<object, ParseCommandOptions> = {
    command: 'parse <command>',
    describe: 'Parse a single curl command',
    builder: {
      command: {
        type: 'string' as const,
        describe: 'The curl command, as one quoted argument',
        demandOption: true,
      },
      ...outputBuilder(config),
    },
    handler: (argv) => {
      exitCode = runParse(argv, io);
    },
  };

  const batchCommand: CommandModule<object, BatchCommandOptions> = {
    command: 'batch [file]',
    describe: 'Parse every curl command in a file, or in stdin',
    builder: {
      file: {
        type: 'string' as const,
        describe: 'Input file (default: stdin)',
      },
      ...outputBuilder(config),
    },
    handler: async (argv) => {
      exitCode = await runBatch(argv, io);
    },
  };

  try {
    await yargs(args)
      .scriptName('curlparse')
      .command(parseCommand)
      .command(batchCommand)
      .demandCommand(1, 'Specify a command: parse or batch')
      .strict()
      .exitProcess(false)
      .fail((message, error) => {
        io.stderr(`${message || describeError(error)}\n`);
        exitCode = 1;
      })
      .parseAsync();
  } catch (error) {
    io.stderr(`Error: ${describeError(error)}\n`);
    return 1;
  }

  return exitCode;
}
