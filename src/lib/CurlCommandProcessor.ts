import { Transform } from 'stream';
import type { TransformCallback } from 'stream';
import { parseCurlCommandDetailed } from './curlParser.js';
import { CurlparseError } from './errors.js';
import type { EntryKind, OutputData } from './types.js';

export interface CurlCommandProcessorOptions {
  /** Only keep entries of this kind. */
  part?: EntryKind;
  /** Treat unrecognized trailing text as a failure. */
  strict?: boolean;
  /** Indent the JSON output. */
  pretty?: boolean;
  /** Diagnostic sink, `process.stderr` by default. */
  stderr?: (message: string) => void;
}

export interface ProcessingSummary {
  parsed: number;
  failed: number;
}

/**
 * A Transform stream that receives single curl commands (e.g. from
 * `CurlCommandSplitter`), parses each one and outputs the result as a
 * JSON string.
 *
 * Commands that fail to parse are logged to stderr and skipped; the stream
 * itself only errors on unexpected exceptions. A `summary` event carrying a
 * {@link ProcessingSummary} is emitted once the input has been flushed.
 */
export class CurlCommandProcessor extends Transform {
  private readonly options: CurlCommandProcessorOptions;
  private readonly writeStderr: (message: string) => void;
  private index = 0;
  private summary: ProcessingSummary = { parsed: 0, failed: 0 };

  constructor(options: CurlCommandProcessorOptions = {}) {
    // Takes command strings, outputs JSON strings.
    super({ readableObjectMode: true, writableObjectMode: true });
    this.options = options;
    this.writeStderr =
      options.stderr ?? ((message) => process.stderr.write(message));
  }

  _transform(
    chunk: string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    this.index++;
    const command = chunk.toString();

    try {
      const { entries, remainder } = parseCurlCommandDetailed(command, {
        strict: this.options.strict,
      });
      const { part } = this.options;
      const output: OutputData = {
        index: this.index,
        entries: part ? entries.filter((entry) => entry.kind === part) : entries,
      };

      if (remainder !== '') {
        this.writeStderr(`[TRAILING INPUT] #${this.index}: ${remainder}\n`);
      }
      this.summary.parsed++;
      this.push(`${this.serialize(output)}\n`);
      callback();
    } catch (error) {
      if (error instanceof CurlparseError) {
        this.summary.failed++;
        this.writeStderr(`[PARSE FAILED] #${this.index}: ${error.message}\n`);
        callback();
        return;
      }
      callback(error instanceof Error ? error : new Error(String(error)));
    }
  }

  _flush(callback: TransformCallback): void {
    callback();
    this.emit('summary', { ...this.summary });
  }

  private serialize(output: OutputData): string {
    return this.options.pretty
      ? JSON.stringify(output, null, 2)
      : JSON.stringify(output);
  }
}
