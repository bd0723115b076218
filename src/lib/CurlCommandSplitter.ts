import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

/**
 * A Transform stream that splits text into individual curl commands,
 * one command per emitted chunk.
 *
 * A newline ends the current command unless it is inside quotes or the line
 * ended with a continuation backslash. Lines starting with `#` between
 * commands are comments and are dropped.
 *
 * @example
 * // Input: "curl 'a.com' \\\n  -v\n# note\ncurl 'b.com'\n"
 * // Output (chunks): "curl 'a.com' \\\n  -v", "curl 'b.com'"
 */
export class CurlCommandSplitter extends Transform {
  private currentCommand = '';
  private quote: '"' | "'" | null = null;
  private continued = false;
  private inComment = false;

  constructor() {
    super({ readableObjectMode: true });
  }

  /**
   * Processes each chunk character by character. State carries over between
   * chunks, so a command may be split anywhere.
   */
  _transform(
    chunk: Buffer | string,
    encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const str = chunk.toString();

    for (const char of str) {
      if (this.quote) {
        // Inside quotes everything is content, newlines included.
        this.currentCommand += char;
        if (char === this.quote) {
          this.quote = null;
        }
      } else if (this.inComment) {
        if (char === '\n') {
          this.inComment = false;
        }
      } else if (char === '#' && this.currentCommand.trim() === '') {
        this.inComment = true;
      } else if (char === '\n') {
        if (this.continued) {
          this.currentCommand += char;
          this.continued = false;
        } else {
          this.emitCommand();
        }
      } else if (char === '\\') {
        this.currentCommand += char;
        this.continued = true;
      } else if (/\s/.test(char)) {
        // Trailing spaces after a backslash keep the continuation alive.
        this.currentCommand += char;
      } else {
        if (char === '"' || char === "'") {
          this.quote = char;
        }
        this.currentCommand += char;
        this.continued = false;
      }
    }

    callback();
  }

  /**
   * Emits whatever is left when the input ends, even an unclosed quote,
   * so that the parser downstream can report it.
   */
  _flush(callback: TransformCallback): void {
    this.emitCommand();
    callback();
  }

  private emitCommand(): void {
    const command = this.currentCommand.trim();
    if (command !== '') {
      this.push(command);
    }
    this.currentCommand = '';
    this.quote = null;
    this.continued = false;
  }
}
