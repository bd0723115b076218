import { Readable } from 'stream';
import { describe, expect, it } from 'vitest';
import { CurlCommandSplitter } from '../src/lib/CurlCommandSplitter.js';

/**
 * Helper function to test the CurlCommandSplitter stream.
 * It creates a Readable stream from an array of chunks,
 * pipes it through the splitter, and collects the output.
 */
function testStreamSplitter(chunks: string[]): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const readable = Readable.from(chunks, { highWaterMark: 1 });

    const splitter = new CurlCommandSplitter();

    const output: string[] = [];

    splitter.on('data', (data) => {
      output.push(String(data));
    });

    splitter.on('end', () => {
      resolve(output);
    });

    splitter.on('error', (err) => {
      reject(err);
    });

    readable.pipe(splitter);
  });
}

describe('CurlCommandSplitter', () => {
  it('should emit a single command', async () => {
    const output = await testStreamSplitter(["curl 'http://a.com' -v\n"]);
    expect(output).toEqual(["curl 'http://a.com' -v"]);
  });

  it('should emit one command per line', async () => {
    const output = await testStreamSplitter(['curl a.com\ncurl b.com\n']);
    expect(output).toEqual(['curl a.com', 'curl b.com']);
  });

  it('should join continuation lines', async () => {
    const output = await testStreamSplitter([
      "curl 'a.com' \\\n  -v\ncurl 'b.com'",
    ]);
    expect(output).toEqual(["curl 'a.com' \\\n  -v", "curl 'b.com'"]);
  });

  it('should allow spaces after the continuation backslash', async () => {
    const output = await testStreamSplitter(["curl 'a.com' \\  \n  -v\n"]);
    expect(output).toEqual(["curl 'a.com' \\  \n  -v"]);
  });

  it('should keep newlines inside quotes', async () => {
    const output = await testStreamSplitter([
      "curl 'a.com' -d '{\n  \"a\": 1\n}'\n",
    ]);
    expect(output).toEqual(["curl 'a.com' -d '{\n  \"a\": 1\n}'"]);
  });

  it('should handle commands split across multiple chunks', async () => {
    const output = await testStreamSplitter([
      "curl 'a.c",
      "om' \\",
      '\n -v\ncu',
      'rl b.com',
    ]);
    expect(output).toEqual(["curl 'a.com' \\\n -v", 'curl b.com']);
  });

  it('should skip comment lines', async () => {
    const output = await testStreamSplitter([
      '# list users\ncurl a.com\n  # indented\ncurl b.com',
    ]);
    expect(output).toEqual(['curl a.com', 'curl b.com']);
  });

  it('should not treat a # inside a command as a comment', async () => {
    const output = await testStreamSplitter(['curl http://a.com/#frag\n']);
    expect(output).toEqual(['curl http://a.com/#frag']);
  });

  it('should ignore blank lines', async () => {
    const output = await testStreamSplitter(['\n\n  \ncurl a.com\n\n']);
    expect(output).toEqual(['curl a.com']);
  });

  it('should handle CRLF line endings', async () => {
    const output = await testStreamSplitter(['curl a.com\r\ncurl b.com\r\n']);
    expect(output).toEqual(['curl a.com', 'curl b.com']);
  });

  it('should emit an unclosed quote at end of stream', async () => {
    const output = await testStreamSplitter(["curl 'a.com"]);
    expect(output).toEqual(["curl 'a.com"]);
  });
});
