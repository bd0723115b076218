import { describe, expect, it } from 'vitest';
import {
  alt,
  many,
  parseArgument,
  parseBareWord,
  parseDoubleQuoted,
  parseLineContinuation,
  parseQuotedData,
  parseSingleQuoted,
  skipLineContinuation,
} from '../src/lib/lexer.js';

describe('parseQuotedData', () => {
  it('should accept both quote styles', () => {
    expect(parseQuotedData('"abc"')).toEqual({ ok: true, value: 'abc', rest: '' });
    expect(parseQuotedData("'abc'")).toEqual({ ok: true, value: 'abc', rest: '' });
  });

  it('should fail on an unclosed quote', () => {
    const double = parseQuotedData('"abc');
    expect(double.ok).toBe(false);
    if (!double.ok) {
      expect(double.failure.kind).toBe('unterminated-quote');
    }

    const single = parseQuotedData("'abc");
    expect(single.ok).toBe(false);
    if (!single.ok) {
      expect(single.failure.kind).toBe('unterminated-quote');
    }
  });

  it('should try double quotes before single quotes', () => {
    expect(parseQuotedData(`"it's" 'x'`)).toEqual({
      ok: true,
      value: "it's",
      rest: "'x'",
    });
    expect(parseQuotedData(`'say "hi"'`)).toEqual({
      ok: true,
      value: 'say "hi"',
      rest: '',
    });
  });

  it('should fail on unquoted input', () => {
    const result = parseQuotedData('abc');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('unexpected-input');
    }
  });
});

describe('parseDoubleQuoted', () => {
  it('should skip whitespace around the quoted content', () => {
    expect(parseDoubleQuoted('  "a b"  -v')).toEqual({
      ok: true,
      value: 'a b',
      rest: '-v',
    });
  });

  it('should treat backslashes as literal content', () => {
    // The first closing quote ends the content: `"a\"b"` yields `a\`.
    expect(parseDoubleQuoted('"a\\"b"')).toEqual({
      ok: true,
      value: 'a\\',
      rest: 'b"',
    });
  });

  it('should keep newlines inside the quotes', () => {
    expect(parseDoubleQuoted('"line1\nline2"')).toEqual({
      ok: true,
      value: 'line1\nline2',
      rest: '',
    });
  });

  it('should not accept single quotes', () => {
    expect(parseDoubleQuoted("'abc'").ok).toBe(false);
  });
});

describe('parseSingleQuoted', () => {
  it('should allow an empty value', () => {
    expect(parseSingleQuoted("'' -v")).toEqual({ ok: true, value: '', rest: '-v' });
  });
});

describe('parseLineContinuation', () => {
  it('should consume the backslash and the following newline', () => {
    expect(parseLineContinuation(' \\\n  -X')).toEqual({
      ok: true,
      value: ' \\\n  ',
      rest: '-X',
    });
  });

  it('should not require a newline', () => {
    expect(parseLineContinuation('\\ -v')).toEqual({
      ok: true,
      value: '\\ ',
      rest: '-v',
    });
  });

  it('should fail without a backslash', () => {
    expect(parseLineContinuation('  -v').ok).toBe(false);
  });
});

describe('skipLineContinuation', () => {
  it('should drop consecutive continuation markers', () => {
    expect(skipLineContinuation(' \\\n  \\\n\\\n  -v')).toBe('-v');
  });

  it('should leave input without a marker untouched', () => {
    expect(skipLineContinuation('  -v')).toBe('  -v');
  });
});

describe('parseArgument', () => {
  it('should accept an unquoted word', () => {
    expect(parseArgument(' GET -H x')).toEqual({ ok: true, value: 'GET', rest: '-H x' });
  });

  it('should not take an option as a value', () => {
    expect(parseBareWord('-v').ok).toBe(false);
    expect(parseArgument('-v').ok).toBe(false);
  });

  it('should not retry an unclosed quote as a word', () => {
    const result = parseArgument('"abc def');
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('unterminated-quote');
    }
  });
});

describe('combinators', () => {
  it('many should collect matches in order and report the stall', () => {
    const result = many(parseQuotedData)(`'a' "b" c`);
    expect(result.value).toEqual(['a', 'b']);
    expect(result.rest).toBe('c');
    expect(result.stall?.kind).toBe('unexpected-input');
  });

  it('many should end without a stall when the input is used up', () => {
    const result = many(parseQuotedData)(`'a' 'b'`);
    expect(result).toEqual({ value: ['a', 'b'], rest: '' });
  });

  it('alt should report the most specific failure', () => {
    const result = alt(parseDoubleQuoted, parseSingleQuoted)("'abc");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.failure.kind).toBe('unterminated-quote');
    }
  });
});
