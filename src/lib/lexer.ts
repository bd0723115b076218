/**
 * @module lexer
 * Parsing primitives shared by the option and URL parsers.
 *
 * Every parser is a plain function over the remaining input. It either
 * consumes a prefix and returns what is left in `rest`, or fails without
 * consuming anything.
 */

export type ParseFailureKind =
  | 'unexpected-input'
  | 'unterminated-quote'
  | 'empty-value'
  | 'flag-absorbs-value'
  | 'missing-host';

export interface ParseFailure {
  kind: ParseFailureKind;
  message: string;
  /** The input the failing parser was given. */
  input: string;
}

export type ParseResult<T> =
  | { ok: true; value: T; rest: string }
  | { ok: false; failure: ParseFailure };

export type Parser<T> = (input: string) => ParseResult<T>;

export interface Repetition<T> {
  value: T[];
  rest: string;
  /** The failure that ended the repetition, if any input was left. */
  stall?: ParseFailure;
}

// Bare words never start with '-' so they cannot swallow the next option.
const BARE_WORD = /^[^\s'"\\-][^\s'"\\]*/;
const LINE_CONTINUATION = /^\s*\\\s*/;

export function success<T>(value: T, rest: string): ParseResult<T> {
  return { ok: true, value, rest };
}

export function failure<T>(
  kind: ParseFailureKind,
  message: string,
  input: string
): ParseResult<T> {
  return { ok: false, failure: { kind, message, input } };
}

/**
 * Ordered alternation: the first parser that succeeds wins.
 * On total failure the most specific failure is reported, preferring
 * anything over a plain `unexpected-input`.
 */
export function alt<T>(...parsers: Parser<T>[]): Parser<T> {
  return (input) => {
    let reported: ParseResult<T> | undefined;
    for (const parser of parsers) {
      const result = parser(input);
      if (result.ok) {
        return result;
      }
      if (!reported || (!reported.ok && reported.failure.kind === 'unexpected-input')) {
        reported = result;
      }
    }
    return reported ?? failure('unexpected-input', 'No parser to try', input);
  };
}

/**
 * Greedy repetition. Never fails; stops at the first failure or at a match
 * that consumed nothing.
 */
export function many<T>(parser: Parser<T>): (input: string) => Repetition<T> {
  return (input) => {
    const value: T[] = [];
    let rest = input;

    while (rest.length > 0) {
      const result = parser(rest);
      if (!result.ok) {
        return { value, rest, stall: result.failure };
      }
      if (result.rest.length === rest.length) {
        break;
      }
      value.push(result.value);
      rest = result.rest;
    }

    return { value, rest };
  };
}

function parseDelimited(input: string, quote: '"' | "'"): ParseResult<string> {
  const trimmed = input.trimStart();
  if (!trimmed.startsWith(quote)) {
    return failure('unexpected-input', `Expected ${quote}`, input);
  }

  const close = trimmed.indexOf(quote, 1);
  if (close === -1) {
    return failure('unterminated-quote', `Missing closing ${quote}`, input);
  }

  return success(trimmed.slice(1, close), trimmed.slice(close + 1).trimStart());
}

/**
 * Parses `"content"`, skipping whitespace on both sides.
 * Backslashes inside the quotes are literal.
 */
export function parseDoubleQuoted(input: string): ParseResult<string> {
  return parseDelimited(input, '"');
}

/** Parses `'content'`, skipping whitespace on both sides. */
export function parseSingleQuoted(input: string): ParseResult<string> {
  return parseDelimited(input, "'");
}

/** Double quotes are tried first, then single quotes. */
export const parseQuotedData: Parser<string> = alt(
  parseDoubleQuoted,
  parseSingleQuoted
);

export function parseBareWord(input: string): ParseResult<string> {
  const trimmed = input.trimStart();
  const match = BARE_WORD.exec(trimmed);
  if (!match) {
    return failure('unexpected-input', 'Expected a value', input);
  }
  return success(match[0], trimmed.slice(match[0].length).trimStart());
}

/**
 * A command-line argument: quoted data, or an unquoted word.
 * An unclosed quote is an error and is not retried as a word.
 */
export function parseArgument(input: string): ParseResult<string> {
  const quoted = parseQuotedData(input);
  if (quoted.ok || quoted.failure.kind === 'unterminated-quote') {
    return quoted;
  }
  return parseBareWord(input);
}

/**
 * Matches a line-continuation marker: optional whitespace, one backslash,
 * optional whitespace (the newline is part of the trailing whitespace).
 */
export function parseLineContinuation(input: string): ParseResult<string> {
  const match = LINE_CONTINUATION.exec(input);
  if (!match) {
    return failure('unexpected-input', 'Expected a line continuation', input);
  }
  return success(match[0], input.slice(match[0].length));
}

/** Drops every leading line continuation, blank continued lines included. */
export function skipLineContinuation(input: string): string {
  let rest = input;
  let result = parseLineContinuation(rest);
  while (result.ok) {
    rest = result.rest;
    result = parseLineContinuation(rest);
  }
  return rest;
}
