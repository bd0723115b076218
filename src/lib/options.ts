import {
  type ParseResult,
  type Parser,
  alt,
  failure,
  many,
  parseArgument,
  parseQuotedData,
  skipLineContinuation,
  success,
} from './lexer.js';
import type {
  DataEntry,
  FlagEntry,
  HeaderEntry,
  MethodEntry,
  OptionEntry,
} from './types.js';

// '-', one character that is not whitespace or a quote, then the name.
const FLAG_IDENTIFIER = /^-[^\s'"][A-Za-z0-9-]*/;

/**
 * Builds the parser for an option that takes a value:
 * (line continuation)? whitespace* tag whitespace+ argument.
 *
 * Empty values are rejected rather than represented.
 */
function valuedOption<E extends OptionEntry>(
  tags: readonly string[],
  build: (value: string) => E
): Parser<E> {
  return (input) => {
    const start = skipLineContinuation(input).trimStart();
    const tag = tags.find(
      (candidate) =>
        start.startsWith(candidate) && /^\s/.test(start.slice(candidate.length))
    );
    if (tag === undefined) {
      return failure('unexpected-input', `Expected ${tags.join(' or ')}`, input);
    }

    const argument = parseArgument(start.slice(tag.length));
    if (!argument.ok) {
      return argument;
    }
    if (argument.value === '') {
      return failure('empty-value', `Empty value for ${tag}`, input);
    }
    return success(build(argument.value), argument.rest);
  };
}

export const parseMethod: Parser<MethodEntry> = valuedOption(['-X'], (value) => ({
  kind: 'method',
  flag: '-X',
  value,
}));

export const parseHeader: Parser<HeaderEntry> = valuedOption(['-H'], (value) => ({
  kind: 'header',
  flag: '-H',
  value,
}));

export const parseData: Parser<DataEntry> = valuedOption(
  ['-d', '--data'],
  (value) => ({ kind: 'data', flag: '-d', value })
);

/**
 * Parses a bare flag such as `-v` or `--insecure`.
 *
 * A flag never takes a value, so a candidate followed by quoted data (closed
 * or not) is rejected: that text belongs to a valued option.
 */
export function parseFlag(input: string): ParseResult<FlagEntry> {
  const start = skipLineContinuation(input).trimStart();
  const match = FLAG_IDENTIFIER.exec(start);
  if (!match) {
    return failure('unexpected-input', 'Expected a flag', input);
  }

  const identifier = match[0];
  const after = start.slice(identifier.length);
  if (after !== '' && !/^[\s\\]/.test(after)) {
    return failure('unexpected-input', `Malformed flag near ${identifier}`, input);
  }
  const value = parseQuotedData(after);
  if (value.ok || value.failure.kind === 'unterminated-quote') {
    return failure(
      'flag-absorbs-value',
      `${identifier} is followed by a value it does not take`,
      input
    );
  }

  return success({ kind: 'flag', identifier }, after.trimStart());
}

/** Method, then Header, then Data, then Flag; the first match wins. */
export const parseOption: Parser<OptionEntry> = alt<OptionEntry>(
  parseMethod,
  parseHeader,
  parseData,
  parseFlag
);

export const parseMethods = many(parseMethod);
export const parseHeaders = many(parseHeader);
export const parseDatas = many(parseData);
export const parseFlags = many(parseFlag);
export const parseOptions = many(parseOption);
