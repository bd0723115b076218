import { isCurlCommand, stripCommandHeader } from './command.js';
import {
  MalformedQuotedDataError,
  MissingUrlError,
  NotACurlCommandError,
  UnconsumedInputError,
} from './errors.js';
import {
  type ParseFailure,
  type ParseResult,
  parseArgument,
  skipLineContinuation,
  success,
} from './lexer.js';
import { parseOptions } from './options.js';
import type { ParsedEntry, UrlEntry } from './types.js';
import { parseUrl } from './urlParser.js';

export interface ParseCurlOptions {
  /** Throw `UnconsumedInputError` instead of dropping unrecognized trailing text. */
  strict?: boolean;
}

export interface CurlParseResult {
  /** The URL first, then the options in source order. */
  entries: ParsedEntry[];
  /** Text left after the last recognized option; empty when all was consumed. */
  remainder: string;
}

function errorCause(stall: ParseFailure): ErrorOptions | undefined {
  return stall.kind === 'unterminated-quote'
    ? { cause: new MalformedQuotedDataError(stall.input.trim()) }
    : undefined;
}

/**
 * Extracts the first argument of the command body and decomposes it as a URL.
 */
export function parseUrlEntry(input: string): ParseResult<UrlEntry> {
  const argument = parseArgument(skipLineContinuation(input));
  if (!argument.ok) {
    return argument;
  }

  const url = parseUrl(argument.value);
  if (!url.ok) {
    return url;
  }

  return success({ kind: 'url', raw: argument.value, url: url.value }, argument.rest);
}

/**
 * Parses a curl command line into its URL and options.
 *
 * Parsing stops at the first text that is not a recognized option. That text
 * is returned as `remainder`, or raised when `strict` is set.
 *
 * @throws {NotACurlCommandError} The input does not start with `curl`.
 * @throws {MissingUrlError} No URL follows the `curl` token.
 * @throws {UnconsumedInputError} In strict mode, when text is left over.
 */
export function parseCurlCommandDetailed(
  input: string,
  options: ParseCurlOptions = {}
): CurlParseResult {
  if (!isCurlCommand(input)) {
    throw new NotACurlCommandError();
  }

  const body = stripCommandHeader(input.trimStart());
  // "curly ..." starts with the letters but is another command.
  if (body !== '' && !/^[\s'"\\]/.test(body)) {
    throw new NotACurlCommandError();
  }

  const url = parseUrlEntry(body);
  if (!url.ok) {
    throw new MissingUrlError(url.failure.message, errorCause(url.failure));
  }

  const parsed = parseOptions(url.rest);
  const remainder = skipLineContinuation(parsed.rest).trim();

  if (options.strict && remainder !== '') {
    throw new UnconsumedInputError(
      remainder,
      parsed.stall ? errorCause(parsed.stall) : undefined
    );
  }

  return { entries: [url.value, ...parsed.value], remainder };
}

/**
 * Parses a curl command line into an ordered list of entries, URL first.
 * See {@link parseCurlCommandDetailed} for the failure modes.
 */
export function parseCurlCommand(
  input: string,
  options: ParseCurlOptions = {}
): ParsedEntry[] {
  return parseCurlCommandDetailed(input, options).entries;
}
