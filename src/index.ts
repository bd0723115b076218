/**
 * @module curlparse
 * This is the main library entry point.
 * It exports the curl command parser, its building blocks and the
 * stream processing components.
 */

// --- Library Exports ---
export { isCurlCommand, stripCommandHeader } from './lib/command.js';
export {
  parseCurlCommand,
  parseCurlCommandDetailed,
  parseUrlEntry,
} from './lib/curlParser.js';
export type { CurlParseResult, ParseCurlOptions } from './lib/curlParser.js';
export {
  alt,
  many,
  parseArgument,
  parseBareWord,
  parseDoubleQuoted,
  parseLineContinuation,
  parseQuotedData,
  parseSingleQuoted,
} from './lib/lexer.js';
export type {
  ParseFailure,
  ParseFailureKind,
  ParseResult,
  Parser,
  Repetition,
} from './lib/lexer.js';
export {
  parseData,
  parseDatas,
  parseFlag,
  parseFlags,
  parseHeader,
  parseHeaders,
  parseMethod,
  parseMethods,
  parseOption,
  parseOptions,
} from './lib/options.js';
export { classifySchema, parseUrl } from './lib/urlParser.js';
export {
  ConfigError,
  CurlparseError,
  MalformedQuotedDataError,
  MissingUrlError,
  NotACurlCommandError,
  UnconsumedInputError,
} from './lib/errors.js';
export type { CurlparseErrorCode } from './lib/errors.js';
export { CurlparseEnvSchema, loadConfig } from './lib/config.js';
export type { CurlparseConfig } from './lib/config.js';
export { CurlCommandSplitter } from './lib/CurlCommandSplitter.js';
export { CurlCommandProcessor } from './lib/CurlCommandProcessor.js';
export type {
  CurlCommandProcessorOptions,
  ProcessingSummary,
} from './lib/CurlCommandProcessor.js';
export { ENTRY_KINDS, isEntryKind } from './lib/types.js';
export type {
  Authority,
  DataEntry,
  EntryKind,
  FlagEntry,
  HeaderEntry,
  MethodEntry,
  OptionEntry,
  OutputData,
  ParsedEntry,
  ParsedUrl,
  QueryParameter,
  UrlEntry,
  UrlSchema,
} from './lib/types.js';
