import { type ParseResult, failure, success } from './lexer.js';
import type { Authority, ParsedUrl, QueryParameter, UrlSchema } from './types.js';

const SCHEMAS = new Map<string, UrlSchema>([
  ['http', 'HTTP'],
  ['https', 'HTTPS'],
  ['ftp', 'FTP'],
  ['sftp', 'SFTP'],
  ['tftp', 'TFTP'],
  ['telnet', 'TELNET'],
  ['ldap', 'LDAP'],
  ['ws', 'WS'],
  ['wss', 'WSS'],
]);

const DEFAULT_SCHEMA: UrlSchema = 'HTTPS';
const SCHEMA_TOKEN = /^[A-Za-z][A-Za-z0-9+.-]*(?=:)/;
const SCHEME_SEPARATOR = '://';
const QUERY_COMPONENT = /^[A-Za-z0-9\-._~%+]*$/;

/** Case-insensitive; unrecognized schemes are `UNKNOWN`, not an error. */
export function classifySchema(token: string): UrlSchema {
  return SCHEMAS.get(token.toLowerCase()) ?? 'UNKNOWN';
}

/** Index of the first of `delimiters` in `input`, or its length. */
function indexOfAny(input: string, delimiters: string): number {
  for (let i = 0; i < input.length; i++) {
    if (delimiters.includes(input[i])) {
      return i;
    }
  }
  return input.length;
}

export function parseSchema(input: string): ParseResult<UrlSchema> {
  const match = SCHEMA_TOKEN.exec(input);
  if (!match) {
    return failure('unexpected-input', 'Expected a scheme', input);
  }
  return success(classifySchema(match[0]), input.slice(match[0].length));
}

function parseSchemeSeparator(input: string): ParseResult<string> {
  if (!input.startsWith(SCHEME_SEPARATOR)) {
    return failure('unexpected-input', `Expected ${SCHEME_SEPARATOR}`, input);
  }
  return success(SCHEME_SEPARATOR, input.slice(SCHEME_SEPARATOR.length));
}

/**
 * Parses `username:password@`. Never fails: without credentials the
 * authority is undefined and nothing is consumed.
 */
export function parseAuthority(
  input: string
): ParseResult<Authority | undefined> {
  const end = indexOfAny(input, '/?#');
  const at = input.lastIndexOf('@', end - 1);
  if (at <= 0) {
    return success(undefined, input);
  }

  const userinfo = input.slice(0, at);
  const colon = userinfo.indexOf(':');
  if (colon <= 0) {
    return success(undefined, input);
  }

  return success(
    { username: userinfo.slice(0, colon), password: userinfo.slice(colon + 1) },
    input.slice(at + 1)
  );
}

export function parseHost(input: string): ParseResult<string> {
  const end = indexOfAny(input, '/?#');
  if (end === 0) {
    return failure('missing-host', 'Expected a host', input);
  }
  return success(input.slice(0, end), input.slice(end));
}

export function parsePath(input: string): ParseResult<string> {
  const body = input.startsWith('/') ? input.slice(1) : input;
  const end = indexOfAny(body, '?#');
  return success(body.slice(0, end), body.slice(end));
}

/**
 * Parses `?k=v&k2=v2`. Order and duplicate keys are preserved. Never fails.
 *
 * Keys and values are limited to URL-parameter-safe characters; the pairs end
 * at the first segment outside that set. Segments with an empty key are
 * skipped. Everything from `#` on is left for the fragment.
 */
export function parseQueries(
  input: string
): ParseResult<readonly QueryParameter[]> {
  if (!input.startsWith('?')) {
    return success([], input);
  }

  const body = input.slice(1);
  const end = indexOfAny(body, '#');
  const queries: QueryParameter[] = [];

  for (const segment of body.slice(0, end).split('&')) {
    const eq = segment.indexOf('=');
    const key = eq === -1 ? segment : segment.slice(0, eq);
    const value = eq === -1 ? '' : segment.slice(eq + 1);
    if (!QUERY_COMPONENT.test(key) || !QUERY_COMPONENT.test(value)) {
      break;
    }
    if (key !== '') {
      queries.push({ key, value });
    }
  }

  return success(queries, body.slice(end));
}

export function parseFragment(input: string): ParseResult<string | undefined> {
  if (!input.startsWith('#')) {
    return success(undefined, input);
  }
  return success(input.slice(1), '');
}

/**
 * Decomposes a URL strictly left to right:
 * schema, `://`, authority?, host, path, queries?, fragment?.
 *
 * Without a parseable `scheme://` prefix the schema is HTTPS and the host
 * starts at the beginning of the input.
 */
export function parseUrl(input: string): ParseResult<ParsedUrl> {
  let rest = input;
  let schema = DEFAULT_SCHEMA;

  const schemaResult = parseSchema(rest);
  if (schemaResult.ok) {
    const separator = parseSchemeSeparator(schemaResult.rest);
    if (separator.ok) {
      schema = schemaResult.value;
      rest = separator.rest;
    }
  }

  const authority = parseAuthority(rest);
  if (!authority.ok) {
    return authority;
  }

  const host = parseHost(authority.rest);
  if (!host.ok) {
    return host;
  }

  const path = parsePath(host.rest);
  if (!path.ok) {
    return path;
  }

  const queries = parseQueries(path.rest);
  if (!queries.ok) {
    return queries;
  }

  const fragment = parseFragment(queries.rest);
  if (!fragment.ok) {
    return fragment;
  }

  return success(
    {
      schema,
      ...(authority.value ? { authority: authority.value } : {}),
      host: host.value,
      path: path.value,
      queries: queries.value,
      ...(fragment.value !== undefined ? { fragment: fragment.value } : {}),
    },
    fragment.rest
  );
}
