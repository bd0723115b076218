const CURL_COMMAND = 'curl';

/**
 * Whether the input starts with `curl`, ignoring case and leading whitespace.
 */
export function isCurlCommand(input: string): boolean {
  return input.trimStart().toLowerCase().startsWith(CURL_COMMAND);
}

/**
 * Removes the `curl` token from an input that is already left-trimmed.
 * Only meaningful after `isCurlCommand` returned true.
 */
export function stripCommandHeader(input: string): string {
  return input.slice(CURL_COMMAND.length);
}
