export type CurlparseErrorCode =
  | 'NOT_A_CURL_COMMAND'
  | 'MISSING_URL'
  | 'MALFORMED_QUOTED_DATA'
  | 'UNCONSUMED_INPUT'
  | 'INVALID_CONFIG';

/**
 * Base error class for everything this package throws.
 * Carries a stable code next to the human-readable message.
 */
export class CurlparseError extends Error {
  constructor(
    public readonly code: CurlparseErrorCode,
    message: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'CurlparseError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

export class NotACurlCommandError extends CurlparseError {
  constructor() {
    super('NOT_A_CURL_COMMAND', 'Not a curl command');
    this.name = 'NotACurlCommandError';
  }
}

export class MissingUrlError extends CurlparseError {
  constructor(reason: string, options?: ErrorOptions) {
    super('MISSING_URL', `No target URL found: ${reason}`, options);
    this.name = 'MissingUrlError';
  }
}

export class MalformedQuotedDataError extends CurlparseError {
  constructor(input: string) {
    super('MALFORMED_QUOTED_DATA', `Unterminated quote in: ${input}`);
    this.name = 'MalformedQuotedDataError';
  }
}

export class UnconsumedInputError extends CurlparseError {
  constructor(
    public readonly remainder: string,
    options?: ErrorOptions
  ) {
    super('UNCONSUMED_INPUT', `Unrecognized input: ${remainder}`, options);
    this.name = 'UnconsumedInputError';
  }
}

export class ConfigError extends CurlparseError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'ConfigError';
  }
}
