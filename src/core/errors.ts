/**
 * Custom error types.
 * Enables callers to handle different failure modes appropriately:
 * upstream API failures, bad user input, missing data and programming defects.
 */

export class SecApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string
  ) {
    super(message);
    this.name = 'SecApiError';
  }
}

export class NotFoundError extends SecApiError {
  constructor(url: string, detail: string = '') {
    super(
      `Not found: ${detail || url}`,
      404,
      url
    );
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends SecApiError {
  constructor(url: string) {
    super(
      'SEC API rate limit exceeded. Requests are throttled to the SEC fair access policy; wait a moment and retry.',
      429,
      url
    );
    this.name = 'RateLimitError';
  }
}

export class DataParseError extends Error {
  constructor(message: string, public readonly source: string) {
    super(message);
    this.name = 'DataParseError';
  }
}

export class InvalidTickerError extends Error {
  readonly code = 'INVALID_TICKER';

  constructor(
    public readonly input: string,
    public readonly reason: string,
    public readonly suggestions: string[] = []
  ) {
    super(reason);
    this.name = 'InvalidTickerError';
  }
}

export class CompanyNotFoundError extends Error {
  readonly code = 'COMPANY_NOT_FOUND';

  constructor(
    public readonly ticker: string,
    public readonly suggestions: string[] = []
  ) {
    const msg = suggestions.length > 0
      ? `No SEC registrant found for ticker "${ticker}". Did you mean: ${suggestions.join(', ')}?`
      : `No SEC registrant found for ticker "${ticker}".`;
    super(msg);
    this.name = 'CompanyNotFoundError';
  }
}

export class NoMappedFactsError extends Error {
  readonly code = 'NO_MAPPED_FACTS';

  constructor(public readonly metric: string, detail: string) {
    super(`No usable facts for ${metric}: ${detail}`);
    this.name = 'NoMappedFactsError';
  }
}

/** A core invariant was broken. Indicates a bug, never bad input. */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(`Invariant violated: ${message}`);
    this.name = 'InvariantViolationError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}
