/**
 * Error taxonomy for the sentiment pipeline
 *
 * FetchError degrades a single source, NoDataError surfaces an empty state,
 * ConfigError halts before any fetch is attempted.
 */

import type { SourceCoverage } from './dashboard';
import { SourceId } from './sentiment';

export type FetchFailureReason =
  | 'NETWORK'
  | 'AUTH'
  | 'RATE_LIMITED'
  | 'INVALID_RESPONSE'
  | 'TIMEOUT'
  | 'CANCELLED';

/**
 * Error thrown by a source fetcher
 */
export class FetchError extends Error {
  constructor(
    message: string,
    public readonly source: SourceId,
    public readonly reason: FetchFailureReason,
    public readonly statusCode?: number,
    public readonly retryable: boolean = false,
    public readonly retryAfterMs?: number,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Error thrown when every source came back empty for a ticker and range
 */
export class NoDataError extends Error {
  constructor(
    public readonly ticker: string,
    public readonly rangeStart: string,
    public readonly rangeEnd: string,
    /** Per-source fetch outcome */
    public readonly coverage: SourceCoverage[] = []
  ) {
    super(`No sentiment data available for ${ticker} between ${rangeStart} and ${rangeEnd}`);
    this.name = 'NoDataError';
  }
}

export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Error thrown when configuration is missing a credential or holds an invalid value
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Error thrown when dashboard request parameters cannot be interpreted
 */
export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
