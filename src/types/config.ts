/**
 * Configuration Type Definitions
 */

import { SourceId, WeightConfig } from './sentiment';

export interface SourceCredentials {
  newsApiKey?: string;
  alphaVantageKey?: string;
  redditClientId?: string;
  redditClientSecret?: string;
  redditUserAgent?: string;
}

export interface FetchSettings {
  timeoutMs: number;
  maxRetries: number;
  initialRetryDelayMs: number;
  maxRetryDelayMs: number;
}

export interface SentimentConfig {
  weights: WeightConfig;
  neutralityBand: number;
  /** Trend bucket length in milliseconds */
  trendWindowMs: number;
  defaultLookbackDays: number;
  snapshotTtlSeconds: number;
  credentials: SourceCredentials;
  fetch: FetchSettings;
  /** Sources with a positive weight */
  enabledSources: SourceId[];
}
