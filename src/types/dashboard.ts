/**
 * Dashboard request and snapshot types
 */

import { FetchFailureReason } from './errors';
import {
  OverallSentiment,
  SentimentDistribution,
  SourceId,
  TrendSeries
} from './sentiment';

export interface DashboardRequest {
  ticker: string;
  rangeStart: string;
  rangeEnd: string;
  /** Overrides the configured trend window */
  trendWindowMs?: number;
}

export type CoverageStatus = 'OK' | 'EMPTY' | 'FAILED' | 'DISABLED';

export interface SourceCoverage {
  source: SourceId;
  status: CoverageStatus;
  itemCount: number;
  failureReason?: FetchFailureReason;
  message?: string;
}

export type GaugeBand = 'BEARISH' | 'NEUTRAL' | 'BULLISH';

export interface Gauge {
  label: string;
  value: number;
  band: GaugeBand;
}

export interface TermCount {
  term: string;
  count: number;
}

export interface DashboardSnapshot {
  snapshotId: string;
  ticker: string;
  company: string;
  rangeStart: string;
  rangeEnd: string;
  trendWindowMs: number;
  overall: OverallSentiment;
  trend: TrendSeries;
  sourceTrends: Record<SourceId, TrendSeries>;
  distribution: SentimentDistribution;
  coverage: SourceCoverage[];
  gauges: {
    overall: Gauge;
    perSource: Gauge[];
  };
  topTerms: Record<SourceId, TermCount[]>;
  generatedAt: string;
}
