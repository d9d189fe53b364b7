/**
 * Sentiment Data Types for ticker mention aggregation
 */

export type SourceId = 'NEWS' | 'REDDIT' | 'INSTITUTIONAL' | 'SOCIAL';

export const SOURCE_IDS: readonly SourceId[] = ['NEWS', 'REDDIT', 'INSTITUTIONAL', 'SOCIAL'];

/**
 * Display labels used by the dashboard widgets
 */
export const SOURCE_LABELS: Record<SourceId, string> = {
  NEWS: 'Financial News',
  REDDIT: 'WallStreetBets',
  INSTITUTIONAL: 'Institutional',
  SOCIAL: 'Social Media'
};

export interface RawItem {
  readonly itemId: string;
  readonly source: SourceId;
  readonly ticker: string;
  /** ISO-8601 publication time */
  readonly timestamp: string;
  readonly text: string;
  readonly url?: string;
  readonly author?: string;
  readonly publisher?: string;
}

export interface ScoredItem extends RawItem {
  readonly normalizedText: string;
  /** Score in [-1, 1] */
  readonly sentiment: number;
}

export interface SourceSummary {
  source: SourceId;
  meanSentiment: number;
  itemCount: number;
  positiveRatio: number;
  negativeRatio: number;
  neutralRatio: number;
}

/**
 * Non-negative importance per source. Weights are normalized at combination time.
 */
export type WeightConfig = Record<SourceId, number>;

export interface OverallSentiment {
  ticker: string;
  weightedScore: number;
  perSource: Record<SourceId, SourceSummary>;
  asOf: string;
  /** Set when no weighted source produced any item; weightedScore is then 0 */
  noData: boolean;
}

export interface TrendPoint {
  windowStart: string;
  windowEnd: string;
  aggregateScore: number;
  itemCount: number;
}

export type TrendSeries = TrendPoint[];

export interface SentimentDistribution {
  positive: number;
  neutral: number;
  negative: number;
  total: number;
}
