export * from './types/sentiment';
export * from './types/errors';
export * from './types/fetcher';
export * from './types/config';
export * from './types/dashboard';

export { loadConfig, DEFAULT_WEIGHTS } from './config/config';
export { TextNormalizer } from './services/text-normalizer';
export { SentimentScorer, DEFAULT_TRADING_LEXICON } from './services/sentiment-scorer';
export type { TradingLexicon, ScoreBreakdown, TermMatch } from './services/sentiment-scorer';
export { SentimentAggregator, DEFAULT_NEUTRALITY_BAND } from './services/sentiment-aggregator';
export { TrendBuilder } from './services/trend-builder';
export { DashboardView } from './services/dashboard-view';
export { DashboardRequests } from './services/dashboard-request';
export type { DashboardParams } from './services/dashboard-request';
export { DashboardSession } from './services/dashboard-session';
export { SentimentPipeline } from './services/sentiment-pipeline';
export type { PipelineDependencies } from './services/sentiment-pipeline';
export { SourceAdapterFactory } from './services/source-adapter-factory';
export { CompanyDirectory } from './services/company-directory';
export {
  InMemorySnapshotStore,
  DEFAULT_MEMORY_ENTRIES,
  DynamoSnapshotStore,
  snapshotKey
} from './repositories/snapshot';
export type { SnapshotStore } from './repositories/snapshot';
export * from './adapters/sources';
export { HttpClient } from './adapters/http-client';
export { getSentiment } from './handlers/sentiment';
