/**
 * Sentiment Pipeline Service - one batch refresh for a ticker and range
 *
 * This service handles:
 * - Fanning out to every enabled source fetcher concurrently
 * - Degrading a failed source to zero items instead of failing the refresh
 * - Normalizing, scoring, aggregating and bucketing the joined items
 * - Assembling and caching the dashboard snapshot
 */

import { randomUUID } from 'crypto';
import { FetchFunction } from '../adapters/http-client';
import { SnapshotStore, snapshotKey } from '../repositories/snapshot';
import { SentimentConfig } from '../types/config';
import { DashboardRequest, DashboardSnapshot } from '../types/dashboard';
import { FetchError, NoDataError } from '../types/errors';
import { FetchWindow, SourceFetcher } from '../types/fetcher';
import { RawItem, SOURCE_IDS } from '../types/sentiment';
import { CompanyDirectory } from './company-directory';
import { DashboardView, SourceOutcome } from './dashboard-view';
import { SentimentAggregator } from './sentiment-aggregator';
import { SentimentScorer } from './sentiment-scorer';
import { SourceAdapterFactory } from './source-adapter-factory';
import { TrendBuilder } from './trend-builder';

/**
 * Collaborators, replaceable in tests
 */
export interface PipelineDependencies {
  /** Defaults to one adapter per enabled source */
  fetchers?: SourceFetcher[];
  fetchImpl?: FetchFunction;
  scorer?: SentimentScorer;
  store?: SnapshotStore;
  now?: () => Date;
}

/**
 * Runs a dashboard refresh against the configured sources
 */
export class SentimentPipeline {
  private readonly fetchers: SourceFetcher[];
  private readonly scorer: SentimentScorer;
  private readonly store?: SnapshotStore;
  private readonly now: () => Date;

  /**
   * @throws ConfigError if an enabled source lacks its credentials
   */
  constructor(
    private readonly config: SentimentConfig,
    deps: PipelineDependencies = {}
  ) {
    this.fetchers = deps.fetchers ?? SourceAdapterFactory.createAdapters(config, deps.fetchImpl);
    this.scorer = deps.scorer ?? new SentimentScorer();
    this.store = deps.store;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Build a dashboard snapshot
   *
   * @throws NoDataError when no weighted source returned items
   * @throws RangeError for an unusable range or trend window
   */
  async run(request: DashboardRequest, signal?: AbortSignal): Promise<DashboardSnapshot> {
    const ticker = request.ticker.toUpperCase();
    const trendWindowMs = request.trendWindowMs ?? this.config.trendWindowMs;
    const key = snapshotKey(ticker, request.rangeStart, request.rangeEnd, trendWindowMs);
    const useCache = this.store !== undefined && this.config.snapshotTtlSeconds > 0;

    if (useCache) {
      const cached = await this.readCache(key);
      if (cached) {
        console.log(`[SentimentPipeline] Serving cached snapshot ${cached.snapshotId} for ${key}`);
        return cached;
      }
    }

    const window: FetchWindow = { ticker, rangeStart: request.rangeStart, rangeEnd: request.rangeEnd };
    const { items, outcomes } = await this.fetchAll(window, signal);
    const coverage = DashboardView.buildCoverage(outcomes);

    const scored = this.scorer.scoreItems(items);
    const generatedAt = this.now().toISOString();
    const overall = SentimentAggregator.aggregate(scored, this.config.weights, {
      ticker,
      neutralityBand: this.config.neutralityBand,
      asOf: generatedAt
    });

    if (overall.noData) {
      throw new NoDataError(ticker, request.rangeStart, request.rangeEnd, coverage);
    }

    const snapshot: DashboardSnapshot = {
      snapshotId: randomUUID(),
      ticker,
      company: CompanyDirectory.getCompanyName(ticker),
      rangeStart: request.rangeStart,
      rangeEnd: request.rangeEnd,
      trendWindowMs,
      overall,
      trend: TrendBuilder.buildTrend(scored, trendWindowMs, request.rangeStart, request.rangeEnd),
      sourceTrends: TrendBuilder.buildSourceTrends(scored, trendWindowMs, request.rangeStart, request.rangeEnd),
      distribution: SentimentAggregator.distribution(scored, this.config.neutralityBand),
      coverage,
      gauges: DashboardView.buildGauges(overall),
      topTerms: DashboardView.topTermsBySource(scored),
      generatedAt
    };

    // a cancelled refresh may be missing sources, so it is not cached
    if (useCache && !signal?.aborted) {
      await this.writeCache(key, snapshot);
    }

    return snapshot;
  }

  /**
   * Cache lookup; a store failure counts as a miss
   */
  private async readCache(key: string): Promise<DashboardSnapshot | null> {
    if (!this.store) {
      return null;
    }
    try {
      return await this.store.get(key);
    } catch (error) {
      console.warn(`[SentimentPipeline] Snapshot cache read failed for ${key}`, {
        message: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  /**
   * Cache write; a store failure leaves the snapshot uncached
   */
  private async writeCache(key: string, snapshot: DashboardSnapshot): Promise<void> {
    if (!this.store) {
      return;
    }
    try {
      await this.store.put(key, snapshot, this.config.snapshotTtlSeconds);
    } catch (error) {
      console.warn(`[SentimentPipeline] Snapshot cache write failed for ${key}`, {
        message: error instanceof Error ? error.message : String(error)
      });
    }
  }

  /**
   * Fetch every source concurrently and join the results
   *
   * A FetchError marks its source FAILED; any other error propagates.
   */
  private async fetchAll(
    window: FetchWindow,
    signal?: AbortSignal
  ): Promise<{ items: RawItem[]; outcomes: SourceOutcome[] }> {
    const settled = await Promise.allSettled(
      this.fetchers.map(fetcher => fetcher.fetch(window, signal))
    );

    const items: RawItem[] = [];
    const outcomes: SourceOutcome[] = [];

    settled.forEach((result, index) => {
      const source = this.fetchers[index].source;
      if (result.status === 'fulfilled') {
        items.push(...result.value);
        outcomes.push({ source, status: 'FETCHED', itemCount: result.value.length });
        return;
      }

      const error: unknown = result.reason;
      if (!(error instanceof FetchError)) {
        throw error;
      }
      console.warn(`[SentimentPipeline] ${source} fetch failed for ${window.ticker}`, {
        reason: error.reason,
        statusCode: error.statusCode,
        message: error.message
      });
      outcomes.push({ source, status: 'FAILED', reason: error.reason, message: error.message });
    });

    for (const source of SOURCE_IDS) {
      if (!outcomes.some(o => o.source === source)) {
        outcomes.push({ source, status: 'DISABLED' });
      }
    }

    return { items, outcomes };
  }
}
