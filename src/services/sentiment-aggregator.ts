/**
 * Sentiment Aggregator Service - combines scored items across sources
 *
 * This service handles:
 * - Per-source summary statistics (mean, count, polarity ratios)
 * - Weighted averaging of per-source means into one overall score
 * - Excluding empty sources from the weight denominator
 * - Flagging the no-data condition instead of reporting a confident neutral
 */

import { NoDataError } from '../types/errors';
import {
  OverallSentiment,
  ScoredItem,
  SentimentDistribution,
  SOURCE_IDS,
  SourceId,
  SourceSummary,
  WeightConfig
} from '../types/sentiment';
import { clampScore } from './sentiment-scorer';

export const DEFAULT_NEUTRALITY_BAND = 0.1;

/**
 * Aggregation options
 */
export interface AggregationOptions {
  ticker?: string;
  /** Scores within [-band, band] count as neutral (default: 0.1) */
  neutralityBand?: number;
  /** Timestamp reported as asOf (default: now) */
  asOf?: string;
}

/**
 * Details about a source's contribution to the weighted score
 */
export interface SourceContribution {
  source: SourceId;
  meanSentiment: number;
  weight: number;
  /** Share of the total effective weight, 0 for excluded sources */
  normalizedWeight: number;
  included: boolean;
  excludeReason?: string;
}

/**
 * Sentiment Aggregator Service
 */
export const SentimentAggregator = {
  /**
   * Aggregate scored items into an overall weighted sentiment
   *
   * weightedScore = Σ(weight × mean) / Σ(weight) over sources with items.
   * When no weighted source has items the score is 0 and noData is set.
   *
   * @param items - Scored items for a single ticker
   * @param weights - Non-negative source weights; need not sum to 1
   * @param options - Aggregation options
   */
  aggregate(
    items: ScoredItem[],
    weights: WeightConfig,
    options: AggregationOptions = {}
  ): OverallSentiment {
    const band = options.neutralityBand ?? DEFAULT_NEUTRALITY_BAND;
    const perSource = this.summarizeBySource(items, band);
    const contributions = this.calculateContributions(perSource, weights);

    const included = contributions.filter(c => c.included);
    const weightedScore = included.length > 0
      ? clampScore(included.reduce((sum, c) => sum + c.meanSentiment * c.normalizedWeight, 0))
      : 0;

    return {
      ticker: options.ticker ?? items[0]?.ticker ?? '',
      weightedScore,
      perSource,
      asOf: options.asOf ?? new Date().toISOString(),
      noData: included.length === 0
    };
  },

  /**
   * Group items by source and summarize each group, including empty sources
   */
  summarizeBySource(
    items: ScoredItem[],
    neutralityBand: number = DEFAULT_NEUTRALITY_BAND
  ): Record<SourceId, SourceSummary> {
    const groups = new Map<SourceId, number[]>(
      SOURCE_IDS.map((source): [SourceId, number[]] => [source, []])
    );

    for (const item of items) {
      groups.get(item.source)?.push(item.sentiment);
    }

    const summarize = (source: SourceId): SourceSummary =>
      this.summarizeSource(source, groups.get(source) ?? [], neutralityBand);

    return {
      NEWS: summarize('NEWS'),
      REDDIT: summarize('REDDIT'),
      INSTITUTIONAL: summarize('INSTITUTIONAL'),
      SOCIAL: summarize('SOCIAL')
    };
  },

  /**
   * Summarize one source's scores
   *
   * Positive means score > band, negative means score < -band.
   * An empty source has mean 0, count 0 and all ratios 0.
   */
  summarizeSource(
    source: SourceId,
    scores: number[],
    neutralityBand: number = DEFAULT_NEUTRALITY_BAND
  ): SourceSummary {
    if (scores.length === 0) {
      return {
        source,
        meanSentiment: 0,
        itemCount: 0,
        positiveRatio: 0,
        negativeRatio: 0,
        neutralRatio: 0
      };
    }

    const { positive, negative } = countPolarity(scores, neutralityBand);
    const neutral = scores.length - positive - negative;

    return {
      source,
      meanSentiment: clampScore(mean(scores)),
      itemCount: scores.length,
      positiveRatio: positive / scores.length,
      negativeRatio: negative / scores.length,
      neutralRatio: neutral / scores.length
    };
  },

  /**
   * Work out which sources enter the weighted mean and with what share
   *
   * Sources with no items, or a zero weight, are excluded from the
   * denominator rather than counted as neutral.
   */
  calculateContributions(
    perSource: Record<SourceId, SourceSummary>,
    weights: WeightConfig
  ): SourceContribution[] {
    const contributions: SourceContribution[] = SOURCE_IDS.map(source => {
      const summary = perSource[source];
      const weight = Math.max(0, weights[source] ?? 0);

      let excludeReason: string | undefined;
      if (summary.itemCount === 0) {
        excludeReason = 'No items';
      } else if (weight === 0) {
        excludeReason = 'Zero weight';
      }

      return {
        source,
        meanSentiment: summary.meanSentiment,
        weight,
        normalizedWeight: 0,
        included: excludeReason === undefined,
        ...(excludeReason !== undefined ? { excludeReason } : {})
      };
    });

    const totalWeight = contributions
      .filter(c => c.included)
      .reduce((sum, c) => sum + c.weight, 0);

    if (totalWeight > 0) {
      for (const contribution of contributions) {
        if (contribution.included) {
          contribution.normalizedWeight = contribution.weight / totalWeight;
        }
      }
    }

    return contributions;
  },

  /**
   * Overall polarity distribution across every item, for the category chart
   */
  distribution(
    items: ScoredItem[],
    neutralityBand: number = DEFAULT_NEUTRALITY_BAND
  ): SentimentDistribution {
    if (items.length === 0) {
      return { positive: 0, neutral: 0, negative: 0, total: 0 };
    }

    const { positive, negative } = countPolarity(items.map(item => item.sentiment), neutralityBand);
    const total = items.length;

    return {
      positive: positive / total,
      neutral: (total - positive - negative) / total,
      negative: negative / total,
      total
    };
  },

  /**
   * Throw NoDataError when the aggregate carries the no-data flag
   */
  requireData(overall: OverallSentiment, rangeStart: string, rangeEnd: string): OverallSentiment {
    if (overall.noData) {
      throw new NoDataError(overall.ticker, rangeStart, rangeEnd);
    }
    return overall;
  }
};

function mean(values: number[]): number {
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

function countPolarity(scores: number[], neutralityBand: number): { positive: number; negative: number } {
  let positive = 0;
  let negative = 0;
  for (const score of scores) {
    if (score > neutralityBand) {
      positive++;
    } else if (score < -neutralityBand) {
      negative++;
    }
  }
  return { positive, negative };
}
