/**
 * Dashboard View Service - presentation-ready figures derived from scores
 *
 * This service handles:
 * - Gauge values and their bearish/neutral/bullish band
 * - Most frequent financial terms per source
 * - Per-source fetch coverage
 */

import financialTerms from '../data/financial-terms.json';
import { FetchFailureReason } from '../types/errors';
import { Gauge, GaugeBand, SourceCoverage, TermCount } from '../types/dashboard';
import {
  OverallSentiment,
  ScoredItem,
  SOURCE_IDS,
  SOURCE_LABELS,
  SourceId
} from '../types/sentiment';
import { tokenize } from './sentiment-scorer';

/** Gauge values beyond ±0.3 are coloured bullish or bearish */
export const GAUGE_THRESHOLD = 0.3;

export const TOP_TERM_LIMIT = 3;

const FINANCIAL_TERMS = new Set<string>(financialTerms);

/**
 * Fetch outcome for one source, as reported by the pipeline
 */
export type SourceOutcome =
  | { source: SourceId; status: 'DISABLED' }
  | { source: SourceId; status: 'FETCHED'; itemCount: number }
  | { source: SourceId; status: 'FAILED'; reason: FetchFailureReason; message: string };

export const DashboardView = {
  classifyGauge(value: number): GaugeBand {
    if (value > GAUGE_THRESHOLD) return 'BULLISH';
    if (value < -GAUGE_THRESHOLD) return 'BEARISH';
    return 'NEUTRAL';
  },

  /**
   * Overall gauge plus one gauge per source that returned items
   */
  buildGauges(overall: OverallSentiment): { overall: Gauge; perSource: Gauge[] } {
    const gauge = (label: string, value: number): Gauge => ({
      label,
      value,
      band: this.classifyGauge(value)
    });

    return {
      overall: gauge('Overall', overall.weightedScore),
      perSource: SOURCE_IDS
        .filter(source => overall.perSource[source].itemCount > 0)
        .map(source => gauge(SOURCE_LABELS[source], overall.perSource[source].meanSentiment))
    };
  },

  /**
   * Most frequent financial terms in the normalized text of the given items
   *
   * Ties are broken alphabetically.
   */
  countTerms(items: ScoredItem[], limit: number = TOP_TERM_LIMIT): TermCount[] {
    const counts = new Map<string, number>();
    for (const item of items) {
      for (const token of tokenize(item.normalizedText)) {
        if (FINANCIAL_TERMS.has(token)) {
          counts.set(token, (counts.get(token) ?? 0) + 1);
        }
      }
    }

    return Array.from(counts.entries())
      .map(([term, count]) => ({ term, count }))
      .sort((a, b) => b.count - a.count || a.term.localeCompare(b.term))
      .slice(0, limit);
  },

  topTermsBySource(items: ScoredItem[], limit: number = TOP_TERM_LIMIT): Record<SourceId, TermCount[]> {
    const forSource = (source: SourceId): TermCount[] =>
      this.countTerms(items.filter(item => item.source === source), limit);

    return {
      NEWS: forSource('NEWS'),
      REDDIT: forSource('REDDIT'),
      INSTITUTIONAL: forSource('INSTITUTIONAL'),
      SOCIAL: forSource('SOCIAL')
    };
  },

  /**
   * Coverage entry per source, in source order
   */
  buildCoverage(outcomes: SourceOutcome[]): SourceCoverage[] {
    return SOURCE_IDS.map((source): SourceCoverage => {
      const outcome = outcomes.find(o => o.source === source);
      if (!outcome || outcome.status === 'DISABLED') {
        return { source, status: 'DISABLED', itemCount: 0 };
      }
      if (outcome.status === 'FAILED') {
        return {
          source,
          status: 'FAILED',
          itemCount: 0,
          failureReason: outcome.reason,
          message: outcome.message
        };
      }
      return {
        source,
        status: outcome.itemCount > 0 ? 'OK' : 'EMPTY',
        itemCount: outcome.itemCount
      };
    });
  }
};
