/**
 * Trend Builder Service
 *
 * Buckets scored items into fixed, contiguous, half-open windows
 * [windowStart, windowEnd) covering the requested range. The last window is
 * shorter when the range does not divide evenly. Empty windows are filled
 * with a neutral score of 0 and an item count of 0 (no carry-forward), so
 * chart x-axes stay evenly spaced.
 */

import { ScoredItem, SourceId, TrendPoint, TrendSeries } from '../types/sentiment';
import { countWindows, MAX_TREND_WINDOWS } from '../utils/duration';

/**
 * Trend Builder Service
 */
export const TrendBuilder = {
  /**
   * Build a time-ordered trend series
   *
   * @param items - Scored items; items outside [rangeStart, rangeEnd) are ignored
   * @param windowMs - Window length in milliseconds, must be positive
   * @param rangeStart - ISO-8601 start (inclusive)
   * @param rangeEnd - ISO-8601 end (exclusive)
   * @returns One point per window; empty when rangeEnd <= rangeStart
   * @throws RangeError for a non-positive window, an unparseable range bound or too many windows
   */
  buildTrend(
    items: ScoredItem[],
    windowMs: number,
    rangeStart: string,
    rangeEnd: string
  ): TrendSeries {
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new RangeError(`Trend window must be a positive number of milliseconds, got ${windowMs}`);
    }

    const start = parseInstant(rangeStart, 'rangeStart');
    const end = parseInstant(rangeEnd, 'rangeEnd');
    if (end <= start) {
      return [];
    }

    const bucketCount = this.bucketCount(start, end, windowMs);
    if (bucketCount > MAX_TREND_WINDOWS) {
      throw new RangeError(`Trend window of ${windowMs}ms yields ${bucketCount} windows, more than ${MAX_TREND_WINDOWS}`);
    }
    const sums = new Array<number>(bucketCount).fill(0);
    const counts = new Array<number>(bucketCount).fill(0);

    for (const item of items) {
      const t = Date.parse(item.timestamp);
      if (Number.isNaN(t) || t < start || t >= end) {
        continue;
      }
      const index = Math.floor((t - start) / windowMs);
      sums[index] += item.sentiment;
      counts[index]++;
    }

    const series: TrendPoint[] = [];
    for (let i = 0; i < bucketCount; i++) {
      const windowStart = start + i * windowMs;
      const windowEnd = Math.min(windowStart + windowMs, end);
      series.push({
        windowStart: new Date(windowStart).toISOString(),
        windowEnd: new Date(windowEnd).toISOString(),
        aggregateScore: counts[i] > 0 ? sums[i] / counts[i] : 0,
        itemCount: counts[i]
      });
    }

    return series;
  },

  /**
   * Build one series per source over the same windows
   */
  buildSourceTrends(
    items: ScoredItem[],
    windowMs: number,
    rangeStart: string,
    rangeEnd: string
  ): Record<SourceId, TrendSeries> {
    const bySource = (source: SourceId): TrendSeries =>
      this.buildTrend(items.filter(item => item.source === source), windowMs, rangeStart, rangeEnd);

    return {
      NEWS: bySource('NEWS'),
      REDDIT: bySource('REDDIT'),
      INSTITUTIONAL: bySource('INSTITUTIONAL'),
      SOCIAL: bySource('SOCIAL')
    };
  },

  /**
   * ceil((end - start) / window)
   */
  bucketCount(startMs: number, endMs: number, windowMs: number): number {
    return countWindows(endMs - startMs, windowMs);
  }
};

function parseInstant(value: string, field: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new RangeError(`${field} is not a valid ISO-8601 instant: ${value}`);
  }
  return ms;
}
