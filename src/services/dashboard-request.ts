/**
 * Dashboard Request Resolver
 *
 * Turns loosely typed request parameters (query string, CLI flags) into a
 * DashboardRequest with an explicit ISO range.
 */

import { SentimentConfig } from '../types/config';
import { DashboardRequest } from '../types/dashboard';
import { RequestValidationError } from '../types/errors';
import { countWindows, DAY_MS, HOUR_MS, MAX_TREND_WINDOWS, parseDuration } from '../utils/duration';

export const MAX_LOOKBACK_DAYS = 30;

const TICKER_PATTERN = /^[A-Z]{1,5}(\.[A-Z])?$/;

/**
 * Unvalidated request parameters
 */
export interface DashboardParams {
  ticker?: string;
  days?: string;
  start?: string;
  end?: string;
  window?: string;
}

export const DashboardRequests = {
  /**
   * Resolve parameters into a request
   *
   * Without start/end the range covers the last `days` days (default from
   * config), ending at the top of the next hour so repeated requests share a
   * cache key. The trend window, requested or configured, may split the
   * range into at most MAX_TREND_WINDOWS windows.
   *
   * @throws RequestValidationError for any unusable parameter
   */
  resolve(params: DashboardParams, config: SentimentConfig, now: Date = new Date()): DashboardRequest {
    const ticker = this.parseTicker(params.ticker);
    const { rangeStart, rangeEnd } = params.start !== undefined || params.end !== undefined
      ? this.parseExplicitRange(params.start, params.end)
      : this.lookbackRange(params.days, config.defaultLookbackDays, now);

    const request: DashboardRequest = { ticker, rangeStart, rangeEnd };
    if (params.window !== undefined) {
      const windowMs = parseDuration(params.window);
      if (windowMs === null) {
        throw new RequestValidationError(`Invalid trend window: ${params.window}`, 'window');
      }
      request.trendWindowMs = windowMs;
    }

    const windowMs = request.trendWindowMs ?? config.trendWindowMs;
    const windows = countWindows(Date.parse(rangeEnd) - Date.parse(rangeStart), windowMs);
    if (windows > MAX_TREND_WINDOWS) {
      throw new RequestValidationError(
        `Trend window splits the range into ${windows} windows; at most ${MAX_TREND_WINDOWS} are allowed`,
        'window'
      );
    }
    return request;
  },

  parseTicker(value: string | undefined): string {
    const ticker = (value ?? '').trim().toUpperCase();
    if (!TICKER_PATTERN.test(ticker)) {
      throw new RequestValidationError(`Invalid ticker: ${value ?? ''}`, 'ticker');
    }
    return ticker;
  },

  parseExplicitRange(start: string | undefined, end: string | undefined): { rangeStart: string; rangeEnd: string } {
    if (start === undefined || end === undefined) {
      throw new RequestValidationError('start and end must be given together', start === undefined ? 'start' : 'end');
    }
    const startMs = Date.parse(start);
    if (Number.isNaN(startMs)) {
      throw new RequestValidationError(`Invalid start: ${start}`, 'start');
    }
    const endMs = Date.parse(end);
    if (Number.isNaN(endMs)) {
      throw new RequestValidationError(`Invalid end: ${end}`, 'end');
    }
    if (endMs <= startMs) {
      throw new RequestValidationError('end must be after start', 'end');
    }
    if (endMs - startMs > MAX_LOOKBACK_DAYS * DAY_MS) {
      throw new RequestValidationError(`Range may not exceed ${MAX_LOOKBACK_DAYS} days`, 'start');
    }
    return {
      rangeStart: new Date(startMs).toISOString(),
      rangeEnd: new Date(endMs).toISOString()
    };
  },

  lookbackRange(days: string | undefined, defaultDays: number, now: Date): { rangeStart: string; rangeEnd: string } {
    let lookback = defaultDays;
    if (days !== undefined) {
      lookback = Number(days);
      if (!Number.isInteger(lookback) || lookback < 1 || lookback > MAX_LOOKBACK_DAYS) {
        throw new RequestValidationError(`days must be an integer from 1 to ${MAX_LOOKBACK_DAYS}`, 'days');
      }
    }

    const endMs = Math.ceil(now.getTime() / HOUR_MS) * HOUR_MS;
    return {
      rangeStart: new Date(endMs - lookback * DAY_MS).toISOString(),
      rangeEnd: new Date(endMs).toISOString()
    };
  }
};
