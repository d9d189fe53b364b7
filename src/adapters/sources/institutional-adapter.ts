/**
 * Institutional Commentary Adapter
 *
 * Reads the Alpha Vantage NEWS_SENTIMENT feed for a ticker. When the feed is
 * empty and a NewsAPI key is available, falls back to NewsAPI restricted to
 * institutional publishers.
 */

import { FetchError } from '../../types/errors';
import { FetchWindow } from '../../types/fetcher';
import { SourceId } from '../../types/sentiment';
import { asArray, asRecord, asString } from '../../utils/json';
import { BaseSourceAdapter, RawSourceItem, SourceAdapterConfig } from './base-source-adapter';
import { fetchNewsApiArticles } from './news-adapter';

export const ALPHA_VANTAGE_ENDPOINT = 'https://www.alphavantage.co/query';

export const INSTITUTIONAL_DOMAINS = [
  'reuters.com',
  'bloomberg.com',
  'wsj.com',
  'ft.com',
  'barrons.com',
  'marketwatch.com',
  'cnbc.com'
];

/**
 * Institutional-specific configuration
 */
export interface InstitutionalAdapterConfig extends SourceAdapterConfig {
  alphaVantageKey: string;
  /** Enables the NewsAPI fallback */
  newsApiKey?: string;
  endpoint?: string;
  newsApiEndpoint?: string;
}

/**
 * Format an ISO instant as Alpha Vantage's YYYYMMDDTHHMM
 */
export function toAlphaVantageTime(iso: string): string {
  const d = new Date(iso);
  const z = (n: number) => String(n).padStart(2, '0');
  return `${d.getUTCFullYear()}${z(d.getUTCMonth() + 1)}${z(d.getUTCDate())}T${z(d.getUTCHours())}${z(d.getUTCMinutes())}`;
}

/**
 * Parse Alpha Vantage's YYYYMMDDTHHMMSS (read as UTC) to ISO-8601
 */
export function parseAlphaVantageTime(value: string): string | null {
  const match = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})?$/.exec(value);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second] = match;
  const ms = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second ?? '0')
  );
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}

/**
 * Institutional Adapter implementation
 */
export class InstitutionalAdapter extends BaseSourceAdapter {
  readonly source: SourceId = 'INSTITUTIONAL';

  private readonly institutionalConfig: InstitutionalAdapterConfig;

  constructor(config: InstitutionalAdapterConfig) {
    super('INSTITUTIONAL', config);
    this.institutionalConfig = config;
  }

  protected async fetchRaw(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]> {
    const items = await this.fetchAlphaVantage(window, signal);
    if (items.length > 0 || !this.institutionalConfig.newsApiKey) {
      return items;
    }

    console.log(`[InstitutionalAdapter] No Alpha Vantage items for ${window.ticker}, trying NewsAPI`);
    return fetchNewsApiArticles(this.http, this.source, {
      apiKey: this.institutionalConfig.newsApiKey,
      query: window.ticker,
      window,
      endpoint: this.institutionalConfig.newsApiEndpoint,
      domains: INSTITUTIONAL_DOMAINS.join(',')
    }, signal);
  }

  private async fetchAlphaVantage(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]> {
    const response = await this.http.requestWithRetry({
      url: this.institutionalConfig.endpoint ?? ALPHA_VANTAGE_ENDPOINT,
      params: {
        function: 'NEWS_SENTIMENT',
        tickers: window.ticker,
        time_from: toAlphaVantageTime(window.rangeStart),
        time_to: toAlphaVantageTime(window.rangeEnd),
        sort: 'LATEST',
        limit: '200',
        apikey: this.institutionalConfig.alphaVantageKey
      },
      signal
    });

    const body = asRecord(response.data);

    // throttling and key problems arrive as HTTP 200 with a message field
    const notice = asString(body.Note) ?? asString(body.Information);
    if (notice !== undefined) {
      throw new FetchError(`Alpha Vantage: ${notice}`, this.source, 'RATE_LIMITED', response.status);
    }
    const errorMessage = asString(body['Error Message']);
    if (errorMessage !== undefined) {
      throw new FetchError(`Alpha Vantage: ${errorMessage}`, this.source, 'INVALID_RESPONSE', response.status);
    }

    const items: RawSourceItem[] = [];
    for (const entry of asArray(body.feed)) {
      const article = asRecord(entry);
      const url = asString(article.url);
      const publishedAt = parseAlphaVantageTime(asString(article.time_published) ?? '');
      if (!url || !publishedAt) {
        continue;
      }

      const authors = asArray(article.authors)
        .map(author => asString(author))
        .filter((author): author is string => author !== undefined);

      items.push({
        id: url,
        text: `${asString(article.title) ?? ''} ${asString(article.summary) ?? ''}`,
        publishedAt,
        url,
        author: authors.length > 0 ? authors.join(', ') : undefined,
        publisher: asString(article.source) ?? 'Unknown'
      });
    }
    return items;
  }
}
