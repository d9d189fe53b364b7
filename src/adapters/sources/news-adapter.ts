/**
 * Financial News Adapter
 *
 * Fetches articles mentioning a ticker or its company name from the
 * NewsAPI /v2/everything endpoint.
 */

import { FetchError } from '../../types/errors';
import { FetchWindow } from '../../types/fetcher';
import { SourceId } from '../../types/sentiment';
import { asArray, asRecord, asString } from '../../utils/json';
import { CompanyDirectory } from '../../services/company-directory';
import { HttpClient } from '../http-client';
import { BaseSourceAdapter, RawSourceItem, SourceAdapterConfig } from './base-source-adapter';

export const NEWS_API_ENDPOINT = 'https://newsapi.org/v2/everything';

/** NewsAPI caps a single page at 100 articles */
const NEWS_API_PAGE_SIZE = '100';

/**
 * News-specific configuration
 */
export interface NewsAdapterConfig extends SourceAdapterConfig {
  apiKey: string;
  endpoint?: string;
}

export interface NewsApiQuery {
  apiKey: string;
  query: string;
  window: FetchWindow;
  endpoint?: string;
  /** Comma-separated publisher domains */
  domains?: string;
}

/**
 * Query NewsAPI and map articles to provider items
 *
 * Shared with the institutional adapter's fallback path.
 */
export async function fetchNewsApiArticles(
  http: HttpClient,
  source: SourceId,
  request: NewsApiQuery,
  signal?: AbortSignal
): Promise<RawSourceItem[]> {
  const params: Record<string, string> = {
    q: request.query,
    from: request.window.rangeStart,
    to: request.window.rangeEnd,
    language: 'en',
    sortBy: 'publishedAt',
    pageSize: NEWS_API_PAGE_SIZE
  };
  if (request.domains) {
    params.domains = request.domains;
  }

  const response = await http.requestWithRetry({
    url: request.endpoint ?? NEWS_API_ENDPOINT,
    params,
    headers: { 'X-Api-Key': request.apiKey },
    signal
  });

  const body = asRecord(response.data);
  if (body.status === 'error') {
    const code = asString(body.code) ?? 'unknown';
    throw new FetchError(
      `NewsAPI error ${code}: ${asString(body.message) ?? 'no message'}`,
      source,
      code.startsWith('apiKey') ? 'AUTH' : code === 'rateLimited' ? 'RATE_LIMITED' : 'INVALID_RESPONSE'
    );
  }

  const items: RawSourceItem[] = [];
  for (const entry of asArray(body.articles)) {
    const article = asRecord(entry);
    const url = asString(article.url);
    const publishedAt = asString(article.publishedAt);
    if (!url || !publishedAt) {
      continue;
    }
    const title = asString(article.title) ?? '';
    const description = asString(article.description) ?? '';

    items.push({
      id: url,
      text: `${title} ${description}`,
      publishedAt,
      url,
      author: asString(article.author),
      publisher: asString(asRecord(article.source).name) ?? 'Unknown'
    });
  }
  return items;
}

/**
 * Financial News Adapter implementation
 */
export class NewsAdapter extends BaseSourceAdapter {
  readonly source: SourceId = 'NEWS';

  private readonly newsConfig: NewsAdapterConfig;

  constructor(config: NewsAdapterConfig) {
    super('NEWS', config);
    this.newsConfig = config;
  }

  protected async fetchRaw(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]> {
    const searchName = CompanyDirectory.getSearchName(window.ticker);
    const query = searchName === window.ticker
      ? window.ticker
      : `${window.ticker} OR ${searchName}`;

    return fetchNewsApiArticles(this.http, this.source, {
      apiKey: this.newsConfig.apiKey,
      query,
      window,
      endpoint: this.newsConfig.endpoint
    }, signal);
  }
}
