/**
 * Reddit Adapter - r/wallstreetbets posts mentioning a ticker
 *
 * Authenticates with the application-only OAuth flow, searches the subreddit
 * across widening time filters until enough posts are found, and falls back
 * to the hot/new/top listings when search returns nothing.
 */

import { FetchError } from '../../types/errors';
import { FetchWindow } from '../../types/fetcher';
import { SourceId } from '../../types/sentiment';
import { asArray, asNumber, asRecord, asString } from '../../utils/json';
import { BaseSourceAdapter, RawSourceItem, SourceAdapterConfig } from './base-source-adapter';

export const REDDIT_TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
export const REDDIT_API_BASE = 'https://oauth.reddit.com';

const SEARCH_TIME_FILTERS = ['day', 'week', 'month'] as const;

const LISTINGS: Array<{ path: string; params: Record<string, string> }> = [
  { path: 'hot', params: {} },
  { path: 'new', params: {} },
  { path: 'top', params: { t: 'week' } }
];

/** Search stops widening the time filter once this many posts are found */
const ENOUGH_POSTS = 50;

const PAGE_LIMIT = '100';

/**
 * Reddit-specific configuration
 */
export interface RedditAdapterConfig extends SourceAdapterConfig {
  clientId: string;
  clientSecret: string;
  userAgent: string;
  subreddit?: string;
  tokenUrl?: string;
  apiBase?: string;
}

/**
 * Reddit Adapter implementation
 */
export class RedditAdapter extends BaseSourceAdapter {
  readonly source: SourceId = 'REDDIT';

  private readonly redditConfig: RedditAdapterConfig;

  constructor(config: RedditAdapterConfig) {
    super('REDDIT', config);
    this.redditConfig = config;
  }

  protected async fetchRaw(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]> {
    const token = await this.requestAccessToken(signal);
    const posts = new Map<string, RawSourceItem>();
    const start = Date.parse(window.rangeStart);
    const end = Date.parse(window.rangeEnd);

    const collect = (children: RawSourceItem[]): void => {
      for (const post of children) {
        const t = typeof post.publishedAt === 'number' ? post.publishedAt * 1000 : NaN;
        if (t >= start && t < end && this.mentionsTicker(post.text, window.ticker)) {
          posts.set(post.id, post);
        }
      }
    };

    for (const timeFilter of SEARCH_TIME_FILTERS) {
      collect(await this.listing(token, 'search', {
        q: window.ticker,
        restrict_sr: '1',
        sort: 'new',
        t: timeFilter,
        limit: PAGE_LIMIT
      }, signal));

      if (posts.size >= ENOUGH_POSTS) {
        break;
      }
    }

    if (posts.size === 0) {
      console.log(`[RedditAdapter] No search results for ${window.ticker}, scanning listings`);
      for (const listing of LISTINGS) {
        collect(await this.listing(token, listing.path, { ...listing.params, limit: PAGE_LIMIT }, signal));
      }
    }

    return Array.from(posts.values());
  }

  /**
   * Application-only OAuth token (client credentials grant)
   */
  private async requestAccessToken(signal?: AbortSignal): Promise<string> {
    const { clientId, clientSecret, userAgent } = this.redditConfig;
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    const response = await this.http.requestWithRetry({
      method: 'POST',
      url: this.redditConfig.tokenUrl ?? REDDIT_TOKEN_URL,
      headers: {
        Authorization: `Basic ${basic}`,
        'User-Agent': userAgent
      },
      form: { grant_type: 'client_credentials' },
      signal
    });

    const token = asString(asRecord(response.data).access_token);
    if (!token) {
      throw new FetchError('Reddit did not return an access token', this.source, 'AUTH', response.status);
    }
    return token;
  }

  private async listing(
    token: string,
    path: string,
    params: Record<string, string>,
    signal?: AbortSignal
  ): Promise<RawSourceItem[]> {
    const subreddit = this.redditConfig.subreddit ?? 'wallstreetbets';
    const base = this.redditConfig.apiBase ?? REDDIT_API_BASE;

    const response = await this.http.requestWithRetry({
      url: `${base}/r/${subreddit}/${path}`,
      params: { ...params, raw_json: '1' },
      headers: {
        Authorization: `Bearer ${token}`,
        'User-Agent': this.redditConfig.userAgent
      },
      signal
    });

    const items: RawSourceItem[] = [];
    for (const child of asArray(asRecord(asRecord(response.data).data).children)) {
      const post = asRecord(asRecord(child).data);
      const id = asString(post.id);
      const createdUtc = asNumber(post.created_utc);
      if (!id || createdUtc === undefined) {
        continue;
      }
      const permalink = asString(post.permalink);

      items.push({
        id,
        text: `${asString(post.title) ?? ''} ${asString(post.selftext) ?? ''}`,
        publishedAt: createdUtc,
        url: permalink ? `https://www.reddit.com${permalink}` : undefined,
        author: asString(post.author),
        publisher: `r/${subreddit}`
      });
    }
    return items;
  }
}
