/**
 * Social Media Adapter
 *
 * Reads the public StockTwits symbol stream. No credential is required.
 */

import { FetchWindow } from '../../types/fetcher';
import { SourceId } from '../../types/sentiment';
import { asArray, asRecord, asString } from '../../utils/json';
import { BaseSourceAdapter, RawSourceItem, SourceAdapterConfig } from './base-source-adapter';

export const STOCKTWITS_API_BASE = 'https://api.stocktwits.com/api/2';

/**
 * Social-specific configuration
 */
export interface SocialAdapterConfig extends SourceAdapterConfig {
  apiBase?: string;
}

/**
 * Social Adapter implementation
 */
export class SocialAdapter extends BaseSourceAdapter {
  readonly source: SourceId = 'SOCIAL';

  private readonly apiBase: string;

  constructor(config: SocialAdapterConfig = {}) {
    super('SOCIAL', config);
    this.apiBase = config.apiBase ?? STOCKTWITS_API_BASE;
  }

  protected async fetchRaw(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]> {
    const response = await this.http.requestWithRetry({
      url: `${this.apiBase}/streams/symbol/${encodeURIComponent(window.ticker)}.json`,
      signal
    });

    const items: RawSourceItem[] = [];
    for (const entry of asArray(asRecord(response.data).messages)) {
      const message = asRecord(entry);
      const id = asString(message.id);
      const createdAt = asString(message.created_at);
      if (!id || !createdAt) {
        continue;
      }

      items.push({
        id,
        text: asString(message.body) ?? '',
        publishedAt: createdAt,
        author: asString(asRecord(message.user).username),
        publisher: 'StockTwits'
      });
    }
    return items;
  }
}
