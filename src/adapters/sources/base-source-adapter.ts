/**
 * Base Source Adapter - common logic for all ticker-mention fetchers
 *
 * This abstract class implements the functionality shared by all sources:
 * - Normalization of provider payloads to the common RawItem shape
 * - Filtering to the requested ticker and [rangeStart, rangeEnd) window
 * - Shared HTTP client with timeout and retry
 */

import { FetchSettings } from '../../types/config';
import { FetchWindow, SourceFetcher } from '../../types/fetcher';
import { RawItem, SourceId } from '../../types/sentiment';
import { FetchFunction, HttpClient } from '../http-client';

/**
 * Provider item before normalization
 */
export interface RawSourceItem {
  id: string;
  text: string;
  publishedAt: string | number | Date;
  url?: string;
  author?: string;
  publisher?: string;
}

/**
 * Configuration shared by all source adapters
 */
export interface SourceAdapterConfig {
  fetchSettings?: Partial<FetchSettings>;
  /** Replaces the global fetch, mainly for tests */
  fetchImpl?: FetchFunction;
}

/**
 * Abstract base class for source adapters
 */
export abstract class BaseSourceAdapter implements SourceFetcher {
  abstract readonly source: SourceId;

  protected readonly http: HttpClient;

  constructor(source: SourceId, config: SourceAdapterConfig = {}) {
    this.http = new HttpClient(source, config.fetchSettings, config.fetchImpl);
  }

  /**
   * Fetch items for the window and keep only those inside it
   */
  async fetch(window: FetchWindow, signal?: AbortSignal): Promise<RawItem[]> {
    const ticker = window.ticker.toUpperCase();
    const rawItems = await this.fetchRaw({ ...window, ticker }, signal);
    const start = Date.parse(window.rangeStart);
    const end = Date.parse(window.rangeEnd);

    const seen = new Set<string>();
    const items: RawItem[] = [];
    for (const raw of rawItems) {
      const item = this.normalizeItem(raw, ticker);
      if (!item || seen.has(item.itemId)) {
        continue;
      }
      const t = Date.parse(item.timestamp);
      if (t < start || t >= end) {
        continue;
      }
      seen.add(item.itemId);
      items.push(item);
    }
    return items;
  }

  /**
   * Retrieve provider items for an upper-cased ticker
   */
  protected abstract fetchRaw(window: FetchWindow, signal?: AbortSignal): Promise<RawSourceItem[]>;

  /**
   * Convert a provider item to RawItem; items without text or a valid time are dropped
   */
  protected normalizeItem(raw: RawSourceItem, ticker: string): RawItem | null {
    const text = raw.text.trim();
    const timestamp = toIsoTimestamp(raw.publishedAt);
    if (text.length === 0 || timestamp === null) {
      return null;
    }

    return {
      itemId: `${this.source}:${raw.id}`,
      source: this.source,
      ticker,
      timestamp,
      text,
      ...(raw.url ? { url: raw.url } : {}),
      ...(raw.author ? { author: raw.author } : {}),
      ...(raw.publisher ? { publisher: raw.publisher } : {})
    };
  }

  /**
   * Whether text mentions the ticker as a word or a $cashtag
   */
  protected mentionsTicker(text: string, ticker: string): boolean {
    const escaped = ticker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`(^|[^A-Za-z0-9])\\$?${escaped}([^A-Za-z0-9]|$)`, 'i').test(text);
  }
}

/**
 * Convert epoch seconds/milliseconds, Date or date string to ISO-8601
 */
export function toIsoTimestamp(value: string | number | Date): string | null {
  let ms: number;
  if (value instanceof Date) {
    ms = value.getTime();
  } else if (typeof value === 'number') {
    // values below 1e12 are epoch seconds
    ms = value < 1e12 ? value * 1000 : value;
  } else {
    ms = Date.parse(value);
  }
  return Number.isNaN(ms) ? null : new Date(ms).toISOString();
}
