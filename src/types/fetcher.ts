/**
 * Source Fetcher contract
 *
 * One implementation per data source. Fetchers are read-only and share no
 * mutable state, so the pipeline may call them concurrently.
 */

import { RawItem, SourceId } from './sentiment';

export interface FetchWindow {
  ticker: string;
  /** ISO-8601, inclusive */
  rangeStart: string;
  /** ISO-8601, exclusive */
  rangeEnd: string;
}

export interface SourceFetcher {
  readonly source: SourceId;

  /**
   * Fetch raw items mentioning the ticker within the window.
   * Rejects with FetchError on network, auth or rate-limit failure.
   */
  fetch(window: FetchWindow, signal?: AbortSignal): Promise<RawItem[]>;
}
