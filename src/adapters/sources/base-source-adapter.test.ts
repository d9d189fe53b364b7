/**
 * Base Source Adapter Tests
 */

import { BaseSourceAdapter, RawSourceItem, toIsoTimestamp } from './base-source-adapter';
import { FetchWindow } from '../../types/fetcher';
import { SourceId } from '../../types/sentiment';

class FixedAdapter extends BaseSourceAdapter {
  readonly source: SourceId = 'SOCIAL';
  lastWindow?: FetchWindow;

  constructor(private readonly rawItems: RawSourceItem[]) {
    super('SOCIAL');
  }

  protected async fetchRaw(window: FetchWindow): Promise<RawSourceItem[]> {
    this.lastWindow = window;
    return this.rawItems;
  }

  mentions(text: string, ticker: string): boolean {
    return this.mentionsTicker(text, ticker);
  }
}

const WINDOW: FetchWindow = {
  ticker: 'msft',
  rangeStart: '2024-03-01T00:00:00.000Z',
  rangeEnd: '2024-03-08T00:00:00.000Z'
};

describe('BaseSourceAdapter', () => {
  it('should upper-case the ticker before fetching', async () => {
    const adapter = new FixedAdapter([]);

    await adapter.fetch(WINDOW);

    expect(adapter.lastWindow?.ticker).toBe('MSFT');
  });

  it('should keep items in the half-open range', async () => {
    const adapter = new FixedAdapter([
      { id: 'start', text: 'at start', publishedAt: '2024-03-01T00:00:00Z' },
      { id: 'end', text: 'at end', publishedAt: '2024-03-08T00:00:00Z' },
      { id: 'before', text: 'before', publishedAt: '2024-02-29T23:59:59Z' }
    ]);

    const items = await adapter.fetch(WINDOW);

    expect(items.map(i => i.itemId)).toEqual(['SOCIAL:start']);
  });

  it('should drop blank text, bad timestamps and duplicate ids', async () => {
    const adapter = new FixedAdapter([
      { id: 'a', text: '  first  ', publishedAt: '2024-03-02T00:00:00Z' },
      { id: 'a', text: 'again', publishedAt: '2024-03-02T00:00:00Z' },
      { id: 'b', text: '   ', publishedAt: '2024-03-02T00:00:00Z' },
      { id: 'c', text: 'undated', publishedAt: 'not a date' }
    ]);

    const items = await adapter.fetch(WINDOW);

    expect(items).toEqual([
      {
        itemId: 'SOCIAL:a',
        source: 'SOCIAL',
        ticker: 'MSFT',
        timestamp: '2024-03-02T00:00:00.000Z',
        text: 'first'
      }
    ]);
  });

  it('should match tickers as words or cashtags', () => {
    const adapter = new FixedAdapter([]);

    expect(adapter.mentions('Loading up on $MSFT', 'MSFT')).toBe(true);
    expect(adapter.mentions('msft earnings', 'MSFT')).toBe(true);
    expect(adapter.mentions('BRK.B holders', 'BRK.B')).toBe(true);
    expect(adapter.mentions('MSFTX is a fund', 'MSFT')).toBe(false);
    expect(adapter.mentions('BRKXB', 'BRK.B')).toBe(false);
  });
});

describe('toIsoTimestamp', () => {
  it('should accept epoch seconds, milliseconds and dates', () => {
    expect(toIsoTimestamp(1709337600)).toBe('2024-03-02T00:00:00.000Z');
    expect(toIsoTimestamp(1709337600000)).toBe('2024-03-02T00:00:00.000Z');
    expect(toIsoTimestamp(new Date(Date.UTC(2024, 2, 2)))).toBe('2024-03-02T00:00:00.000Z');
  });

  it('should return null for unparseable strings', () => {
    expect(toIsoTimestamp('yesterday-ish')).toBeNull();
  });
});
