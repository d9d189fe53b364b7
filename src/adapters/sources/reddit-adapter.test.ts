/**
 * Reddit Adapter Tests
 */

import { RedditAdapter, REDDIT_TOKEN_URL } from './reddit-adapter';
import { FetchWindow } from '../../types/fetcher';
import { calledUrl, captureFetchError, jsonResponse, routeFetch } from '../../test/fetch-stub';

const WINDOW: FetchWindow = {
  ticker: 'AAPL',
  rangeStart: '2024-03-01T00:00:00.000Z',
  rangeEnd: '2024-03-08T00:00:00.000Z'
};

/** 2024-03-02T00:00:00Z in epoch seconds */
const MARCH_2 = 1709337600;

const MENTION = {
  id: 'p1',
  title: '$AAPL calls printing',
  selftext: 'to the moon',
  created_utc: MARCH_2,
  permalink: '/r/wallstreetbets/comments/p1/x/',
  author: 'trader1'
};

const listingBody = (...posts: Array<Record<string, unknown>>) => ({
  data: { children: posts.map(data => ({ kind: 't3', data })) }
});

const adapterWith = (fetchImpl: ReturnType<typeof routeFetch>) => new RedditAdapter({
  clientId: 'test-client',
  clientSecret: 'test-secret',
  userAgent: 'test-agent',
  fetchImpl,
  fetchSettings: { maxRetries: 0 }
});

describe('RedditAdapter', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('should authenticate with the client credentials grant', async () => {
    const fetchImpl = routeFetch(url =>
      url.hostname === 'www.reddit.com' ? jsonResponse({ access_token: 'tok' }) : jsonResponse(listingBody(MENTION))
    );

    await adapterWith(fetchImpl).fetch(WINDOW);

    const [input, init] = fetchImpl.mock.calls[0];
    expect(String(input)).toBe(REDDIT_TOKEN_URL);
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('grant_type=client_credentials');
    expect(init?.headers).toMatchObject({
      Authorization: `Basic ${Buffer.from('test-client:test-secret').toString('base64')}`,
      'User-Agent': 'test-agent'
    });
    expect(fetchImpl.mock.calls[1][1]?.headers).toMatchObject({ Authorization: 'Bearer tok' });
  });

  it('should keep in-range posts that mention the ticker', async () => {
    const fetchImpl = routeFetch(url => {
      if (url.hostname === 'www.reddit.com') {
        return jsonResponse({ access_token: 'tok' });
      }
      return jsonResponse(listingBody(
        MENTION,
        { id: 'p2', title: 'SNAPPLE is great', selftext: '', created_utc: MARCH_2 },
        { id: 'p3', title: 'AAPL last month', selftext: '', created_utc: 1709000000 }
      ));
    });

    const items = await adapterWith(fetchImpl).fetch(WINDOW);

    expect(items).toEqual([
      {
        itemId: 'REDDIT:p1',
        source: 'REDDIT',
        ticker: 'AAPL',
        timestamp: '2024-03-02T00:00:00.000Z',
        text: '$AAPL calls printing to the moon',
        url: 'https://www.reddit.com/r/wallstreetbets/comments/p1/x/',
        author: 'trader1',
        publisher: 'r/wallstreetbets'
      }
    ]);
  });

  it('should widen the search time filter while few posts are found', async () => {
    const fetchImpl = routeFetch(url =>
      url.hostname === 'www.reddit.com' ? jsonResponse({ access_token: 'tok' }) : jsonResponse(listingBody(MENTION))
    );

    await adapterWith(fetchImpl).fetch(WINDOW);

    expect(fetchImpl).toHaveBeenCalledTimes(4);
    const searches = [1, 2, 3].map(i => calledUrl(fetchImpl, i));
    expect(searches.map(u => u.pathname)).toEqual([
      '/r/wallstreetbets/search',
      '/r/wallstreetbets/search',
      '/r/wallstreetbets/search'
    ]);
    expect(searches.map(u => u.searchParams.get('t'))).toEqual(['day', 'week', 'month']);
    expect(searches[0].searchParams.get('q')).toBe('AAPL');
    expect(searches[0].searchParams.get('restrict_sr')).toBe('1');
  });

  it('should scan the subreddit listings when search finds nothing', async () => {
    const fetchImpl = routeFetch(url => {
      if (url.hostname === 'www.reddit.com') {
        return jsonResponse({ access_token: 'tok' });
      }
      if (url.pathname.endsWith('/search')) {
        return jsonResponse(listingBody());
      }
      return jsonResponse(listingBody(MENTION));
    });

    const items = await adapterWith(fetchImpl).fetch(WINDOW);

    expect(items.map(i => i.itemId)).toEqual(['REDDIT:p1']);
    expect(fetchImpl).toHaveBeenCalledTimes(7);
    const listings = [4, 5, 6].map(i => calledUrl(fetchImpl, i));
    expect(listings.map(u => u.pathname)).toEqual([
      '/r/wallstreetbets/hot',
      '/r/wallstreetbets/new',
      '/r/wallstreetbets/top'
    ]);
    expect(listings[2].searchParams.get('t')).toBe('week');
  });

  it('should report a missing access token as AUTH', async () => {
    const fetchImpl = routeFetch(() => jsonResponse({}));

    const error = await captureFetchError(adapterWith(fetchImpl).fetch(WINDOW));

    expect(error.reason).toBe('AUTH');
    expect(error.source).toBe('REDDIT');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
