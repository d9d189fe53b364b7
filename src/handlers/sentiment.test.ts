/**
 * Sentiment Handler Tests
 *
 * Verifies status codes and error bodies of GET /sentiment/{ticker}
 */

import { getSentiment, SentimentEvent } from './sentiment';
import { SentimentPipeline } from '../services/sentiment-pipeline';
import { DashboardRequest, DashboardSnapshot, SourceCoverage } from '../types/dashboard';
import { NoDataError } from '../types/errors';
import { buildSnapshot, RANGE_END, RANGE_START } from '../test/generators';

const mockRun = jest.fn<Promise<DashboardSnapshot>, [DashboardRequest, AbortSignal?]>();

// Keep the pipeline away from source APIs and DynamoDB
jest.mock('../services/sentiment-pipeline', () => ({
  SentimentPipeline: jest.fn().mockImplementation(() => ({ run: mockRun }))
}));

const CREDENTIALS: Record<string, string> = {
  NEWS_API_KEY: 'test-news-key',
  ALPHA_VANTAGE_KEY: 'test-av-key',
  REDDIT_CLIENT_ID: 'test-client',
  REDDIT_CLIENT_SECRET: 'test-secret',
  REDDIT_USER_AGENT: 'test-agent'
};

function createEvent(
  ticker: string | undefined,
  query: Record<string, string> | null = null
): SentimentEvent {
  return {
    pathParameters: ticker === undefined ? null : { ticker },
    queryStringParameters: query
  };
}

describe('getSentiment', () => {
  const originalEnv = process.env;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    process.env = { ...originalEnv, ...CREDENTIALS };
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    process.env = originalEnv;
    errorSpy.mockRestore();
  });

  it('should return the snapshot for a valid request', async () => {
    const snapshot = buildSnapshot();
    mockRun.mockResolvedValue(snapshot);

    const response = await getSentiment(createEvent('aapl', { start: RANGE_START, end: RANGE_END, window: '1h' }));

    expect(response.statusCode).toBe(200);
    expect(response.headers).toMatchObject({ 'Access-Control-Allow-Origin': '*' });
    expect(JSON.parse(response.body)).toEqual(snapshot);
    expect(SentimentPipeline).toHaveBeenCalledTimes(1);
    expect(mockRun).toHaveBeenCalledWith({
      ticker: 'AAPL',
      rangeStart: RANGE_START,
      rangeEnd: RANGE_END,
      trendWindowMs: 3600000
    });
  });

  it('should reject an invalid ticker with 400', async () => {
    const response = await getSentiment(createEvent('not a ticker'));
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(400);
    expect(body).toEqual({
      error: 'Invalid ticker: not a ticker',
      code: 'INVALID_REQUEST',
      details: [{ field: 'ticker', message: 'Invalid ticker: not a ticker' }]
    });
    expect(mockRun).not.toHaveBeenCalled();
  });

  it('should reject a lookback beyond the limit with 400', async () => {
    const response = await getSentiment(createEvent('AAPL', { days: '45' }));
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(400);
    expect(body.details).toEqual([{ field: 'days', message: 'days must be an integer from 1 to 30' }]);
  });

  it('should return 404 with coverage when no source has data', async () => {
    const coverage: SourceCoverage[] = [
      { source: 'NEWS', status: 'FAILED', itemCount: 0, failureReason: 'RATE_LIMITED', message: 'slow down' },
      { source: 'REDDIT', status: 'EMPTY', itemCount: 0 },
      { source: 'INSTITUTIONAL', status: 'EMPTY', itemCount: 0 },
      { source: 'SOCIAL', status: 'EMPTY', itemCount: 0 }
    ];
    mockRun.mockRejectedValue(new NoDataError('AAPL', RANGE_START, RANGE_END, coverage));

    const response = await getSentiment(createEvent('AAPL', { start: RANGE_START, end: RANGE_END }));
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(404);
    expect(body.code).toBe('NO_DATA');
    expect(body.error).toBe(`No sentiment data available for AAPL between ${RANGE_START} and ${RANGE_END}`);
    expect(body.coverage).toEqual(coverage);
  });

  it('should return 500 CONFIG_ERROR when a credential is missing', async () => {
    delete process.env.NEWS_API_KEY;

    const response = await getSentiment(createEvent('AAPL'));
    const body = JSON.parse(response.body);

    expect(response.statusCode).toBe(500);
    expect(body).toEqual({
      error: 'Missing credentials: NEWS_API_KEY',
      code: 'CONFIG_ERROR',
      details: [{ field: 'NEWS_API_KEY', message: 'is required while NEWS is enabled' }]
    });
    expect(mockRun).not.toHaveBeenCalled();
  });

  it('should hide unexpected errors behind a generic 500', async () => {
    mockRun.mockRejectedValue(new Error('boom'));

    const response = await getSentiment(createEvent('AAPL'));

    expect(response.statusCode).toBe(500);
    expect(JSON.parse(response.body)).toEqual({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
    expect(errorSpy).toHaveBeenCalledWith('Error building sentiment snapshot:', expect.any(Error));
  });
});
