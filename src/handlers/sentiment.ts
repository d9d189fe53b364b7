import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig } from '../config/config';
import {
  DynamoSnapshotStore,
  InMemorySnapshotStore,
  SnapshotStore
} from '../repositories/snapshot';
import { DashboardRequests } from '../services/dashboard-request';
import { SentimentPipeline } from '../services/sentiment-pipeline';
import { SourceCoverage } from '../types/dashboard';
import {
  ConfigError,
  ConfigIssue,
  NoDataError,
  RequestValidationError
} from '../types/errors';

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
  details?: ConfigIssue[];
  coverage?: SourceCoverage[];
}

/**
 * Common CORS headers for all responses
 */
const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type,Authorization',
  'Access-Control-Allow-Methods': 'GET,OPTIONS'
};

/**
 * Create a success response
 */
function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

/**
 * Create an error response
 */
function errorResponse(
  statusCode: number,
  message: string,
  code: string,
  extra: Pick<ErrorResponseBody, 'details' | 'coverage'> = {}
): APIGatewayProxyResult {
  const body: ErrorResponseBody = {
    error: message,
    code,
    ...extra
  };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

/**
 * SNAPSHOT_STORE=memory keeps snapshots in the Lambda container instead of DynamoDB
 */
const snapshotStore: SnapshotStore = process.env.SNAPSHOT_STORE === 'memory'
  ? new InMemorySnapshotStore()
  : new DynamoSnapshotStore();

/**
 * Parts of the API Gateway event the handler reads
 */
export type SentimentEvent = Pick<APIGatewayProxyEvent, 'pathParameters' | 'queryStringParameters'>;

/**
 * GET /sentiment/{ticker}
 *
 * Query parameters: days, or start and end (ISO-8601); optional window (e.g. 1h, 1d).
 */
export async function getSentiment(
  event: SentimentEvent
): Promise<APIGatewayProxyResult> {
  try {
    const config = loadConfig();
    const query = event.queryStringParameters ?? {};
    const request = DashboardRequests.resolve({
      ticker: event.pathParameters?.ticker,
      days: query.days,
      start: query.start,
      end: query.end,
      window: query.window
    }, config);

    const pipeline = new SentimentPipeline(config, { store: snapshotStore });
    const snapshot = await pipeline.run(request);

    return successResponse(snapshot);
  } catch (error) {
    if (error instanceof RequestValidationError) {
      return errorResponse(400, error.message, 'INVALID_REQUEST', {
        details: [{ field: error.field, message: error.message }]
      });
    }
    if (error instanceof RangeError) {
      return errorResponse(400, error.message, 'INVALID_REQUEST');
    }
    if (error instanceof NoDataError) {
      return errorResponse(404, error.message, 'NO_DATA', { coverage: error.coverage });
    }
    if (error instanceof ConfigError) {
      console.error('Sentiment service is misconfigured:', error.issues);
      return errorResponse(500, error.message, 'CONFIG_ERROR', { details: error.issues });
    }
    console.error('Error building sentiment snapshot:', error);
    return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
  }
}
