/**
 * HTTP Client for source fetchers
 *
 * Provides HTTP request functionality with:
 * - Timeout handling and caller cancellation
 * - Error categorization into FetchError reasons
 * - Retry logic with exponential backoff, honouring Retry-After
 */

import { FetchError, FetchFailureReason } from '../types/errors';
import { FetchSettings } from '../types/config';
import { SourceId } from '../types/sentiment';
import { isRecord } from '../utils/json';

export type HttpMethod = 'GET' | 'POST';

export type FetchFunction = typeof fetch;

/**
 * Configuration for a single request
 */
export interface HttpRequestConfig {
  method?: HttpMethod;
  url: string;
  params?: Record<string, string>;
  headers?: Record<string, string>;
  /** Sent as application/x-www-form-urlencoded */
  form?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  data: unknown;
  status: number;
  headers: Record<string, string>;
  latencyMs: number;
}

/**
 * Default request settings
 */
export const DEFAULT_FETCH_SETTINGS: FetchSettings = {
  timeoutMs: 10000,
  maxRetries: 2,
  initialRetryDelayMs: 500,
  maxRetryDelayMs: 8000
};

const RETRYABLE_REASONS: FetchFailureReason[] = ['NETWORK', 'TIMEOUT', 'RATE_LIMITED'];

const BACKOFF_MULTIPLIER = 2;

/**
 * HTTP client bound to one source, so every failure is attributed to it
 */
export class HttpClient {
  private readonly settings: FetchSettings;

  constructor(
    private readonly source: SourceId,
    settings: Partial<FetchSettings> = {},
    private readonly fetchImpl: FetchFunction = fetch
  ) {
    this.settings = { ...DEFAULT_FETCH_SETTINGS, ...settings };
  }

  /**
   * Execute a request with timeout and error handling
   */
  async request(config: HttpRequestConfig): Promise<HttpResponse> {
    const startTime = Date.now();
    const timeoutMs = config.timeoutMs ?? this.settings.timeoutMs;

    if (config.signal?.aborted) {
      throw this.cancelled();
    }

    const headers: Record<string, string> = { Accept: 'application/json', ...config.headers };
    let body: string | undefined;
    if (config.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(config.form).toString();
    }

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCallerAbort = (): void => controller.abort();
    config.signal?.addEventListener('abort', onCallerAbort);

    try {
      const response = await this.fetchImpl(this.buildUrl(config.url, config.params), {
        method: config.method ?? 'GET',
        headers,
        body,
        signal: controller.signal
      });
      const latencyMs = Date.now() - startTime;

      const responseHeaders: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        responseHeaders[key.toLowerCase()] = value;
      });

      if (!response.ok) {
        const errorBody = await this.safeParseJson(response);
        throw this.createErrorFromResponse(response.status, errorBody, responseHeaders);
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        throw new FetchError(
          `Response from ${this.source} source is not valid JSON`,
          this.source,
          'INVALID_RESPONSE',
          response.status,
          false,
          undefined,
          error
        );
      }

      return { data, status: response.status, headers: responseHeaders, latencyMs };
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      if (config.signal?.aborted) {
        throw this.cancelled();
      }
      throw this.categorizeError(error, timedOut, Date.now() - startTime);
    } finally {
      clearTimeout(timeoutId);
      config.signal?.removeEventListener('abort', onCallerAbort);
    }
  }

  /**
   * Execute a request with retry logic and exponential backoff
   *
   * Formula: delay = initialRetryDelayMs * (2 ^ attemptNumber), capped at maxRetryDelayMs.
   * A Retry-After within maxRetryDelayMs lengthens the delay; a longer one is not retried.
   */
  async requestWithRetry(config: HttpRequestConfig): Promise<HttpResponse> {
    let lastError: FetchError | undefined;

    for (let attempt = 0; attempt <= this.settings.maxRetries; attempt++) {
      try {
        return await this.request(config);
      } catch (error) {
        if (!(error instanceof FetchError)) {
          throw error;
        }
        lastError = error;

        if (!this.shouldRetry(error, attempt)) {
          throw error;
        }

        // a server asking for a longer pause than we allow ends the request
        if (error.retryAfterMs !== undefined && error.retryAfterMs > this.settings.maxRetryDelayMs) {
          throw error;
        }

        const delay = Math.max(this.calculateRetryDelay(attempt), error.retryAfterMs ?? 0);
        await this.sleep(delay, config.signal);
      }
    }

    throw lastError ?? new FetchError('Max retries exceeded', this.source, 'NETWORK');
  }

  calculateRetryDelay(attemptNumber: number): number {
    const delay = this.settings.initialRetryDelayMs * Math.pow(BACKOFF_MULTIPLIER, attemptNumber);
    return Math.min(delay, this.settings.maxRetryDelayMs);
  }

  private shouldRetry(error: FetchError, attemptNumber: number): boolean {
    if (attemptNumber >= this.settings.maxRetries) {
      return false;
    }
    return error.retryable && RETRYABLE_REASONS.includes(error.reason);
  }

  private buildUrl(url: string, params?: Record<string, string>): string {
    if (!params || Object.keys(params).length === 0) {
      return url;
    }
    const separator = url.includes('?') ? '&' : '?';
    return `${url}${separator}${new URLSearchParams(params).toString()}`;
  }

  private async safeParseJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return null;
    }
  }

  private createErrorFromResponse(
    status: number,
    body: unknown,
    headers: Record<string, string>
  ): FetchError {
    const reason = this.categorizeStatusCode(status);
    const message = `${this.source} source responded with ${this.extractErrorMessage(body, status)}`;

    return new FetchError(
      message,
      this.source,
      reason,
      status,
      reason === 'RATE_LIMITED' || (reason === 'NETWORK' && status >= 500),
      this.parseRetryAfter(headers),
      body
    );
  }

  /**
   * 401/403 are credential problems, 429 is throttling, 5xx is transient
   */
  private categorizeStatusCode(status: number): FetchFailureReason {
    if (status === 429) {
      return 'RATE_LIMITED';
    }
    if (status === 401 || status === 403) {
      return 'AUTH';
    }
    if (status >= 500) {
      return 'NETWORK';
    }
    return 'INVALID_RESPONSE';
  }

  private extractErrorMessage(body: unknown, status: number): string {
    if (isRecord(body)) {
      if (typeof body.message === 'string') {
        return `HTTP ${status}: ${body.message}`;
      }
      if (typeof body.error === 'string') {
        return `HTTP ${status}: ${body.error}`;
      }
    }
    return `HTTP ${status}`;
  }

  /**
   * Parse retry-after header value to milliseconds
   */
  private parseRetryAfter(headers: Record<string, string>): number | undefined {
    const retryAfter = headers['retry-after'];
    if (!retryAfter) {
      return undefined;
    }

    const seconds = parseInt(retryAfter, 10);
    if (!isNaN(seconds)) {
      return seconds * 1000;
    }

    const date = new Date(retryAfter);
    if (!isNaN(date.getTime())) {
      const delayMs = date.getTime() - Date.now();
      return delayMs > 0 ? delayMs : undefined;
    }

    return undefined;
  }

  private categorizeError(error: unknown, timedOut: boolean, latencyMs: number): FetchError {
    if (timedOut) {
      return new FetchError(
        `${this.source} request timed out after ${latencyMs}ms`,
        this.source,
        'TIMEOUT',
        undefined,
        true,
        undefined,
        error
      );
    }

    return new FetchError(
      `${this.source} network error: ${error instanceof Error ? error.message : 'Unknown error'}`,
      this.source,
      'NETWORK',
      undefined,
      true,
      undefined,
      error
    );
  }

  private cancelled(): FetchError {
    return new FetchError(`${this.source} request cancelled`, this.source, 'CANCELLED');
  }

  /**
   * Wait between attempts; rejects with CANCELLED when the caller aborts
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(this.cancelled());
    }
    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        clearTimeout(timer);
        reject(this.cancelled());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
