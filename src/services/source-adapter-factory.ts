/**
 * Source Adapter Factory
 *
 * Creates one fetcher per enabled source from the configuration, through a
 * dispatch table keyed by source ID.
 */

import { SentimentConfig } from '../types/config';
import { ConfigError } from '../types/errors';
import { SourceFetcher } from '../types/fetcher';
import { SourceId } from '../types/sentiment';
import { FetchFunction } from '../adapters/http-client';
import {
  InstitutionalAdapter,
  NewsAdapter,
  RedditAdapter,
  SocialAdapter,
  SourceAdapterConfig
} from '../adapters/sources';

type AdapterBuilder = (config: SentimentConfig, base: SourceAdapterConfig) => SourceFetcher;

/**
 * Error thrown when a source lacks what its adapter needs
 */
function missingCredential(source: SourceId, field: string): ConfigError {
  return new ConfigError(`${source} source is enabled but ${field} is not set`, [
    { field, message: `required when ${source} has a positive weight` }
  ]);
}

const ADAPTER_BUILDERS: Record<SourceId, AdapterBuilder> = {
  NEWS: (config, base) => {
    const apiKey = config.credentials.newsApiKey;
    if (!apiKey) {
      throw missingCredential('NEWS', 'NEWS_API_KEY');
    }
    return new NewsAdapter({ ...base, apiKey });
  },

  INSTITUTIONAL: (config, base) => {
    const alphaVantageKey = config.credentials.alphaVantageKey;
    if (!alphaVantageKey) {
      throw missingCredential('INSTITUTIONAL', 'ALPHA_VANTAGE_KEY');
    }
    return new InstitutionalAdapter({
      ...base,
      alphaVantageKey,
      newsApiKey: config.credentials.newsApiKey
    });
  },

  REDDIT: (config, base) => {
    const { redditClientId, redditClientSecret, redditUserAgent } = config.credentials;
    if (!redditClientId) {
      throw missingCredential('REDDIT', 'REDDIT_CLIENT_ID');
    }
    if (!redditClientSecret) {
      throw missingCredential('REDDIT', 'REDDIT_CLIENT_SECRET');
    }
    if (!redditUserAgent) {
      throw missingCredential('REDDIT', 'REDDIT_USER_AGENT');
    }
    return new RedditAdapter({
      ...base,
      clientId: redditClientId,
      clientSecret: redditClientSecret,
      userAgent: redditUserAgent
    });
  },

  SOCIAL: (_config, base) => new SocialAdapter(base)
};

/**
 * Source Adapter Factory
 */
export const SourceAdapterFactory = {
  /**
   * Create the adapter for one source
   *
   * @throws ConfigError if the source's credentials are missing
   */
  createAdapter(source: SourceId, config: SentimentConfig, fetchImpl?: FetchFunction): SourceFetcher {
    return ADAPTER_BUILDERS[source](config, {
      fetchSettings: config.fetch,
      ...(fetchImpl && { fetchImpl })
    });
  },

  /**
   * Create adapters for every enabled source
   */
  createAdapters(config: SentimentConfig, fetchImpl?: FetchFunction): SourceFetcher[] {
    return config.enabledSources.map(source => this.createAdapter(source, config, fetchImpl));
  }
};
