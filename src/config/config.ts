/**
 * Configuration loader
 *
 * Reads source weights, trend settings and API credentials from environment
 * variables, validates them against a JSON schema and returns an explicit
 * SentimentConfig for the pipeline. Any problem raises ConfigError before a
 * single fetch is attempted.
 */

import Ajv, { ErrorObject } from 'ajv';
import { ConfigSettings, ConfigSettingsSchema } from '../schemas/config';
import { SentimentConfig, SourceCredentials } from '../types/config';
import { ConfigError, ConfigIssue } from '../types/errors';
import { SOURCE_IDS, SourceId, WeightConfig } from '../types/sentiment';
import { countWindows, DAY_MS, MAX_TREND_WINDOWS, parseDuration } from '../utils/duration';
import { DEFAULT_FETCH_SETTINGS } from '../adapters/http-client';

export type Environment = Record<string, string | undefined>;

/**
 * Default weights: institutional commentary counts most, social chatter least
 */
export const DEFAULT_WEIGHTS: WeightConfig = {
  NEWS: 0.3,
  REDDIT: 0.3,
  INSTITUTIONAL: 0.7,
  SOCIAL: 0.2
};

export const DEFAULT_SETTINGS: ConfigSettings = {
  newsWeight: DEFAULT_WEIGHTS.NEWS,
  redditWeight: DEFAULT_WEIGHTS.REDDIT,
  institutionalWeight: DEFAULT_WEIGHTS.INSTITUTIONAL,
  socialWeight: DEFAULT_WEIGHTS.SOCIAL,
  neutralityBand: 0.1,
  trendWindowMs: DAY_MS,
  defaultLookbackDays: 7,
  snapshotTtlSeconds: 3600,
  fetchTimeoutMs: DEFAULT_FETCH_SETTINGS.timeoutMs,
  fetchMaxRetries: DEFAULT_FETCH_SETTINGS.maxRetries
};

/**
 * Environment variable for each setting
 */
const SETTING_VARIABLES: Record<keyof ConfigSettings, string> = {
  newsWeight: 'NEWS_WEIGHT',
  redditWeight: 'REDDIT_WEIGHT',
  institutionalWeight: 'INSTITUTIONAL_WEIGHT',
  socialWeight: 'SOCIAL_WEIGHT',
  neutralityBand: 'NEUTRALITY_BAND',
  trendWindowMs: 'TREND_WINDOW',
  defaultLookbackDays: 'DEFAULT_LOOKBACK_DAYS',
  snapshotTtlSeconds: 'SNAPSHOT_TTL_SECONDS',
  fetchTimeoutMs: 'FETCH_TIMEOUT_MS',
  fetchMaxRetries: 'FETCH_MAX_RETRIES'
};

/**
 * Credentials each source needs when it has a positive weight
 */
const REQUIRED_CREDENTIALS: Record<SourceId, Array<{ field: keyof SourceCredentials; variable: string }>> = {
  NEWS: [{ field: 'newsApiKey', variable: 'NEWS_API_KEY' }],
  INSTITUTIONAL: [{ field: 'alphaVantageKey', variable: 'ALPHA_VANTAGE_KEY' }],
  REDDIT: [
    { field: 'redditClientId', variable: 'REDDIT_CLIENT_ID' },
    { field: 'redditClientSecret', variable: 'REDDIT_CLIENT_SECRET' },
    { field: 'redditUserAgent', variable: 'REDDIT_USER_AGENT' }
  ],
  SOCIAL: []
};

const ajv = new Ajv({ allErrors: true });
const validateSettings = ajv.compile<ConfigSettings>(ConfigSettingsSchema);

/**
 * Load and validate configuration
 *
 * @param env - Environment variables (default: process.env)
 * @throws ConfigError listing every invalid setting or missing credential
 */
export function loadConfig(env: Environment = process.env): SentimentConfig {
  const settings = readSettings(env);

  if (!validateSettings(settings)) {
    const issues = convertErrors(validateSettings.errors);
    throw new ConfigError(
      `Invalid configuration: ${issues.map(i => `${i.field} ${i.message}`).join('; ')}`,
      issues
    );
  }

  const lookbackWindows = countWindows(settings.defaultLookbackDays * DAY_MS, settings.trendWindowMs);
  if (lookbackWindows > MAX_TREND_WINDOWS) {
    throw new ConfigError(
      `Invalid configuration: TREND_WINDOW yields ${lookbackWindows} windows over DEFAULT_LOOKBACK_DAYS`,
      [{
        field: SETTING_VARIABLES.trendWindowMs,
        message: `must split the default lookback into at most ${MAX_TREND_WINDOWS} windows`
      }]
    );
  }

  const weights: WeightConfig = {
    NEWS: settings.newsWeight,
    REDDIT: settings.redditWeight,
    INSTITUTIONAL: settings.institutionalWeight,
    SOCIAL: settings.socialWeight
  };
  const enabledSources = SOURCE_IDS.filter(source => weights[source] > 0);
  if (enabledSources.length === 0) {
    throw new ConfigError('At least one source weight must be positive', [
      { field: 'weights', message: 'all source weights are zero' }
    ]);
  }

  const credentials = readCredentials(env);
  const missing: ConfigIssue[] = [];
  for (const source of enabledSources) {
    for (const { field, variable } of REQUIRED_CREDENTIALS[source]) {
      if (!credentials[field]) {
        missing.push({ field: variable, message: `is required while ${source} is enabled` });
      }
    }
  }
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing credentials: ${missing.map(i => i.field).join(', ')}`,
      missing
    );
  }

  return {
    weights,
    neutralityBand: settings.neutralityBand,
    trendWindowMs: settings.trendWindowMs,
    defaultLookbackDays: settings.defaultLookbackDays,
    snapshotTtlSeconds: settings.snapshotTtlSeconds,
    credentials,
    fetch: {
      ...DEFAULT_FETCH_SETTINGS,
      timeoutMs: settings.fetchTimeoutMs,
      maxRetries: settings.fetchMaxRetries
    },
    enabledSources
  };
}

/**
 * Collect settings, leaving unparseable values as strings for the schema to reject
 */
function readSettings(env: Environment): Record<keyof ConfigSettings, unknown> {
  const read = (key: keyof ConfigSettings): unknown => {
    const raw = env[SETTING_VARIABLES[key]];
    if (raw === undefined || raw.trim() === '') {
      return DEFAULT_SETTINGS[key];
    }
    if (key === 'trendWindowMs') {
      return parseDuration(raw) ?? raw;
    }
    const parsed = Number(raw);
    return Number.isNaN(parsed) ? raw : parsed;
  };

  return {
    newsWeight: read('newsWeight'),
    redditWeight: read('redditWeight'),
    institutionalWeight: read('institutionalWeight'),
    socialWeight: read('socialWeight'),
    neutralityBand: read('neutralityBand'),
    trendWindowMs: read('trendWindowMs'),
    defaultLookbackDays: read('defaultLookbackDays'),
    snapshotTtlSeconds: read('snapshotTtlSeconds'),
    fetchTimeoutMs: read('fetchTimeoutMs'),
    fetchMaxRetries: read('fetchMaxRetries')
  };
}

function readCredentials(env: Environment): SourceCredentials {
  const value = (name: string): string | undefined => {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
  };

  return {
    newsApiKey: value('NEWS_API_KEY'),
    alphaVantageKey: value('ALPHA_VANTAGE_KEY'),
    redditClientId: value('REDDIT_CLIENT_ID'),
    redditClientSecret: value('REDDIT_CLIENT_SECRET'),
    redditUserAgent: value('REDDIT_USER_AGENT')
  };
}

/**
 * Converts AJV errors to config issues keyed by environment variable
 */
function convertErrors(errors: ErrorObject[] | null | undefined): ConfigIssue[] {
  if (!errors) return [];

  return errors.map((error) => {
    const key = error.instancePath.replace(/^\//, '');
    const variable = isSettingKey(key) ? SETTING_VARIABLES[key] : key || '/';
    return {
      field: variable,
      message: error.message || 'Unknown validation error'
    };
  });
}

function isSettingKey(key: string): key is keyof ConfigSettings {
  return Object.prototype.hasOwnProperty.call(SETTING_VARIABLES, key);
}
