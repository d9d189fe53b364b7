/**
 * JSON Schema for dashboard settings read from the environment.
 */

export interface ConfigSettings {
  newsWeight: number;
  redditWeight: number;
  institutionalWeight: number;
  socialWeight: number;
  neutralityBand: number;
  trendWindowMs: number;
  defaultLookbackDays: number;
  snapshotTtlSeconds: number;
  fetchTimeoutMs: number;
  fetchMaxRetries: number;
}

const weight = { type: 'number', minimum: 0 } as const;

export const ConfigSettingsSchema = {
  type: 'object',
  required: [
    'newsWeight',
    'redditWeight',
    'institutionalWeight',
    'socialWeight',
    'neutralityBand',
    'trendWindowMs',
    'defaultLookbackDays',
    'snapshotTtlSeconds',
    'fetchTimeoutMs',
    'fetchMaxRetries'
  ],
  properties: {
    newsWeight: weight,
    redditWeight: weight,
    institutionalWeight: weight,
    socialWeight: weight,
    neutralityBand: {
      type: 'number',
      minimum: 0,
      exclusiveMaximum: 1
    },
    trendWindowMs: {
      type: 'integer',
      minimum: 1
    },
    defaultLookbackDays: {
      type: 'integer',
      minimum: 1,
      maximum: 30
    },
    snapshotTtlSeconds: {
      type: 'integer',
      minimum: 0
    },
    fetchTimeoutMs: {
      type: 'integer',
      minimum: 1
    },
    fetchMaxRetries: {
      type: 'integer',
      minimum: 0,
      maximum: 10
    }
  },
  additionalProperties: false
} as const;
