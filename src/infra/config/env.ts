/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import {
  DEFAULT_CATALOG_PAGE_SIZE,
  DEFAULT_MAX_PAGES,
  DEFAULT_SERIES_PAGE_SIZE,
} from '../../modules/indicators/core/types.js';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Integer({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Upstream statistics API
  STATS_API_BASE_URL: Type.String({ minLength: 1 }),
  STATS_API_TIMEOUT_MS: Type.Integer({ minimum: 1 }),
  STATS_API_MAX_PAGES: Type.Integer({ minimum: 1 }),
  STATS_API_RETRY_ATTEMPTS: Type.Integer({ minimum: 1, maximum: 10 }),
  STATS_API_RETRY_BASE_DELAY_MS: Type.Integer({ minimum: 0 }),
  CATALOG_PAGE_SIZE: Type.Integer({ minimum: 1 }),
  SERIES_PAGE_SIZE: Type.Integer({ minimum: 1 }),

  // Dataset defaults
  DEFAULT_PERIOD_START: Type.Integer(),
  DEFAULT_PERIOD_END: Type.Integer(),
  DATASET_DEADLINE_MS: Type.Integer({ minimum: 1 }),

  // Cache
  CACHE_BACKEND: Type.Union([Type.Literal('memory'), Type.Literal('disabled')]),
  CACHE_TTL_MS: Type.Integer({ minimum: 0 }),
  CACHE_MAX_ENTRIES: Type.Integer({ minimum: 1 }),
  CACHE_KEY_PREFIX: Type.String({ minLength: 1 }),
  CACHE_SERVE_STALE_ON_ERROR: Type.Boolean(),
});

export type Env = Static<typeof EnvSchema>;

const DEFAULT_STATS_API_BASE_URL = 'https://api.worldbank.org/v2';
/** 24 hours */
const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

const readString = (value: string | undefined, defaultValue: string): string =>
  value !== undefined && value !== '' ? value : defaultValue;

/**
 * Numbers are parsed strictly: a malformed value becomes NaN and fails validation
 * instead of silently falling back to the default.
 */
const readNumber = (value: string | undefined, defaultValue: number): number =>
  value !== undefined && value !== '' ? Number(value) : defaultValue;

const readBoolean = (value: string | undefined, defaultValue: boolean): boolean | string => {
  if (value === undefined || value === '') return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: readString(env['NODE_ENV'], 'development'),
    PORT: readNumber(env['PORT'], 3000),
    HOST: readString(env['HOST'], '0.0.0.0'),
    LOG_LEVEL: readString(env['LOG_LEVEL'], 'info'),
    STATS_API_BASE_URL: readString(env['STATS_API_BASE_URL'], DEFAULT_STATS_API_BASE_URL),
    STATS_API_TIMEOUT_MS: readNumber(env['STATS_API_TIMEOUT_MS'], 120_000),
    STATS_API_MAX_PAGES: readNumber(env['STATS_API_MAX_PAGES'], DEFAULT_MAX_PAGES),
    STATS_API_RETRY_ATTEMPTS: readNumber(env['STATS_API_RETRY_ATTEMPTS'], 3),
    STATS_API_RETRY_BASE_DELAY_MS: readNumber(env['STATS_API_RETRY_BASE_DELAY_MS'], 500),
    CATALOG_PAGE_SIZE: readNumber(env['CATALOG_PAGE_SIZE'], DEFAULT_CATALOG_PAGE_SIZE),
    SERIES_PAGE_SIZE: readNumber(env['SERIES_PAGE_SIZE'], DEFAULT_SERIES_PAGE_SIZE),
    DEFAULT_PERIOD_START: readNumber(env['DEFAULT_PERIOD_START'], 2010),
    DEFAULT_PERIOD_END: readNumber(env['DEFAULT_PERIOD_END'], 2028),
    DATASET_DEADLINE_MS: readNumber(env['DATASET_DEADLINE_MS'], 300_000),
    CACHE_BACKEND: readString(env['CACHE_BACKEND'], 'memory').toLowerCase(),
    CACHE_TTL_MS: readNumber(env['CACHE_TTL_MS'], DEFAULT_CACHE_TTL_MS),
    CACHE_MAX_ENTRIES: readNumber(env['CACHE_MAX_ENTRIES'], 200),
    CACHE_KEY_PREFIX: readString(env['CACHE_KEY_PREFIX'], 'latest-indicators'),
    CACHE_SERVE_STALE_ON_ERROR: readBoolean(env['CACHE_SERVE_STALE_ON_ERROR'], false),
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  if (rawEnv.DEFAULT_PERIOD_START > rawEnv.DEFAULT_PERIOD_END) {
    throw new Error(
      'Invalid environment configuration: /DEFAULT_PERIOD_START: must not be after DEFAULT_PERIOD_END'
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },
  logger: {
    level: env.LOG_LEVEL,
    environment: env.NODE_ENV,
  },
  statsApi: {
    baseUrl: env.STATS_API_BASE_URL.replace(/\/+$/, ''),
    timeoutMs: env.STATS_API_TIMEOUT_MS,
    maxPages: env.STATS_API_MAX_PAGES,
    retryAttempts: env.STATS_API_RETRY_ATTEMPTS,
    retryBaseDelayMs: env.STATS_API_RETRY_BASE_DELAY_MS,
    catalogPageSize: env.CATALOG_PAGE_SIZE,
    seriesPageSize: env.SERIES_PAGE_SIZE,
  },
  dataset: {
    defaultPeriodStart: env.DEFAULT_PERIOD_START,
    defaultPeriodEnd: env.DEFAULT_PERIOD_END,
    deadlineMs: env.DATASET_DEADLINE_MS,
  },
  cache: {
    backend: env.CACHE_BACKEND,
    ttlMs: env.CACHE_TTL_MS,
    maxEntries: env.CACHE_MAX_ENTRIES,
    keyPrefix: env.CACHE_KEY_PREFIX,
    serveStaleOnError: env.CACHE_SERVE_STALE_ON_ERROR,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
