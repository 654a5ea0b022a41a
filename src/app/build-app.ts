/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { wrapIndicatorDataSource } from './cache-wrappers.js';
import { initCache, type Clock } from '../infra/cache/index.js';
import { createSilentLogger } from '../infra/logger/index.js';
import {
  makeDatasetCache,
  makeIndicatorDataSource,
  makeIndicatorRoutes,
  makeWorldBankClient,
  withRetry,
  type StatsApiClient,
} from '../modules/indicators/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  /** Application logger. Default: silent */
  logger?: Logger;
  /** Statistics API client. Default: HTTP client with retries, built from config */
  statsClient?: StatsApiClient;
  /** Time source for cache freshness. Default: Date.now */
  now?: Clock;
}

/**
 * Application options combining Fastify options with our custom deps
 */
export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps: AppDeps;
}

const makeStatsClient = (config: AppConfig, appLogger: Logger): StatsApiClient => {
  const logger = appLogger.child({ component: 'stats-api' });
  const client = makeWorldBankClient({
    baseUrl: config.statsApi.baseUrl,
    timeoutMs: config.statsApi.timeoutMs,
    logger,
  });

  return config.statsApi.retryAttempts > 1
    ? withRetry(client, {
        maxAttempts: config.statsApi.retryAttempts,
        baseDelayMs: config.statsApi.retryBaseDelayMs,
        logger,
      })
    : client;
};

/**
 * Creates and configures the Fastify application
 * This is the composition root where all modules are wired together
 */
export const buildApp = async (options: AppOptions): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps } = options;
  const { config } = deps;
  const logger = deps.logger ?? createSilentLogger();

  const app = fastifyLib({
    ...fastifyOptions,
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Error Handling
  // ─────────────────────────────────────────────────────────────────────────────
  app.setErrorHandler((error: FastifyError, request, reply) => {
    // Handle validation errors
    if (error.validation !== undefined) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    request.log.error({ err: error }, 'Request error');

    // Handle known HTTP errors
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  // ─────────────────────────────────────────────────────────────────────────────
  // Cache
  // ─────────────────────────────────────────────────────────────────────────────
  const cacheClient = initCache({
    config: config.cache,
    logger: logger.child({ component: 'cache' }),
    ...(deps.now !== undefined && { now: deps.now }),
  });
  const datasetCache = makeDatasetCache(cacheClient);

  // ─────────────────────────────────────────────────────────────────────────────
  // Indicators
  // ─────────────────────────────────────────────────────────────────────────────
  const statsClient =
    deps.statsClient ?? makeStatsClient(config, logger);

  const dataSource = wrapIndicatorDataSource(
    makeIndicatorDataSource({
      client: statsClient,
      catalogPagination: {
        pageSize: config.statsApi.catalogPageSize,
        maxPages: config.statsApi.maxPages,
      },
      seriesPagination: {
        pageSize: config.statsApi.seriesPageSize,
        maxPages: config.statsApi.maxPages,
      },
    }),
    datasetCache
  );

  await app.register(
    makeIndicatorRoutes({
      dataSource,
      cacheControl: datasetCache,
      defaults: {
        periodStart: config.dataset.defaultPeriodStart,
        periodEnd: config.dataset.defaultPeriodEnd,
      },
      deadlineMs: config.dataset.deadlineMs,
    })
  );

  return app;
};
