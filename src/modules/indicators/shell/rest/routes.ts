/**
 * Indicators Module REST Routes
 *
 * - GET  /api/v1/entities: Entity catalog (aggregates excluded)
 * - GET  /api/v1/entities/facets: Group names and tiers usable as filters
 * - GET  /api/v1/indicators/:indicatorId/latest: Latest value per entity, as JSON or CSV
 * - POST /api/v1/cache/invalidate: Drop cached catalog or series payloads
 */

import { err, ok, type Result } from 'neverthrow';

import {
  EntitiesResponseSchema,
  ErrorResponseSchema,
  FacetsResponseSchema,
  IndicatorParamsSchema,
  InvalidateCacheBodySchema,
  InvalidateCacheResponseSchema,
  LatestQuerySchema,
  type ErrorResponse,
  type IndicatorParams,
  type InvalidateCacheBody,
  type LatestQuery,
} from './schemas.js';
import {
  createInvalidInputError,
  getHttpStatusForError,
  isFetchError,
  type IndicatorsError,
} from '../../core/errors.js';
import { buildDataset } from '../../core/usecases/build-dataset.js';
import { invalidateDatasetCache } from '../../core/usecases/invalidate-dataset-cache.js';
import { listCatalogFacets } from '../../core/usecases/list-catalog-facets.js';
import { csvFileName, formatJoinedRowsAsCsv } from '../export/csv.js';

import type { DatasetCacheControl, IndicatorDataSource } from '../../core/ports.js';
import type { CacheInvalidationTarget, JoinedRowFilter } from '../../core/types.js';
import type { FastifyPluginAsync, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface PeriodDefaults {
  periodStart: number;
  periodEnd: number;
}

export interface MakeIndicatorRoutesDeps {
  dataSource: IndicatorDataSource;
  cacheControl: DatasetCacheControl;
  defaults: PeriodDefaults;
  /** Overall deadline for one dataset build */
  deadlineMs?: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toErrorResponse = (error: IndicatorsError): ErrorResponse => ({
  ok: false,
  error: error.type,
  ...(isFetchError(error) && { kind: error.kind }),
  message: error.message,
});

const sendError = (reply: FastifyReply, error: IndicatorsError) => {
  if (isFetchError(error)) {
    reply.log.warn({ err: error }, `Upstream request failed: ${error.message}`);
  }
  return reply.status(getHttpStatusForError(error)).send(toErrorResponse(error));
};

const ERROR_RESPONSES = {
  400: ErrorResponseSchema,
  500: ErrorResponseSchema,
  502: ErrorResponseSchema,
  504: ErrorResponseSchema,
} as const;

/**
 * Maps the request body to an invalidation target.
 * Period bounds fall back to the configured defaults when only an indicator is given.
 */
export const toInvalidationTarget = (
  body: InvalidateCacheBody,
  defaults: PeriodDefaults
): Result<CacheInvalidationTarget, IndicatorsError> => {
  const hasSeriesFields =
    body.indicatorId !== undefined ||
    body.periodStart !== undefined ||
    body.periodEnd !== undefined;

  if (body.scope !== 'series') {
    if (hasSeriesFields) {
      return err(
        createInvalidInputError(
          'scope',
          `Indicator and period fields are only accepted with scope 'series'`
        )
      );
    }
    const target: CacheInvalidationTarget =
      body.scope === 'all' ? { scope: 'all' } : { scope: 'catalog' };
    return ok(target);
  }

  if (!hasSeriesFields) {
    const target: CacheInvalidationTarget = { scope: 'series' };
    return ok(target);
  }

  if (body.indicatorId === undefined) {
    return err(
      createInvalidInputError('indicatorId', 'indicatorId is required when periods are given')
    );
  }

  const target: CacheInvalidationTarget = {
    scope: 'series',
    series: {
      indicator_id: body.indicatorId,
      period_start: body.periodStart ?? defaults.periodStart,
      period_end: body.periodEnd ?? defaults.periodEnd,
    },
  };
  return ok(target);
};

// ─────────────────────────────────────────────────────────────────────────────
// Routes Factory
// ─────────────────────────────────────────────────────────────────────────────

export const makeIndicatorRoutes = (deps: MakeIndicatorRoutesDeps): FastifyPluginAsync => {
  const { dataSource, cacheControl, defaults, deadlineMs } = deps;

  return async (fastify) => {
    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entities
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/entities',
      {
        schema: {
          response: { 200: EntitiesResponseSchema, ...ERROR_RESPONSES },
        },
      },
      async (_request, reply) => {
        const result = await dataSource.loadCatalog();
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/entities/facets
    // ─────────────────────────────────────────────────────────────────────────
    fastify.get(
      '/api/v1/entities/facets',
      {
        schema: {
          response: { 200: FacetsResponseSchema, ...ERROR_RESPONSES },
        },
      },
      async (_request, reply) => {
        const result = await listCatalogFacets({ dataSource });
        if (result.isErr()) {
          return sendError(reply, result.error);
        }
        return reply.send({ ok: true, data: result.value });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // GET /api/v1/indicators/:indicatorId/latest
    // ─────────────────────────────────────────────────────────────────────────
    // No 200 schema: the body is either JSON or CSV text depending on `format`.
    fastify.get<{ Params: IndicatorParams; Querystring: LatestQuery }>(
      '/api/v1/indicators/:indicatorId/latest',
      {
        schema: {
          params: IndicatorParamsSchema,
          querystring: LatestQuerySchema,
          response: ERROR_RESPONSES,
        },
      },
      async (request, reply) => {
        const { indicatorId } = request.params;
        const { periodStart, periodEnd, group, tier, format } = request.query;

        const filter: JoinedRowFilter = {
          ...(group !== undefined && { group_name: group }),
          ...(tier !== undefined && { tier }),
        };

        const result = await buildDataset(
          { dataSource, ...(deadlineMs !== undefined && { deadlineMs }) },
          {
            indicator_id: indicatorId,
            period_start: periodStart ?? defaults.periodStart,
            period_end: periodEnd ?? defaults.periodEnd,
            filter,
          }
        );

        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        const dataset = result.value;
        request.log.info(
          { indicatorId: dataset.indicator_id, rows: dataset.rows.length, format: format ?? 'json' },
          'Dataset built'
        );

        if (format === 'csv') {
          return reply
            .header('content-type', 'text/csv; charset=utf-8')
            .header(
              'content-disposition',
              `attachment; filename="${csvFileName(dataset.indicator_id)}"`
            )
            .send(formatJoinedRowsAsCsv(dataset.rows));
        }

        return reply.send({ ok: true, data: dataset });
      }
    );

    // ─────────────────────────────────────────────────────────────────────────
    // POST /api/v1/cache/invalidate
    // ─────────────────────────────────────────────────────────────────────────
    fastify.post<{ Body: InvalidateCacheBody }>(
      '/api/v1/cache/invalidate',
      {
        schema: {
          body: InvalidateCacheBodySchema,
          response: { 200: InvalidateCacheResponseSchema, ...ERROR_RESPONSES },
        },
      },
      async (request, reply) => {
        const target = toInvalidationTarget(request.body, defaults);
        if (target.isErr()) {
          return sendError(reply, target.error);
        }

        const result = await invalidateDatasetCache({ cache: cacheControl }, target.value);
        if (result.isErr()) {
          return sendError(reply, result.error);
        }

        request.log.info({ target: target.value, removed: result.value.removed }, 'Cache invalidated');
        return reply.send({ ok: true, data: result.value });
      }
    );
  };
};
