/**
 * Indicators Module REST API - TypeBox Schemas
 */

import { Type, type Static } from '@sinclair/typebox';

// ─────────────────────────────────────────────────────────────────────────────
// Request Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const IndicatorParamsSchema = Type.Object(
  {
    indicatorId: Type.String({
      minLength: 1,
      maxLength: 64,
      pattern: '^[A-Za-z0-9._]+$',
      description: 'Indicator code, e.g. SP.POP.TOTL',
    }),
  },
  { additionalProperties: false }
);

export type IndicatorParams = Static<typeof IndicatorParamsSchema>;

export const LatestQuerySchema = Type.Object(
  {
    periodStart: Type.Optional(Type.Integer({ description: 'First period, inclusive' })),
    periodEnd: Type.Optional(Type.Integer({ description: 'Last period, inclusive' })),
    group: Type.Optional(Type.String({ minLength: 1, description: 'Keep rows of this group name' })),
    tier: Type.Optional(Type.String({ minLength: 1, description: 'Keep rows of this tier' })),
    format: Type.Optional(Type.Union([Type.Literal('json'), Type.Literal('csv')])),
  },
  { additionalProperties: false }
);

export type LatestQuery = Static<typeof LatestQuerySchema>;

export const InvalidateCacheBodySchema = Type.Object(
  {
    scope: Type.Union([Type.Literal('all'), Type.Literal('catalog'), Type.Literal('series')]),
    indicatorId: Type.Optional(Type.String({ minLength: 1, maxLength: 64 })),
    periodStart: Type.Optional(Type.Integer()),
    periodEnd: Type.Optional(Type.Integer()),
  },
  { additionalProperties: false }
);

export type InvalidateCacheBody = Static<typeof InvalidateCacheBodySchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Response Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const EntitySchema = Type.Object({
  key: Type.String(),
  display_name: Type.String(),
  group_id: Type.String(),
  group_name: Type.String(),
  tier: Type.String(),
});

export const EntitiesResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Array(EntitySchema),
});

export const FacetsResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    groups: Type.Array(Type.String()),
    tiers: Type.Array(Type.String()),
  }),
});

export const InvalidateCacheResponseSchema = Type.Object({
  ok: Type.Literal(true),
  data: Type.Object({
    removed: Type.Integer({ minimum: 0 }),
  }),
});

export const ErrorResponseSchema = Type.Object({
  ok: Type.Literal(false),
  error: Type.String(),
  kind: Type.Optional(Type.String()),
  message: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;
