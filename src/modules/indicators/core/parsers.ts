/**
 * Parsing of upstream page envelopes and records into domain shapes.
 */

import { Type, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { err, ok, type Result } from 'neverthrow';

import { createMalformedResponseError, type MalformedResponseError } from './errors.js';

import type { Entity, Observation, PageEnvelope } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Upstream Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const EntityRecordSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  region: Type.Object({ id: Type.String(), value: Type.String() }),
  incomeLevel: Type.Object({ value: Type.String() }),
});

export const ObservationRecordSchema = Type.Object({
  countryiso3code: Type.String({ minLength: 1 }),
  date: Type.Union([Type.Integer(), Type.String({ pattern: '^\\s*-?\\d+\\s*$' })]),
  value: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

/** Error envelope: `[{ message: [{ id, key, value }] }]` */
export const ApiMessageSchema = Type.Object({
  message: Type.Array(
    Type.Object({
      id: Type.Optional(Type.String()),
      key: Type.Optional(Type.String()),
      value: Type.Optional(Type.String()),
    })
  ),
});

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const isRecordObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const describeSchemaError = (schema: TSchema, value: unknown): string => {
  const first = Value.Errors(schema, value).First();
  if (first === undefined) {
    return 'unexpected shape';
  }
  return first.path === '' ? first.message : `${first.path}: ${first.message}`;
};

const toCount = (value: unknown): number | undefined => {
  const count = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
    return undefined;
  }
  return count;
};

const extractApiMessage = (metadata: unknown): string | undefined => {
  if (!Value.Check(ApiMessageSchema, metadata)) {
    return undefined;
  }
  const parts = metadata.message
    .map((entry) => entry.value ?? entry.key ?? entry.id)
    .filter((part): part is string => part !== undefined && part !== '');
  return parts.length > 0 ? parts.join('; ') : 'unknown error';
};

// ─────────────────────────────────────────────────────────────────────────────
// Envelope
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Interprets one page body.
 *
 * - `[metadata, records]` with a numeric `metadata.total` → the envelope
 * - any other shape (not an array, fewer than two elements, records not a list) → `null`,
 *   which means there are no more pages
 * - an upstream error message, or metadata without a usable `total` → error
 */
export const parsePageEnvelope = (
  body: unknown
): Result<PageEnvelope | null, MalformedResponseError> => {
  if (!Array.isArray(body)) {
    return ok(null);
  }

  const metadata: unknown = body[0];
  const records: unknown = body[1];

  const apiMessage = extractApiMessage(metadata);
  if (apiMessage !== undefined) {
    return err(createMalformedResponseError(`Statistics API returned an error: ${apiMessage}`));
  }

  if (body.length < 2 || !Array.isArray(records)) {
    return ok(null);
  }

  if (!isRecordObject(metadata)) {
    return err(createMalformedResponseError('Page metadata is not an object'));
  }

  const total = toCount(metadata['total']);
  if (total === undefined) {
    return err(
      createMalformedResponseError('Page metadata has no valid record total', metadata['total'])
    );
  }

  return ok({ total, records });
};

// ─────────────────────────────────────────────────────────────────────────────
// Records
// ─────────────────────────────────────────────────────────────────────────────

export const parseEntityRecord = (
  record: unknown,
  index: number
): Result<Entity, MalformedResponseError> => {
  if (!Value.Check(EntityRecordSchema, record)) {
    return err(
      createMalformedResponseError(
        `Entity record #${String(index)} is invalid (${describeSchemaError(EntityRecordSchema, record)})`
      )
    );
  }

  return ok({
    key: record.id.trim(),
    display_name: record.name.trim(),
    group_id: record.region.id.trim(),
    group_name: record.region.value.trim(),
    tier: record.incomeLevel.value.trim(),
  });
};

/**
 * Parses one observation record.
 * Returns `ok(null)` for rows to drop: empty rows and rows without an entity key.
 */
export const parseObservationRecord = (
  record: unknown,
  index: number
): Result<Observation | null, MalformedResponseError> => {
  if (record === null || record === undefined) {
    return ok(null);
  }

  if (isRecordObject(record)) {
    const key = record['countryiso3code'];
    if (key === undefined || key === null || (typeof key === 'string' && key.trim() === '')) {
      return ok(null);
    }
  }

  if (!Value.Check(ObservationRecordSchema, record)) {
    return err(
      createMalformedResponseError(
        `Observation record #${String(index)} is invalid (${describeSchemaError(ObservationRecordSchema, record)})`
      )
    );
  }

  const period =
    typeof record.date === 'number' ? record.date : Number.parseInt(record.date.trim(), 10);

  return ok({
    entity_key: record.countryiso3code.trim(),
    period,
    value: record.value ?? null,
  });
};
