/**
 * Intent Sanitizer
 *
 * The single trust boundary between the draft producer (language model or
 * regex fallback) and the compiler. Never throws: every malformed field
 * degrades to its default.
 */

import { z } from 'zod';
import type {
  Aggregation,
  Intent,
  LocationPredicate,
  QueryType,
  RawIntent,
} from '../../../../shared/types/intent';
import {
  DEFAULT_METRIC,
  type MeasurementColumn,
} from '../../../../shared/types/measurements';
import { normalizeLocationName, type Gazetteer } from '../gazetteer';
import type { SchemaSnapshot } from '../schema/snapshot';
import {
  extractCoordinates,
  extractNearestCount,
  mentionsProximity,
} from './question-hints';
import { parseMonthName } from './time-window';
import {
  normalizeAggregation,
  normalizeMetricName,
  normalizeQueryType,
} from './vocabulary';

export interface SanitizeContext {
  schema: SchemaSnapshot;
  gazetteer: Gazetteer;
  /** Wall-clock date, only used to resolve "this year" */
  now: Date;
}

export const DEFAULT_DISTANCE_KM = 500;
export const DEFAULT_LIST_LIMIT = 5;
export const DEFAULT_BULK_LIMIT = 500;
export const MAX_LIMIT = 1000;

const EVERYWHERE: LocationPredicate = Object.freeze({ kind: 'everywhere' });

// ============================================================================
// Field Parsers
// ============================================================================

const textSchema = z.string().trim().min(1);

const integerSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/)
    .transform(Number),
]);

const decimalSchema = z.union([
  z.number().finite(),
  z
    .string()
    .trim()
    .regex(/^[+-]?\d+(?:\.\d+)?$/)
    .transform(Number),
]);

/** Accepts 700, "700", "within 700 km" */
const distanceSchema = z.union([
  z.number().finite().positive().transform(Math.round),
  z
    .string()
    .regex(/\d+(?:\.\d+)?/)
    .transform((value) => Math.round(Number(/\d+(?:\.\d+)?/.exec(value)?.[0]))),
]);

/** Accepts 2902115, "2902115", "float 2902115", "#2902115" */
const floatIdSchema = z.union([
  z.number().int().positive(),
  z
    .string()
    .trim()
    .regex(/^(?:float\s*)?#?\d+$/i)
    .transform((value) => Number(value.replace(/\D/g, ''))),
]);

function readText(value: unknown): string | undefined {
  const parsed = textSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

function readInteger(value: unknown): number | undefined {
  const parsed = integerSchema.safeParse(value);
  return parsed.success && Number.isSafeInteger(parsed.data) ? parsed.data : undefined;
}

function readDecimal(value: unknown, limit: number): number | undefined {
  const parsed = decimalSchema.safeParse(value);
  if (!parsed.success || Math.abs(parsed.data) > limit) {
    return undefined;
  }
  return parsed.data;
}

function readPositive(
  value: unknown,
  schema: z.ZodType<number, z.ZodTypeDef, unknown>
): number | undefined {
  const parsed = schema.safeParse(value);
  return parsed.success && Number.isSafeInteger(parsed.data) && parsed.data > 0
    ? parsed.data
    : undefined;
}

function readMonth(value: unknown): number | undefined {
  const numeric = readInteger(value);
  if (numeric !== undefined) {
    return numeric >= 1 && numeric <= 12 ? numeric : undefined;
  }
  const name = readText(value);
  return name ? parseMonthName(name) : undefined;
}

function readList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.flatMap((item) => {
      const text = readText(item);
      return text ? [text] : [];
    });
  }
  const text = readText(value);
  return text ? text.split(',').map((item) => item.trim()).filter(Boolean) : [];
}

function asRecord(raw: unknown): RawIntent {
  if (typeof raw === 'object' && raw !== null && !Array.isArray(raw)) {
    return Object.fromEntries(Object.entries(raw));
  }
  return {};
}

// ============================================================================
// Rules
// ============================================================================

function resolveQueryType(raw: RawIntent): QueryType {
  const tag = readText(raw.query_type);
  return (tag ? normalizeQueryType(tag) : undefined) ?? 'General';
}

function resolveAggregation(raw: RawIntent): Aggregation {
  const tag = readText(raw.aggregation);
  return (tag ? normalizeAggregation(tag) : undefined) ?? 'avg';
}

/**
 * Schema-valid metrics in request order, or every measurement column,
 * or a single default metric.
 */
function resolveMetrics(raw: RawIntent, schema: SchemaSnapshot): MeasurementColumn[] {
  const requested = Array.from(new Set(readList(raw.metrics).map(normalizeMetricName)));
  const valid = schema.pick(requested);
  if (valid.length > 0) {
    return valid;
  }

  const measurements = schema.measurementColumns();
  if (measurements.length > 0) {
    return measurements;
  }

  if (schema.has(DEFAULT_METRIC)) {
    return [DEFAULT_METRIC];
  }
  return schema.columns.slice(0, 1);
}

/**
 * A non-count Statistic aggregates numeric columns only; a request for
 * float_id or timestamp alone falls back to the measurement columns
 */
function statisticMetrics(
  metrics: MeasurementColumn[],
  schema: SchemaSnapshot
): MeasurementColumn[] {
  const numeric = metrics.filter((metric) => metric !== 'float_id' && metric !== 'timestamp');
  if (numeric.length > 0) {
    return numeric;
  }
  const measurements = schema.measurementColumns();
  return measurements.length > 0 ? measurements : metrics;
}

const FLOAT_REFERENCE = /^float\b\s*#?\s*(\d+)?/i;

/**
 * Sanitize a draft intent
 *
 * @param raw - Untrusted draft; anything that is not an object is treated as empty
 * @param question - The user's original question, used for regex backstops
 */
export function sanitizeIntent(
  raw: unknown,
  question: string,
  context: SanitizeContext
): Intent {
  const draft = asRecord(raw);
  const { schema, gazetteer } = context;

  let queryType = resolveQueryType(draft);
  const metrics = resolveMetrics(draft, schema);
  const aggregation = resolveAggregation(draft);

  let floatId = readPositive(draft.float_id, floatIdSchema);
  const spokenLocation = readText(draft.location_name);
  let locationName = spokenLocation ? normalizeLocationName(spokenLocation) : undefined;

  // A float identifier is never a place
  if (locationName) {
    const reference = FLOAT_REFERENCE.exec(locationName);
    if (reference) {
      if (reference[1] && floatId === undefined) {
        floatId = Number(reference[1]);
      }
      locationName = undefined;
    }
  }

  let latitude = readDecimal(draft.latitude, 90);
  let longitude = readDecimal(draft.longitude, 180);
  if (latitude === undefined || longitude === undefined) {
    latitude = undefined;
    longitude = undefined;
  }

  if (latitude === undefined) {
    const typed = extractCoordinates(question);
    if (typed) {
      latitude = typed.latitude;
      longitude = typed.longitude;
      if (mentionsProximity(question)) {
        queryType = 'Proximity';
      }
    }
  }

  const entry = locationName ? gazetteer.resolve(locationName) : undefined;
  if (queryType === 'Proximity' && latitude === undefined && entry) {
    latitude = entry.centroid.latitude;
    longitude = entry.centroid.longitude;
  }

  let limit = readPositive(draft.limit, integerSchema);
  if (limit === undefined) {
    limit = extractNearestCount(question);
  }
  limit = Math.min(
    limit ?? (queryType === 'Proximity' ? DEFAULT_LIST_LIMIT : DEFAULT_BULK_LIMIT),
    MAX_LIMIT
  );

  let distanceKm = readPositive(draft.distance_km, distanceSchema);
  if (distanceKm === undefined && queryType === 'Proximity') {
    distanceKm = DEFAULT_DISTANCE_KM;
  }

  const timeConstraint = readText(draft.time_constraint);
  let year = readInteger(draft.year);
  if (year === undefined && timeConstraint && /\bthis\s+year\b/i.test(timeConstraint)) {
    year = context.now.getUTCFullYear();
  }
  const month = readMonth(draft.month);

  const intent: Intent = {
    queryType,
    metrics: Object.freeze(
      queryType === 'Statistic' && aggregation !== 'count'
        ? statisticMetrics(metrics, schema)
        : metrics
    ),
    aggregation,
    limit,
    locationPredicate: entry?.predicate ?? EVERYWHERE,
    ...(locationName !== undefined && { locationName }),
    ...(latitude !== undefined && longitude !== undefined && { latitude, longitude }),
    ...(distanceKm !== undefined && { distanceKm }),
    ...(timeConstraint !== undefined && { timeConstraint }),
    ...(year !== undefined && { year }),
    ...(month !== undefined && { month }),
    ...(floatId !== undefined && { floatId }),
  };

  return Object.freeze(intent);
}
