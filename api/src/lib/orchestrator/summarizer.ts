/**
 * Result Summarizer
 *
 * Pure digest of result rows: counts, per-column min/max/avg, float
 * cardinality, bounding box and time span. The digest text is handed to the
 * narrator (or returned as-is when no language model is available).
 */

import type { CompiledQuery, Intent } from '../../../../shared/types/intent';
import type { MeasurementRow } from '../../../../shared/types/measurements';

export interface ColumnStats {
  min: number;
  max: number;
  avg: number;
  count: number;
}

export interface ResultDigest {
  rowCount: number;
  floatCount: number;
  /** First few float ids, ascending */
  sampleFloatIds: number[];
  columns: Record<string, ColumnStats>;
  bounds?: { latMin: number; latMax: number; lonMin: number; lonMax: number };
  timeSpan?: { start: string; end: string };
  text: string;
}

/** Columns summarized numerically when present in the result */
const SUMMARIZED_COLUMNS = [
  'temperature',
  'salinity',
  'pressure',
  'dissolved_oxygen',
  'chlorophyll',
  'nitrate',
  'ph',
  'distance_km',
  'float_count',
] as const;

const UNITS: Record<string, string> = {
  temperature: '°C',
  salinity: 'PSU',
  pressure: 'dbar',
  dissolved_oxygen: 'µmol/kg',
  chlorophyll: 'mg/m³',
  nitrate: 'µmol/kg',
  distance_km: 'km',
};

const SAMPLE_FLOAT_IDS = 5;
const SMALL_RESULT = 3;

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toIsoDay(value: unknown): string | undefined {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? undefined : value.toISOString().slice(0, 10);
  }
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}/.test(value)) {
    return value.slice(0, 10);
  }
  return undefined;
}

function round(value: number, digits = 2): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function columnStats(rows: MeasurementRow[], column: string): ColumnStats | undefined {
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let count = 0;
  for (const row of rows) {
    const value = toNumber(row[column]);
    if (value === undefined) {
      continue;
    }
    min = Math.min(min, value);
    max = Math.max(max, value);
    sum += value;
    count++;
  }
  if (count === 0) {
    return undefined;
  }
  return { min: round(min), max: round(max), avg: round(sum / count), count };
}

/**
 * Explanation for an empty result, worded per query type
 */
export function describeEmptyResult(intent: Intent): string {
  switch (intent.queryType) {
    case 'Proximity':
      return `No floats found within ${intent.distanceKm ?? 'the requested'} km of (${intent.latitude}, ${intent.longitude}).`;
    case 'Trajectory':
    case 'Profile':
      return intent.floatId !== undefined
        ? `No data found for float ${intent.floatId} with the requested filters.`
        : 'No matching profile found for the requested filters.';
    default:
      return intent.year !== undefined || intent.timeConstraint !== undefined
        ? 'No data found for the requested period; it may fall outside the data range.'
        : 'No data found for the requested filters.';
  }
}

/**
 * Summarize rows returned for a compiled query
 */
export function summarizeResults(
  rows: MeasurementRow[],
  query: Pick<CompiledQuery, 'resultShape'>,
  intent: Intent
): ResultDigest {
  const columns: Record<string, ColumnStats> = {};
  const floatIds = new Set<number>();
  const days: string[] = [];
  const lat: number[] = [];
  const lon: number[] = [];

  const present = new Set(query.resultShape);
  for (const column of SUMMARIZED_COLUMNS) {
    if (!present.has(column)) {
      continue;
    }
    const stats = columnStats(rows, column);
    if (stats) {
      columns[column] = stats;
    }
  }

  for (const row of rows) {
    const floatId = toNumber(row.float_id);
    if (floatId !== undefined) {
      floatIds.add(floatId);
    }
    const day = toIsoDay(row.timestamp ?? row.day);
    if (day) {
      days.push(day);
    }
    const latitude = toNumber(row.latitude);
    const longitude = toNumber(row.longitude);
    if (latitude !== undefined && longitude !== undefined) {
      lat.push(latitude);
      lon.push(longitude);
    }
  }

  const sortedIds = Array.from(floatIds).sort((a, b) => a - b);
  days.sort();
  const first = days[0];
  const last = days[days.length - 1];

  const digest: ResultDigest = {
    rowCount: rows.length,
    floatCount: sortedIds.length,
    sampleFloatIds: sortedIds.slice(0, SAMPLE_FLOAT_IDS),
    columns,
    ...(lat.length > 0 && {
      bounds: {
        latMin: round(Math.min(...lat)),
        latMax: round(Math.max(...lat)),
        lonMin: round(Math.min(...lon)),
        lonMax: round(Math.max(...lon)),
      },
    }),
    ...(first !== undefined && last !== undefined && { timeSpan: { start: first, end: last } }),
    text: '',
  };
  // An aggregate over no rows still returns one row of NULLs
  const empty =
    rows.length === 0 ||
    (intent.queryType === 'Statistic' &&
      rows.every((row) => Object.values(row).every((value) => value === null)));
  digest.text = empty ? describeEmptyResult(intent) : renderDigest(digest, intent);
  return digest;
}

function renderDigest(digest: ResultDigest, intent: Intent): string {
  const lines: string[] = [];
  const noun = digest.rowCount === 1 ? 'row' : 'rows';
  lines.push(`${intent.queryType} query returned ${digest.rowCount} ${noun}.`);

  if (digest.floatCount > 0) {
    const more = digest.floatCount > digest.sampleFloatIds.length ? ', ...' : '';
    lines.push(
      `Floats: ${digest.floatCount} (${digest.sampleFloatIds.join(', ')}${more}).`
    );
  }

  for (const [column, stats] of Object.entries(digest.columns)) {
    const unit = UNITS[column] ? ` ${UNITS[column]}` : '';
    if (stats.count === 1 || stats.min === stats.max) {
      lines.push(`${column}: ${stats.avg}${unit}.`);
    } else {
      lines.push(`${column}: min ${stats.min}, max ${stats.max}, avg ${stats.avg}${unit}.`);
    }
  }

  if (digest.bounds) {
    const { latMin, latMax, lonMin, lonMax } = digest.bounds;
    lines.push(`Area: lat ${latMin} to ${latMax}, lon ${lonMin} to ${lonMax}.`);
  }
  if (digest.timeSpan) {
    const { start, end } = digest.timeSpan;
    lines.push(start === end ? `Date: ${start}.` : `Dates: ${start} to ${end}.`);
  }
  if (digest.rowCount < SMALL_RESULT && intent.queryType !== 'Statistic') {
    lines.push('Only a few records matched; consider widening the area or period.');
  }
  return lines.join('\n');
}
