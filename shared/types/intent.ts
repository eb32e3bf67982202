/**
 * Intent Types
 *
 * The untrusted draft produced upstream (language model or regex fallback),
 * the sanitized Intent the compiler consumes, and the compiler's output.
 */

import type { MeasurementColumn } from './measurements';

// ============================================================================
// Core Enumerations
// ============================================================================

export const QUERY_TYPES = [
  'Statistic',
  'Proximity',
  'Trajectory',
  'Profile',
  'TimeSeries',
  'Scatter',
  'General',
] as const;

/**
 * Kind of answer the user is after; the compiler switches on this
 */
export type QueryType = (typeof QUERY_TYPES)[number];

export const AGGREGATIONS = ['avg', 'max', 'min', 'count', 'sum'] as const;

export type Aggregation = (typeof AGGREGATIONS)[number];

// ============================================================================
// Draft Intent (untrusted)
// ============================================================================

/**
 * Whatever the upstream producer emitted. Field names mirror Intent in
 * snake_case but nothing about types, ranges or presence is guaranteed.
 * Only the sanitizer reads this shape.
 */
export type RawIntent = Record<string, unknown>;

// ============================================================================
// Location
// ============================================================================

/**
 * Latitude/longitude box; bands such as the equator omit longitude
 */
export interface BoundingBox {
  latMin: number;
  latMax: number;
  lonMin?: number;
  lonMax?: number;
}

export interface Centroid {
  latitude: number;
  longitude: number;
}

/**
 * Spatial filter attached to an intent. `everywhere` is the tautology.
 */
export type LocationPredicate =
  | { kind: 'everywhere' }
  | { kind: 'bounds'; bounds: BoundingBox };

// ============================================================================
// Sanitized Intent
// ============================================================================

/**
 * Normalized request. Every field holds a value inside its domain and
 * every metric names a column of the schema snapshot it was sanitized
 * against.
 */
export interface Intent {
  readonly queryType: QueryType;
  readonly metrics: readonly MeasurementColumn[];
  readonly aggregation: Aggregation;
  readonly limit: number;
  readonly locationPredicate: LocationPredicate;
  readonly locationName?: string;
  readonly latitude?: number;
  readonly longitude?: number;
  readonly distanceKm?: number;
  readonly timeConstraint?: string;
  readonly year?: number;
  readonly month?: number;
  readonly floatId?: number;
}

// ============================================================================
// Compilation
// ============================================================================

/**
 * Reference points for time phrases. `datasetLatest` anchors relative
 * windows ("last 6 months"); `currentYear` bounds the accepted years.
 */
export interface TemporalContext {
  datasetLatest: Date | null;
  currentYear: number;
}

export type SqlParam = string | number;

export interface CompiledQuery {
  readonly queryType: QueryType;
  readonly sql: string;
  readonly params: readonly SqlParam[];
  /** Output column names, in SELECT order */
  readonly resultShape: readonly string[];
}

export type CompileErrorKind =
  | 'UnsupportedLocation'
  | 'MissingCoordinates'
  | 'MissingAnchor'
  | 'MissingFloatIdentifier'
  | 'OutOfRangeYear'
  | 'SchemaColumnUnavailable';

export type CompileError =
  | {
      kind: 'UnsupportedLocation';
      message: string;
      locationName: string;
      knownLocations: string[];
    }
  | { kind: 'MissingCoordinates'; message: string }
  | { kind: 'MissingAnchor'; message: string }
  | {
      kind: 'MissingFloatIdentifier';
      message: string;
      /** Lists floats matching the rest of the intent, for suggestions */
      candidateQuery: CompiledQuery;
    }
  | {
      kind: 'OutOfRangeYear';
      message: string;
      year: number;
      supportedRange: { min: number; max: number };
    }
  | { kind: 'SchemaColumnUnavailable'; message: string; columns: string[] };

export type CompileResult =
  | { success: true; query: CompiledQuery }
  | { success: false; error: CompileError };
