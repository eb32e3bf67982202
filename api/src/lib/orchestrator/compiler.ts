/**
 * Query Compiler
 *
 * Converts a sanitized Intent into parameterized PostgreSQL text.
 * Pure and synchronous: the same (intent, schema, temporal context) always
 * produces byte-identical SQL. Identifiers come only from the column
 * catalog via the schema snapshot; every literal value is a `$n` parameter.
 */

import type {
  CompileError,
  CompileResult,
  CompiledQuery,
  Intent,
  QueryType,
  SqlParam,
  TemporalContext,
} from '../../../../shared/types/intent';
import {
  DEFAULT_SCATTER_METRICS,
  DEFAULT_TIMESERIES_METRICS,
  DEPTH_COLUMN,
  IDENTITY_COLUMNS,
  MEASUREMENT_TABLE,
  isIdentityColumn,
  type MeasurementColumn,
} from '../../../../shared/types/measurements';
import type { SchemaSnapshot } from '../schema/snapshot';
import { resolveTimeWindow, type ResolvedTime } from './time-window';

export interface CompileContext {
  schema: SchemaSnapshot;
  temporal: TemporalContext;
  /** Gazetteer names, listed in UnsupportedLocation messages */
  knownLocations: readonly string[];
}

export const EARTH_RADIUS_KM = 6371;
export const SCATTER_ROW_CEILING = 1000;
export const GENERAL_ROW_CEILING = 500;
export const CANDIDATE_FLOAT_LIMIT = 20;
export const MIN_SUPPORTED_YEAR = 2000;

const NAN_GUARDED = (column: MeasurementColumn): boolean =>
  column !== 'float_id' && column !== 'timestamp';

function fail(error: CompileError): CompileResult {
  return { success: false, error };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

/**
 * Compiles one intent. Create a new instance per compilation; parameters
 * accumulate on the instance.
 */
export class QueryCompiler {
  private params: SqlParam[] = [];
  private paramIndex = 1; // PostgreSQL uses $1, $2, etc.
  private time: ResolvedTime;

  constructor(
    private intent: Intent,
    private context: CompileContext
  ) {
    this.time = resolveTimeWindow(intent, context.temporal);
  }

  /**
   * Build the SQL for the intent's query type
   */
  compile(): CompileResult {
    const invalid = this.checkLocation() ?? this.checkYear();
    if (invalid) {
      return fail(invalid);
    }

    const type: QueryType = this.intent.queryType;
    switch (type) {
      case 'Statistic':
        return this.buildStatistic();
      case 'Proximity':
        return this.buildProximity();
      case 'Trajectory':
        return this.buildTrajectory();
      case 'Profile':
        return this.buildProfile();
      case 'TimeSeries':
        return this.buildTimeSeries();
      case 'Scatter':
        return this.buildScatter();
      case 'General':
        return this.buildGeneral();
      default:
        return assertNever(type);
    }
  }

  /**
   * A float's track: one position per cycle (all depth levels of a
   * profile share the timestamp), oldest first
   */
  compileTrack(): CompileResult {
    const invalid = this.checkLocation() ?? this.checkYear();
    if (invalid) {
      return fail(invalid);
    }
    const { floatId, limit } = this.intent;
    if (floatId === undefined) {
      return fail(this.missingFloat());
    }
    const missing = this.missing([...IDENTITY_COLUMNS]);
    if (missing) {
      return fail(missing);
    }

    const sql = [
      `SELECT ${this.col('float_id')}, ${this.col('timestamp')}, AVG(${this.col('latitude')}) AS ${this.col('latitude')}, AVG(${this.col('longitude')}) AS ${this.col('longitude')}`,
      this.from(),
      this.whereClause([
        `${this.col('float_id')} = ${this.addParam(floatId)}`,
        this.timeCondition(),
      ]),
      `GROUP BY ${this.col('float_id')}, ${this.col('timestamp')}`,
      `ORDER BY ${this.col('timestamp')} ASC`,
      `LIMIT ${this.addParam(limit)}`,
    ];
    return { success: true, query: this.finish('Trajectory', sql, IDENTITY_COLUMNS) };
  }

  /**
   * Float ids (with first/last sighting) matching the intent's location
   * and time filters, used to suggest floats when none was given
   */
  buildCandidateFloats(): CompiledQuery {
    const where = this.whereClause([this.locationCondition(), this.timeCondition()]);
    const sql = [
      `SELECT ${this.col('float_id')}, MIN(${this.col('timestamp')}) AS first_seen, MAX(${this.col('timestamp')}) AS last_seen, COUNT(*) AS samples`,
      this.from(),
      where,
      `GROUP BY ${this.col('float_id')}`,
      `ORDER BY ${this.col('float_id')} ASC`,
      `LIMIT ${this.addParam(CANDIDATE_FLOAT_LIMIT)}`,
    ];
    return this.finish('General', sql, ['float_id', 'first_seen', 'last_seen', 'samples']);
  }

  // ==========================================================================
  // Per-type synthesis
  // ==========================================================================

  private buildStatistic(): CompileResult {
    const missing = this.missing(this.filterColumns());
    if (missing) {
      return fail(missing);
    }
    const where = this.whereClause(this.filterConditions());

    if (this.intent.aggregation === 'count') {
      const noFloat = this.missing(['float_id']);
      if (noFloat) {
        return fail(noFloat);
      }
      const sql = [
        `SELECT COUNT(DISTINCT ${this.col('float_id')}) AS float_count`,
        this.from(),
        where,
      ];
      return this.success(sql, ['float_count']);
    }

    const metrics = this.intent.metrics.filter(NAN_GUARDED);
    const unavailable = this.missing(metrics, 'a numeric metric');
    if (unavailable) {
      return fail(unavailable);
    }

    const fn = this.intent.aggregation.toUpperCase();
    const selectList = metrics.map(
      (metric) => `${fn}(NULLIF(${this.col(metric)}, 'NaN')) AS ${this.col(metric)}`
    );
    return this.success(
      [`SELECT ${selectList.join(', ')}`, this.from(), where],
      metrics
    );
  }

  /**
   * Latest position per float, ranked by great-circle distance to the
   * target point
   */
  private buildProximity(): CompileResult {
    const { latitude, longitude, distanceKm, limit } = this.intent;
    if (latitude === undefined || longitude === undefined) {
      return fail({
        kind: 'MissingCoordinates',
        message:
          'Proximity query requires coordinates or a known location. Please specify a location or coordinates.',
      });
    }

    const base = [...IDENTITY_COLUMNS];
    const missing = this.missing(base);
    if (missing) {
      return fail(missing);
    }

    const columns = [...base, ...this.sensorMetrics()];
    const projection = columns.map((column) => this.col(column)).join(', ');
    const rankOrder = [`${this.col('timestamp')} DESC`];
    if (this.context.schema.has(DEPTH_COLUMN)) {
      rankOrder.push(`${this.col(DEPTH_COLUMN)} ASC`);
    }

    const timeWhere = this.whereClause([this.timeCondition()]);
    const lat = this.addParam(latitude);
    const lon = this.addParam(longitude);
    const distance =
      `${EARTH_RADIUS_KM} * ACOS(LEAST(1, GREATEST(-1, ` +
      `COS(RADIANS(${lat})) * COS(RADIANS(${this.col('latitude')})) * COS(RADIANS(${this.col('longitude')}) - RADIANS(${lon})) + ` +
      `SIN(RADIANS(${lat})) * SIN(RADIANS(${this.col('latitude')})))))`;
    const distanceFilter =
      distanceKm !== undefined ? `WHERE distance_km <= ${this.addParam(distanceKm)}` : '';

    const sql = [
      'WITH ranked_samples AS (',
      `  SELECT ${projection}, ROW_NUMBER() OVER (PARTITION BY ${this.col('float_id')} ORDER BY ${rankOrder.join(', ')}) AS ts_rank`,
      `  ${this.from()}`,
      timeWhere ? `  ${timeWhere}` : '',
      '),',
      'latest_samples AS (',
      `  SELECT ${projection} FROM ranked_samples WHERE ts_rank = 1`,
      '),',
      'distances AS (',
      `  SELECT ${projection}, ${distance} AS distance_km FROM latest_samples`,
      ')',
      `SELECT ${projection}, distance_km FROM distances`,
      distanceFilter,
      `ORDER BY distance_km ASC, ${this.col('float_id')} ASC`,
      `LIMIT ${this.addParam(limit)}`,
    ];
    return this.success(sql, [...columns, 'distance_km']);
  }

  private buildTrajectory(): CompileResult {
    const { floatId, limit } = this.intent;
    if (floatId === undefined) {
      return fail(this.missingFloat());
    }

    const base = [...IDENTITY_COLUMNS];
    const missing = this.missing(base);
    if (missing) {
      return fail(missing);
    }

    const sensors = this.sensorMetrics();
    const columns = [
      ...base,
      ...(sensors.length > 0 ? sensors : this.context.schema.measurementColumns()),
    ];
    const order = [`${this.col('timestamp')} ASC`];
    if (this.context.schema.has(DEPTH_COLUMN)) {
      order.push(`${this.col(DEPTH_COLUMN)} ASC`);
    }

    const sql = [
      `SELECT ${columns.map((column) => this.col(column)).join(', ')}`,
      this.from(),
      this.whereClause([
        `${this.col('float_id')} = ${this.addParam(floatId)}`,
        this.timeCondition(),
      ]),
      `ORDER BY ${order.join(', ')}`,
      `LIMIT ${this.addParam(limit)}`,
    ];
    return this.success(sql, columns);
  }

  /**
   * Most recent full reading for the anchor (a float, or a location/time
   * filter), shallowest first
   */
  private buildProfile(): CompileResult {
    const { floatId } = this.intent;
    const conditions =
      floatId !== undefined
        ? [`${this.col('float_id')} = ${this.addParam(floatId)}`, this.timeCondition()]
        : [this.locationCondition(), this.timeCondition()];
    const anchor = conditions.filter((condition): condition is string => condition !== null);
    if (anchor.length === 0) {
      return fail({
        kind: 'MissingAnchor',
        message:
          'Profile query requires a valid float_id, location, or time constraint.',
      });
    }

    const identity = ['latitude', 'longitude', 'float_id', 'timestamp'] as const;
    const missing = this.missing([DEPTH_COLUMN, ...identity]);
    if (missing) {
      return fail(missing);
    }

    const sensors = this.sensorMetrics();
    const columns = Array.from(
      new Set<MeasurementColumn>([
        ...(sensors.length > 0 ? sensors : this.context.schema.measurementColumns()),
        DEPTH_COLUMN,
        ...identity,
      ])
    );
    const filter = anchor.join(' AND ');

    const sql = [
      `SELECT ${columns.map((column) => this.col(column)).join(', ')}`,
      this.from(),
      `WHERE ${filter}`,
      `  AND ${this.col('timestamp')} = (SELECT MAX(${this.col('timestamp')}) ${this.from()} WHERE ${filter})`,
      `ORDER BY ${this.col(DEPTH_COLUMN)} ASC, ${this.col('float_id')} ASC`,
    ];
    return this.success(sql, columns);
  }

  /**
   * Daily means of each metric plus the mean position
   */
  private buildTimeSeries(): CompileResult {
    const missing = this.missing(['timestamp', 'latitude', 'longitude', ...this.filterColumns()]);
    if (missing) {
      return fail(missing);
    }

    const requested = this.sensorMetrics();
    const metrics =
      requested.length > 0 ? requested : this.context.schema.pick(DEFAULT_TIMESERIES_METRICS);
    const unavailable = this.missing(metrics, 'a time-series metric');
    if (unavailable) {
      return fail(unavailable);
    }

    const selectList = [
      `DATE_TRUNC('day', ${this.col('timestamp')}) AS day`,
      `AVG(${this.col('latitude')}) AS latitude`,
      `AVG(${this.col('longitude')}) AS longitude`,
      ...metrics.map(
        (metric) => `AVG(NULLIF(${this.col(metric)}, 'NaN')) AS ${this.col(metric)}`
      ),
    ];
    const sql = [
      `SELECT ${selectList.join(', ')}`,
      this.from(),
      this.whereClause(this.filterConditions()),
      'GROUP BY day',
      'ORDER BY day ASC',
    ];
    return this.success(sql, ['day', 'latitude', 'longitude', ...metrics]);
  }

  /**
   * Two metrics side by side for a correlation plot
   */
  private buildScatter(): CompileResult {
    const missing = this.missing(this.filterColumns());
    if (missing) {
      return fail(missing);
    }

    const requested = this.sensorMetrics();
    const axes = (
      requested.length >= 2 ? requested : this.context.schema.pick(DEFAULT_SCATTER_METRICS)
    ).slice(0, 2);
    if (axes.length < 2) {
      return fail({
        kind: 'SchemaColumnUnavailable',
        message: `Scatter plots need two metrics; available: ${this.context.schema.measurementColumns().join(', ') || 'none'}.`,
        columns: [...DEFAULT_SCATTER_METRICS],
      });
    }

    const notNull = axes.map((axis) => `${this.col(axis)} IS NOT NULL`);
    const sql = [
      `SELECT ${axes.map((axis) => this.col(axis)).join(', ')}`,
      this.from(),
      this.whereClause([...this.filterConditions(), ...notNull]),
      `LIMIT ${SCATTER_ROW_CEILING}`,
    ];
    return this.success(sql, axes);
  }

  private buildGeneral(): CompileResult {
    const columns = [...this.context.schema.columns];
    if (columns.length === 0) {
      return fail({
        kind: 'SchemaColumnUnavailable',
        message: `No known columns are available on ${MEASUREMENT_TABLE}.`,
        columns: [],
      });
    }
    const missing = this.missing(this.filterColumns());
    if (missing) {
      return fail(missing);
    }

    const order = this.context.schema.has('timestamp')
      ? [`${this.col('timestamp')} DESC`]
      : [];
    if (this.context.schema.has('float_id')) {
      order.push(`${this.col('float_id')} ASC`);
    }

    const sql = [
      `SELECT ${columns.map((column) => this.col(column)).join(', ')}`,
      this.from(),
      this.whereClause(this.filterConditions()),
      order.length > 0 ? `ORDER BY ${order.join(', ')}` : '',
      `LIMIT ${this.addParam(Math.min(this.intent.limit, GENERAL_ROW_CEILING))}`,
    ];
    return this.success(sql, columns);
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  private checkLocation(): CompileError | null {
    const { locationName, locationPredicate } = this.intent;
    if (locationName === undefined || locationPredicate.kind !== 'everywhere') {
      return null;
    }
    const knownLocations = [...this.context.knownLocations];
    return {
      kind: 'UnsupportedLocation',
      message: `Location '${locationName}' is not supported. Valid locations are: ${knownLocations.join(', ')}.`,
      locationName,
      knownLocations,
    };
  }

  private checkYear(): CompileError | null {
    const year = this.time.year;
    const max = this.context.temporal.currentYear + 1;
    if (year === undefined || (year >= MIN_SUPPORTED_YEAR && year <= max)) {
      return null;
    }
    return {
      kind: 'OutOfRangeYear',
      message: `Year ${year} is out of supported range (${MIN_SUPPORTED_YEAR}-${max}). Please specify a valid year.`,
      year,
      supportedRange: { min: MIN_SUPPORTED_YEAR, max },
    };
  }

  private missingFloat(): CompileError {
    const candidates = new QueryCompiler(this.intent, this.context);
    return {
      kind: 'MissingFloatIdentifier',
      message: 'No float ID specified. Please provide a valid float ID for this query.',
      candidateQuery: candidates.buildCandidateFloats(),
    };
  }

  /**
   * SchemaColumnUnavailable for columns absent from the snapshot, or for an
   * empty list when `required` names what was expected
   */
  private missing(
    columns: readonly MeasurementColumn[],
    required?: string
  ): CompileError | null {
    const absent = columns.filter((column) => !this.context.schema.has(column));
    if (absent.length > 0) {
      return {
        kind: 'SchemaColumnUnavailable',
        message: `Column(s) not available on ${MEASUREMENT_TABLE}: ${absent.join(', ')}.`,
        columns: absent,
      };
    }
    if (required && columns.length === 0) {
      return {
        kind: 'SchemaColumnUnavailable',
        message: `This query needs ${required}, but none is available on ${MEASUREMENT_TABLE}.`,
        columns: [],
      };
    }
    return null;
  }

  // ==========================================================================
  // Predicates
  // ==========================================================================

  /**
   * Sensor metrics from the intent (identity columns are emitted separately)
   */
  private sensorMetrics(): MeasurementColumn[] {
    return this.intent.metrics.filter(
      (metric) => !isIdentityColumn(metric) && this.context.schema.has(metric)
    );
  }

  /**
   * Columns referenced by the shared location/time/float filters
   */
  private filterColumns(): MeasurementColumn[] {
    const columns: MeasurementColumn[] = [];
    const { locationPredicate } = this.intent;
    if (locationPredicate.kind === 'bounds') {
      columns.push('latitude');
      if (locationPredicate.bounds.lonMin !== undefined) {
        columns.push('longitude');
      }
    }
    if (this.time.window.kind !== 'unbounded') {
      columns.push('timestamp');
    }
    if (this.intent.floatId !== undefined) {
      columns.push('float_id');
    }
    return columns;
  }

  /**
   * Location, time and (when given) float conditions, in that order
   */
  private filterConditions(): Array<string | null> {
    return [
      this.locationCondition(),
      this.timeCondition(),
      this.intent.floatId !== undefined
        ? `${this.col('float_id')} = ${this.addParam(this.intent.floatId)}`
        : null,
    ];
  }

  private locationCondition(): string | null {
    const predicate = this.intent.locationPredicate;
    if (predicate.kind === 'everywhere') {
      return null;
    }
    const { latMin, latMax, lonMin, lonMax } = predicate.bounds;
    const parts = [
      `${this.col('latitude')} BETWEEN ${this.addParam(latMin)} AND ${this.addParam(latMax)}`,
    ];
    if (lonMin !== undefined && lonMax !== undefined) {
      parts.push(
        `${this.col('longitude')} BETWEEN ${this.addParam(lonMin)} AND ${this.addParam(lonMax)}`
      );
    }
    return `(${parts.join(' AND ')})`;
  }

  private timeCondition(): string | null {
    const window = this.time.window;
    switch (window.kind) {
      case 'unbounded':
        return null;
      case 'range': {
        const upper = window.endInclusive ? '<=' : '<';
        return `${this.col('timestamp')} >= ${this.addParam(window.start)} AND ${this.col('timestamp')} ${upper} ${this.addParam(window.end)}`;
      }
      case 'month-of-year':
        return `EXTRACT(MONTH FROM ${this.col('timestamp')}) = ${this.addParam(window.month)}`;
      default:
        return assertNever(window);
    }
  }

  // ==========================================================================
  // SQL helpers
  // ==========================================================================

  private whereClause(conditions: Array<string | null>): string {
    const present = conditions.filter((condition): condition is string => condition !== null);
    return present.length > 0 ? `WHERE ${present.join(' AND ')}` : '';
  }

  private from(): string {
    return `FROM ${this.escapeIdentifier(MEASUREMENT_TABLE)}`;
  }

  /**
   * Quote a catalog column
   */
  private col(column: MeasurementColumn): string {
    return this.escapeIdentifier(column);
  }

  /**
   * Add parameter and return placeholder
   */
  private addParam(value: SqlParam): string {
    this.params.push(value);
    const placeholder = `$${this.paramIndex}`;
    this.paramIndex++;
    return placeholder;
  }

  private escapeIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  private success(lines: string[], resultShape: readonly string[]): CompileResult {
    return { success: true, query: this.finish(this.intent.queryType, lines, resultShape) };
  }

  private finish(
    queryType: QueryType,
    lines: string[],
    resultShape: readonly string[]
  ): CompiledQuery {
    return Object.freeze({
      queryType,
      sql: lines.filter((line) => line.trim().length > 0).join('\n'),
      params: Object.freeze([...this.params]),
      resultShape: Object.freeze([...resultShape]),
    });
  }
}

/**
 * Compile an intent against a schema snapshot and temporal context
 */
export function compileIntent(intent: Intent, context: CompileContext): CompileResult {
  return new QueryCompiler(intent, context).compile();
}

/**
 * Per-cycle positions of the intent's float, for drawing its path
 */
export function compileTrackQuery(intent: Intent, context: CompileContext): CompileResult {
  return new QueryCompiler(intent, context).compileTrack();
}

/**
 * Candidate-floats lookup for an intent that lacks a float id
 */
export function compileCandidateFloatsQuery(
  intent: Intent,
  context: CompileContext
): CompiledQuery {
  return new QueryCompiler(intent, context).buildCandidateFloats();
}

/**
 * Distinct (year, month) pairs present in the data, newest first
 */
export function compileAvailablePeriodsQuery(): CompiledQuery {
  return Object.freeze({
    queryType: 'General',
    sql: [
      'SELECT DISTINCT EXTRACT(YEAR FROM "timestamp")::INT AS year, EXTRACT(MONTH FROM "timestamp")::INT AS month',
      `FROM "${MEASUREMENT_TABLE}"`,
      'ORDER BY year DESC, month DESC',
    ].join('\n'),
    params: Object.freeze([]),
    resultShape: Object.freeze(['year', 'month']),
  });
}
