/**
 * Measurement Table Catalog
 *
 * Closed allow-list of identifiers the compiler may emit. Column names
 * reported by the live database are intersected with this catalog before
 * they reach any SQL text.
 */

// ============================================================================
// Table and Columns
// ============================================================================

/**
 * The single wide table holding every float observation
 */
export const MEASUREMENT_TABLE = 'argo_data';

/**
 * Columns that identify a sample rather than measure something
 */
export const IDENTITY_COLUMNS = [
  'float_id',
  'timestamp',
  'latitude',
  'longitude',
] as const;

/**
 * Sensor columns, in display order
 */
export const SENSOR_COLUMNS = [
  'pressure',
  'temperature',
  'salinity',
  'dissolved_oxygen',
  'chlorophyll',
  'nitrate',
  'ph',
] as const;

export type IdentityColumn = (typeof IDENTITY_COLUMNS)[number];
export type SensorColumn = (typeof SENSOR_COLUMNS)[number];
export type MeasurementColumn = IdentityColumn | SensorColumn;

/**
 * Every column the compiler knows about, identity columns first
 */
export const CANONICAL_COLUMNS: readonly MeasurementColumn[] = [
  ...IDENTITY_COLUMNS,
  ...SENSOR_COLUMNS,
];

/**
 * Column used to order a vertical profile (pressure in dbar ~ depth in m)
 */
export const DEPTH_COLUMN: SensorColumn = 'pressure';

/**
 * Sensor set used by TimeSeries when nothing else survives filtering
 */
export const DEFAULT_TIMESERIES_METRICS: readonly SensorColumn[] = [
  'temperature',
  'salinity',
  'dissolved_oxygen',
  'chlorophyll',
  'ph',
  'pressure',
];

/**
 * The two canonical axes of a scatter plot
 */
export const DEFAULT_SCATTER_METRICS: readonly SensorColumn[] = [
  'temperature',
  'salinity',
];

/**
 * Last-resort metric when the sanitizer finds nothing usable
 */
export const DEFAULT_METRIC: SensorColumn = 'temperature';

const IDENTITY_SET: ReadonlySet<string> = new Set(IDENTITY_COLUMNS);

export function isIdentityColumn(name: string): name is IdentityColumn {
  return IDENTITY_SET.has(name);
}

// ============================================================================
// Rows
// ============================================================================

/**
 * A result row as returned by the database driver
 */
export type MeasurementRow = Record<string, unknown>;

/**
 * Earliest and latest observation in the table
 */
export interface DataRange {
  min: Date | null;
  max: Date | null;
}
