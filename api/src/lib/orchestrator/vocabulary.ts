/**
 * Spoken names → canonical tags for query types, aggregations and metrics
 */

import {
  AGGREGATIONS,
  QUERY_TYPES,
  type Aggregation,
  type QueryType,
} from '../../../../shared/types/intent';

function squash(value: string): string {
  return value.trim().toLowerCase().replace(/[\s_-]+/g, '');
}

const QUERY_TYPE_ALIASES: Record<string, QueryType> = {
  ...Object.fromEntries(QUERY_TYPES.map((type) => [squash(type), type])),
  // Older prompts and clients
  path: 'Trajectory',
  track: 'Trajectory',
  nearest: 'Proximity',
  nearby: 'Proximity',
  stats: 'Statistic',
  statistics: 'Statistic',
  trend: 'TimeSeries',
  correlation: 'Scatter',
};

/**
 * Canonical query type, or undefined if the tag is not recognized
 */
export function normalizeQueryType(value: string): QueryType | undefined {
  return QUERY_TYPE_ALIASES[squash(value)];
}

const AGGREGATION_ALIASES: Record<string, Aggregation> = {
  ...Object.fromEntries(AGGREGATIONS.map((agg) => [agg, agg])),
  average: 'avg',
  mean: 'avg',
  maximum: 'max',
  highest: 'max',
  minimum: 'min',
  lowest: 'min',
  total: 'sum',
  number: 'count',
};

export function normalizeAggregation(value: string): Aggregation | undefined {
  return AGGREGATION_ALIASES[squash(value)];
}

/**
 * Everyday names users (and models) give to the sensor columns
 */
const METRIC_ALIASES: Record<string, string> = {
  temp: 'temperature',
  sst: 'temperature',
  watertemperature: 'temperature',
  seatemperature: 'temperature',
  salt: 'salinity',
  psal: 'salinity',
  oxygen: 'dissolved_oxygen',
  dissolvedoxygen: 'dissolved_oxygen',
  doxy: 'dissolved_oxygen',
  o2: 'dissolved_oxygen',
  chl: 'chlorophyll',
  chla: 'chlorophyll',
  chlorophylla: 'chlorophyll',
  no3: 'nitrate',
  nitrates: 'nitrate',
  acidity: 'ph',
  depth: 'pressure',
  pres: 'pressure',
  floatid: 'float_id',
  time: 'timestamp',
  date: 'timestamp',
  lat: 'latitude',
  lon: 'longitude',
  lng: 'longitude',
};

/**
 * Canonical column spelling for a metric name. Unknown names come back
 * snake_cased and are left for the schema check to reject.
 */
export function normalizeMetricName(value: string): string {
  const snake = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return METRIC_ALIASES[squash(value)] ?? snake;
}

/**
 * Words that identify each sensor in a question, for the regex fallback
 */
export const METRIC_KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/\btemperatures?\b|\btemp\b|\bsst\b/i, 'temperature'],
  [/\bsalinity\b|\bsalty\b/i, 'salinity'],
  [/\b(?:dissolved\s+)?oxygen\b|\bdoxy\b/i, 'dissolved_oxygen'],
  [/\bchlorophyll\b|\bchl\b/i, 'chlorophyll'],
  [/\bnitrates?\b/i, 'nitrate'],
  [/\bph\b|\bacidity\b/i, 'ph'],
  [/\bpressure\b|\bdepth\b/i, 'pressure'],
];
