/**
 * Keyword Draft Producer
 *
 * Builds a draft intent from the question text alone. Used when the
 * language model is unreachable or returns something unusable; the
 * sanitizer treats its output exactly like a model draft.
 */

import type { QueryType, RawIntent } from '../../../../shared/types/intent';
import type { Gazetteer } from '../gazetteer';
import { parseRelativeDays, parseYear } from './time-window';
import { METRIC_KEYWORDS } from './vocabulary';

/**
 * Query types in priority order; the first pattern that matches wins
 */
const QUERY_TYPE_PATTERNS: ReadonlyArray<[RegExp, QueryType]> = [
  [/\bnearest\b|\bclosest\b|\bnearby\b|\bwithin\s+\d+(?:\.\d+)?\s*km\b/i, 'Proximity'],
  [/\btrajector(?:y|ies)\b|\bpath\b|\btrack(?:ed)?\b|\bwhere\s+has\b.*\bfloat\b/i, 'Trajectory'],
  [/\bprofiles?\b|\bvertical\b|\bwith\s+depth\b/i, 'Profile'],
  [/\btrends?\b|\bover\s+time\b|\btime[\s-]?series\b|\bdaily\b|\bchanged?\b/i, 'TimeSeries'],
  [/\bscatter\b|\bcorrelat\w*\b|\bvs\.?\s|\bversus\b|\brelationship\b/i, 'Scatter'],
  [/\baverage\b|\bmean\b|\bmax(?:imum)?\b|\bmin(?:imum)?\b|\bhighest\b|\blowest\b|\bwarmest\b|\bcoldest\b|\bhow\s+many\b|\bcount\b|\btotal\b/i, 'Statistic'],
];

const AGGREGATION_PATTERNS: ReadonlyArray<[RegExp, string]> = [
  [/\bhow\s+many\b|\bcount\b|\bnumber\s+of\b/i, 'count'],
  [/\bmax(?:imum)?\b|\bhighest\b|\bwarmest\b|\bsaltiest\b/i, 'max'],
  [/\bmin(?:imum)?\b|\blowest\b|\bcoldest\b|\bfreshest\b/i, 'min'],
  [/\btotal\b|\bsum\b/i, 'sum'],
];

const FLOAT_PATTERN = /\bfloat\s*(?:id\s*)?(?:number\s*)?#?\s*(\d{3,})\b/i;
const DISTANCE_PATTERN = /\bwithin\s+(\d+(?:\.\d+)?)\s*(?:km|kms|kilomet(?:er|re)s?)\b/i;
const RELATIVE_PHRASE = /\b(?:last|past|previous)\s+(?:\d{1,3}\s+)?(?:day|week|month|year)s?\b/i;
const THIS_YEAR = /\bthis\s+year\b/i;

// A bare "may" is usually the verb; month names count only in a time phrase
const MONTH_WORDS =
  'january|february|march|april|may|june|july|august|september|october|november|december|jan|feb|mar|apr|jun|jul|aug|sep|sept|oct|nov|dec';
const MONTH_PHRASE = new RegExp(
  `\\b(?:in|during|for|of|since)\\s+(?:the\\s+month\\s+of\\s+)?(${MONTH_WORDS})\\b|\\b(${MONTH_WORDS})\\.?\\s+20\\d{2}\\b`,
  'i'
);

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function detectQueryType(question: string): QueryType {
  for (const [pattern, type] of QUERY_TYPE_PATTERNS) {
    if (pattern.test(question)) {
      return type;
    }
  }
  return 'General';
}

function detectAggregation(question: string): string {
  for (const [pattern, aggregation] of AGGREGATION_PATTERNS) {
    if (pattern.test(question)) {
      return aggregation;
    }
  }
  return 'avg';
}

/**
 * Metrics mentioned in the question, in order of first mention
 */
function detectMetrics(question: string): string[] {
  return METRIC_KEYWORDS.flatMap(([pattern, metric]) => {
    const match = pattern.exec(question);
    return match ? [{ metric, index: match.index }] : [];
  })
    .sort((a, b) => a.index - b.index)
    .map(({ metric }) => metric);
}

/**
 * Longest gazetteer name that appears as a whole phrase in the question
 */
export function findLocationName(question: string, gazetteer: Gazetteer): string | undefined {
  const text = question.toLowerCase().replace(/\s+/g, ' ');
  const names = gazetteer.listKnownNames().sort((a, b) => b.length - a.length);
  return names.find((name) => new RegExp(`\\b${escapeRegExp(name)}\\b`).test(text));
}

function detectTimeConstraint(question: string): string | undefined {
  const relative = RELATIVE_PHRASE.exec(question);
  if (relative && parseRelativeDays(relative[0]) !== undefined) {
    return relative[0].toLowerCase();
  }
  if (THIS_YEAR.test(question)) {
    return 'this year';
  }

  const parts: string[] = [];
  const month = MONTH_PHRASE.exec(question);
  const monthWord = month?.[1] ?? month?.[2];
  if (monthWord) {
    parts.push(monthWord.toLowerCase());
  }
  const year = parseYear(question);
  if (year !== undefined) {
    parts.push(String(year));
  }
  return parts.length > 0 ? parts.join(' ') : undefined;
}

/**
 * Draft intent from keywords in the question
 */
export function draftIntentFromQuestion(question: string, gazetteer: Gazetteer): RawIntent {
  const draft: RawIntent = {
    query_type: detectQueryType(question),
    metrics: detectMetrics(question),
    aggregation: detectAggregation(question),
  };

  const location = findLocationName(question, gazetteer);
  if (location) {
    draft.location_name = location;
  }

  const float = FLOAT_PATTERN.exec(question);
  if (float?.[1]) {
    draft.float_id = Number(float[1]);
  }

  const distance = DISTANCE_PATTERN.exec(question);
  if (distance?.[1]) {
    draft.distance_km = Number(distance[1]);
  }

  const timeConstraint = detectTimeConstraint(question);
  if (timeConstraint) {
    draft.time_constraint = timeConstraint;
  }

  return draft;
}
