/**
 * Time Window Resolution
 *
 * Turns an intent's free-text time phrase plus its explicit year/month
 * overrides into a structured window. Relative phrases ("last 6 months")
 * count back from the latest timestamp in the dataset, not from the wall
 * clock, so the same inputs always give the same window.
 */

import type { Intent, TemporalContext } from '../../../../shared/types/intent';

export type TimeWindow =
  | { kind: 'unbounded' }
  | {
      kind: 'range';
      start: string;
      end: string;
      /** false: [start, end), true: [start, end] */
      endInclusive: boolean;
    }
  | { kind: 'month-of-year'; month: number };

export interface ResolvedTime {
  window: TimeWindow;
  /** Calendar year the window was built from, when there is one */
  year?: number;
}

const MONTH_NAMES: Record<string, number> = {
  january: 1,
  jan: 1,
  february: 2,
  feb: 2,
  march: 3,
  mar: 3,
  april: 4,
  apr: 4,
  may: 5,
  june: 6,
  jun: 6,
  july: 7,
  jul: 7,
  august: 8,
  aug: 8,
  september: 9,
  sept: 9,
  sep: 9,
  october: 10,
  oct: 10,
  november: 11,
  nov: 11,
  december: 12,
  dec: 12,
};

const MONTH_PATTERN = new RegExp(
  `\\b(${Object.keys(MONTH_NAMES).join('|')})\\b\\.?`,
  'i'
);
const YEAR_PATTERN = /\b(20\d{2})\b/;
const RELATIVE_PATTERN =
  /\b(?:last|past|previous)\s+(?:(\d{1,3})\s+)?(day|week|month|year)s?\b/i;

const DAYS_PER_UNIT: Record<string, number> = {
  day: 1,
  week: 7,
  month: 30,
  year: 365,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Month number for the first month name found in the text
 */
export function parseMonthName(text: string): number | undefined {
  const match = MONTH_PATTERN.exec(text);
  if (!match?.[1]) {
    return undefined;
  }
  return MONTH_NAMES[match[1].toLowerCase()];
}

/**
 * First four-digit 20xx year in the text
 */
export function parseYear(text: string): number | undefined {
  const match = YEAR_PATTERN.exec(text);
  return match?.[1] ? Number(match[1]) : undefined;
}

/**
 * Length in days of a relative phrase such as "last 6 months"
 */
export function parseRelativeDays(text: string): number | undefined {
  const match = RELATIVE_PATTERN.exec(text);
  if (!match?.[2]) {
    return undefined;
  }
  const count = match[1] ? Number(match[1]) : 1;
  const unitDays = DAYS_PER_UNIT[match[2].toLowerCase()];
  if (unitDays === undefined || count <= 0) {
    return undefined;
  }
  return count * unitDays;
}

/**
 * UTC timestamp literal at millisecond precision, e.g.
 * `2024-06-30 12:00:00.750`. The column is a TIMESTAMP read back as UTC
 * (see db/client.ts), so the latest sample compares equal to itself.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 23).replace('T', ' ');
}

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

function yearWindow(year: number): TimeWindow {
  return {
    kind: 'range',
    start: `${year}-01-01`,
    end: `${year + 1}-01-01`,
    endInclusive: false,
  };
}

function monthWindow(year: number, month: number): TimeWindow {
  const nextYear = month === 12 ? year + 1 : year;
  const nextMonth = month === 12 ? 1 : month + 1;
  return {
    kind: 'range',
    start: `${year}-${pad2(month)}-01`,
    end: `${nextYear}-${pad2(nextMonth)}-01`,
    endInclusive: false,
  };
}

function calendarWindow(year: number, month: number | undefined): ResolvedTime {
  return {
    window: month === undefined ? yearWindow(year) : monthWindow(year, month),
    year,
  };
}

/**
 * Resolve the time filter for an intent
 *
 * Precedence: explicit `year` (with explicit or spoken month), then a
 * relative phrase, then a year named in the phrase, then a bare month.
 * Anything unrecognized means no time filter.
 */
export function resolveTimeWindow(
  intent: Pick<Intent, 'timeConstraint' | 'year' | 'month'>,
  context: TemporalContext
): ResolvedTime {
  const phrase = intent.timeConstraint ?? '';
  const month = intent.month ?? parseMonthName(phrase);

  if (intent.year !== undefined) {
    return calendarWindow(intent.year, month);
  }

  const relativeDays = parseRelativeDays(phrase);
  if (relativeDays !== undefined) {
    if (!context.datasetLatest) {
      return { window: { kind: 'unbounded' } };
    }
    const end = context.datasetLatest;
    const start = new Date(end.getTime() - relativeDays * MS_PER_DAY);
    return {
      window: {
        kind: 'range',
        start: formatTimestamp(start),
        end: formatTimestamp(end),
        endInclusive: true,
      },
    };
  }

  const year = parseYear(phrase);
  if (year !== undefined) {
    return calendarWindow(year, month);
  }

  if (month !== undefined) {
    return { window: { kind: 'month-of-year', month } };
  }

  return { window: { kind: 'unbounded' } };
}
