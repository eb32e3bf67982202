/**
 * Pattern matches on the raw question text that backstop whatever the
 * draft producer missed: explicit coordinates, proximity wording and an
 * explicit "nearest N floats" count.
 */

import type { Centroid } from '../../../../shared/types/intent';

const NUMBER = '-?\\d+(?:\\.\\d+)?';

const LATITUDE_PATTERN = new RegExp(
  `\\b(?:latitude|lat)\\b\\s*[:=]?\\s*(${NUMBER})\\s*°?\\s*([ns])?\\b`,
  'i'
);
const LONGITUDE_PATTERN = new RegExp(
  `\\b(?:longitude|lon|lng)\\b\\s*[:=]?\\s*(${NUMBER})\\s*°?\\s*([ew])?\\b`,
  'i'
);
const PAIR_PATTERN =
  /\b(near|at|around|to|of|from)?\s*\(?\s*(?<![\d.])(-?\d{1,2}(?:\.\d+)?)\s*°?\s*([ns])?\s*,\s*(-?\d{1,3}(?:\.\d+)?)(?![\d.])\s*°?\s*([ew])?/gi;

const PROXIMITY_PATTERN =
  /\bnearest\b|\bwithin\s+\d+(?:\.\d+)?\s*(?:km|kms|kilomet(?:er|re)s?)\b/i;
const NEAREST_COUNT_PATTERN = /\bnearest\s+(\d{1,3})\s+floats?\b/i;

function signed(value: string, hemisphere: string | undefined, negative: string): number {
  const parsed = Number(value);
  return hemisphere?.toLowerCase() === negative ? -Math.abs(parsed) : parsed;
}

function inRange(latitude: number, longitude: number): boolean {
  return (
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= 90 &&
    Math.abs(longitude) <= 180
  );
}

/**
 * Coordinates typed into the question, either as
 * "latitude 13 longitude 80.25" or as a "13.08, 80.27" pair.
 * A bare pair counts only when it is introduced by a word such as "near",
 * carries a decimal point, or names a hemisphere.
 */
export function extractCoordinates(question: string): Centroid | undefined {
  const lat = LATITUDE_PATTERN.exec(question);
  const lon = LONGITUDE_PATTERN.exec(question);
  if (lat?.[1] && lon?.[1]) {
    const latitude = signed(lat[1], lat[2], 's');
    const longitude = signed(lon[1], lon[2], 'w');
    if (inRange(latitude, longitude)) {
      return { latitude, longitude };
    }
  }

  for (const match of question.matchAll(PAIR_PATTERN)) {
    const [, keyword, rawLat, latHemisphere, rawLon, lonHemisphere] = match;
    if (!rawLat || !rawLon) {
      continue;
    }
    const explicit =
      Boolean(keyword) ||
      Boolean(latHemisphere) ||
      Boolean(lonHemisphere) ||
      rawLat.includes('.') ||
      rawLon.includes('.');
    if (!explicit) {
      continue;
    }
    const latitude = signed(rawLat, latHemisphere, 's');
    const longitude = signed(rawLon, lonHemisphere, 'w');
    if (inRange(latitude, longitude)) {
      return { latitude, longitude };
    }
  }

  return undefined;
}

/**
 * True when the wording asks for a nearest-neighbour search
 */
export function mentionsProximity(question: string): boolean {
  return PROXIMITY_PATTERN.test(question);
}

/**
 * N from "nearest N floats"
 */
export function extractNearestCount(question: string): number | undefined {
  const match = NEAREST_COUNT_PATTERN.exec(question);
  if (!match?.[1]) {
    return undefined;
  }
  const count = Number(match[1]);
  return count > 0 ? count : undefined;
}
