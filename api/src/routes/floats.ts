/**
 * Float endpoints
 *
 * Map-friendly shortcuts over the answer pipeline: nearest floats as
 * GeoJSON points, a float's latest profile, and its track as a LineString.
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { Feature, FeatureCollection, LineString, Point, Position } from 'geojson';
import { isErrorPayload } from '../../../shared/types/api';
import type { MeasurementRow } from '../../../shared/types/measurements';
import type { QuestionAnswerer } from '../lib/orchestrator/answer';
import { failureResponse, notInitialized } from './errors';

let answerer: QuestionAnswerer | null = null;

export function setAnswerer(instance: QuestionAnswerer | null): void {
  answerer = instance;
}

const nearestQuerySchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
  distance_km: z.coerce.number().positive().optional(),
  limit: z.coerce.number().int().positive().max(1000).optional(),
  time: z.string().trim().min(1).optional(),
});

const floatIdSchema = z.coerce.number().int().positive();

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function position(row: MeasurementRow): Position | undefined {
  const latitude = toNumber(row.latitude);
  const longitude = toNumber(row.longitude);
  return latitude !== undefined && longitude !== undefined ? [longitude, latitude] : undefined;
}

/**
 * Rows with coordinates → Point features; other columns become properties
 */
export function rowsToPoints(rows: MeasurementRow[]): FeatureCollection<Point> {
  const features = rows.flatMap((row): Array<Feature<Point>> => {
    const coordinates = position(row);
    if (!coordinates) {
      return [];
    }
    const properties = Object.fromEntries(
      Object.entries(row).filter(([key]) => key !== 'latitude' && key !== 'longitude')
    );
    return [{ type: 'Feature', geometry: { type: 'Point', coordinates }, properties }];
  });
  return { type: 'FeatureCollection', features };
}

/**
 * Time-ordered rows → one LineString feature
 */
export function rowsToTrack(floatId: number, rows: MeasurementRow[]): Feature<LineString> {
  const coordinates = rows.flatMap((row) => {
    const point = position(row);
    return point ? [point] : [];
  });
  const first = rows[0];
  const last = rows[rows.length - 1];
  return {
    type: 'Feature',
    geometry: { type: 'LineString', coordinates },
    properties: {
      float_id: floatId,
      points: coordinates.length,
      start: first?.timestamp ?? null,
      end: last?.timestamp ?? null,
    },
  };
}

const floatsRoute = new Hono();

/**
 * GET /api/floats/nearest?lat=13.08&lon=80.27&distance_km=200&limit=3
 */
floatsRoute.get('/nearest', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }
  const parsed = nearestQuerySchema.safeParse(c.req.query());
  if (!parsed.success) {
    return c.json(
      { error: 'Invalid parameters', message: 'lat and lon are required and must be in range' },
      400
    );
  }

  const { lat, lon, distance_km, limit, time } = parsed.data;
  try {
    const payload = await answerer.answerIntent({
      query_type: 'Proximity',
      latitude: lat,
      longitude: lon,
      distance_km,
      limit,
      time_constraint: time,
    });
    if (isErrorPayload(payload)) {
      return c.json(payload, 400);
    }
    return c.json(rowsToPoints(payload.data));
  } catch (error) {
    return failureResponse(c, error);
  }
});

/**
 * GET /api/floats/:id/profile
 */
floatsRoute.get('/:id/profile', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }
  const id = floatIdSchema.safeParse(c.req.param('id'));
  if (!id.success) {
    return c.json({ error: 'Invalid float id' }, 400);
  }

  try {
    const payload = await answerer.answerIntent({ query_type: 'Profile', float_id: id.data });
    if (isErrorPayload(payload)) {
      return c.json(payload, 400);
    }
    if (payload.data.length === 0) {
      return c.json({ error: `No profile found for float ${id.data}` }, 404);
    }
    return c.json(payload);
  } catch (error) {
    return failureResponse(c, error);
  }
});

/**
 * GET /api/floats/:id/trajectory
 * One point per cycle, oldest first, up to 1000 cycles
 */
floatsRoute.get('/:id/trajectory', async (c) => {
  if (!answerer) {
    return notInitialized(c);
  }
  const id = floatIdSchema.safeParse(c.req.param('id'));
  if (!id.success) {
    return c.json({ error: 'Invalid float id' }, 400);
  }

  try {
    const payload = await answerer.answerTrack({
      query_type: 'Trajectory',
      float_id: id.data,
      limit: 1000,
      time_constraint: c.req.query('time'),
    });
    if (isErrorPayload(payload)) {
      return c.json(payload, 400);
    }
    if (payload.data.length === 0) {
      return c.json({ error: `No positions found for float ${id.data}` }, 404);
    }
    return c.json(rowsToTrack(id.data, payload.data));
  } catch (error) {
    return failureResponse(c, error);
  }
});

export default floatsRoute;
