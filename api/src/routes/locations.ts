/**
 * Locations endpoint
 *
 * Lists the place names the gazetteer accepts
 */

import { Hono } from 'hono';
import type { Gazetteer, GazetteerEntry } from '../lib/gazetteer';
import { notInitialized } from './errors';

let gazetteer: Gazetteer | null = null;

export function setGazetteer(instance: Gazetteer | null): void {
  gazetteer = instance;
}

function toJson(entry: GazetteerEntry) {
  return {
    name: entry.name,
    kind: entry.kind,
    centroid: entry.centroid,
    bounds: entry.predicate.kind === 'bounds' ? entry.predicate.bounds : null,
  };
}

const locationsRoute = new Hono();

/**
 * GET /api/locations
 */
locationsRoute.get('/', (c) => {
  if (!gazetteer) {
    return notInitialized(c);
  }
  const kind = c.req.query('kind');
  const entries = gazetteer.list().filter((entry) => !kind || entry.kind === kind);
  return c.json({
    count: entries.length,
    locations: entries.map(toJson),
  });
});

/**
 * GET /api/locations/:name
 */
locationsRoute.get('/:name', (c) => {
  if (!gazetteer) {
    return notInitialized(c);
  }
  const entry = gazetteer.resolve(c.req.param('name'));
  if (!entry) {
    return c.json({ error: `Unknown location: ${c.req.param('name')}` }, 404);
  }
  return c.json(toJson(entry));
});

export default locationsRoute;
