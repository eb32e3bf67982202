/**
 * Health and status endpoints
 */

import { Hono } from 'hono';
import type { MeasurementStore } from '../lib/db/store';
import { formatDataRange } from '../lib/orchestrator/answer';
import type { SchemaSnapshotProvider } from '../lib/schema/provider';

export interface StatusSources {
  store: Pick<MeasurementStore, 'ping'>;
  snapshots: SchemaSnapshotProvider;
  llm: { healthCheck(): Promise<boolean> };
  model: string;
}

let sources: StatusSources | null = null;

export function setStatusSources(value: StatusSources | null): void {
  sources = value;
}

const statusRoute = new Hono();

statusRoute.get('/health', (c) => {
  return c.json({ status: 'ok' });
});

/**
 * GET /api/status
 * Database and language-model reachability plus the current schema
 */
statusRoute.get('/status', async (c) => {
  if (!sources) {
    return c.json({ status: 'starting' }, 503);
  }

  const database = await sources.store
    .ping()
    .then(() => true)
    .catch((error: unknown) => {
      console.warn('Database ping failed:', error instanceof Error ? error.message : error);
      return false;
    });
  const llm = await sources.llm.healthCheck();

  const dataset = database ? await sources.snapshots.get().catch(() => null) : null;

  return c.json(
    {
      status: database ? (llm ? 'ok' : 'degraded') : 'unavailable',
      database,
      llm: { available: llm, model: sources.model },
      columns: dataset ? dataset.schema.columns : [],
      data_range: dataset ? formatDataRange(dataset.range) : 'unknown',
    },
    database ? 200 : 503
  );
});

export default statusRoute;
