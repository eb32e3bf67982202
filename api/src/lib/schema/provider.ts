import type { DataRange } from '../../../../shared/types/measurements';
import type { MeasurementStore } from '../db/store';
import { SchemaSnapshot } from './snapshot';

/**
 * What the database looked like at the last refresh
 */
export interface DatasetSnapshot {
  schema: SchemaSnapshot;
  range: DataRange;
  refreshedAt: number;
}

/**
 * Periodically re-introspects the measurement table.
 *
 * Callers receive a whole DatasetSnapshot reference; a refresh replaces the
 * reference and never mutates one already handed out. Concurrent callers
 * during a refresh share the same in-flight promise.
 */
export class SchemaSnapshotProvider {
  private current: DatasetSnapshot | null = null;
  private inflight: Promise<DatasetSnapshot> | null = null;

  constructor(
    private store: Pick<MeasurementStore, 'listColumns' | 'getDataRange'>,
    private refreshMs: number = 5 * 60 * 1000,
    private clock: () => number = Date.now
  ) {}

  /**
   * Current snapshot, refreshed when older than the refresh interval.
   * A failed refresh keeps serving the previous snapshot if there is one.
   */
  async get(): Promise<DatasetSnapshot> {
    if (this.current && this.clock() - this.current.refreshedAt < this.refreshMs) {
      return this.current;
    }

    try {
      return await this.refresh();
    } catch (error) {
      if (this.current) {
        console.warn('Schema refresh failed, serving previous snapshot:', error);
        return this.current;
      }
      throw error;
    }
  }

  /**
   * Force a reload from the database
   */
  refresh(): Promise<DatasetSnapshot> {
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async load(): Promise<DatasetSnapshot> {
    const [columns, range] = await Promise.all([
      this.store.listColumns(),
      this.store.getDataRange(),
    ]);
    const snapshot: DatasetSnapshot = Object.freeze({
      schema: new SchemaSnapshot(columns),
      range,
      refreshedAt: this.clock(),
    });
    this.current = snapshot;
    return snapshot;
  }
}
