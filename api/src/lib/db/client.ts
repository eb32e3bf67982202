import { Pool, types, type QueryResultRow } from 'pg';
import { MEASUREMENT_TABLE } from '../../../../shared/types/measurements';
import type {
  DataRange,
  MeasurementRow,
} from '../../../../shared/types/measurements';
import type { MeasurementStore, SqlStatement } from './store';

// COUNT(...) comes back as int8 and AVG over numeric as numeric; both would
// otherwise arrive as strings.
const INT8_OID = 20;
const NUMERIC_OID = 1700;
types.setTypeParser(INT8_OID, (value: string) => {
  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : value;
});
types.setTypeParser(NUMERIC_OID, (value: string) => Number(value));

// TIMESTAMP (without time zone) holds UTC; pg's default parser would read it
// in the process time zone.
const TIMESTAMP_OID = 1114;

/**
 * Read a `TIMESTAMP` text value (`2024-06-30 12:00:00.75`) as UTC
 */
export function parseUtcTimestamp(value: string): Date {
  return new Date(`${value.replace(' ', 'T')}Z`);
}

types.setTypeParser(TIMESTAMP_OID, parseUtcTimestamp);

/**
 * Create a PostgreSQL connection pool
 *
 * @param connectionString - postgres:// URL of the measurement database
 */
export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30_000,
  });
  // Idle clients that lose their connection report here; the next query reconnects
  pool.on('error', (error) => {
    console.error('Idle database client error:', error.message);
  });
  return pool;
}

/**
 * Execute a query and return results
 */
export async function query<T extends QueryResultRow = MeasurementRow>(
  pool: Pool,
  sql: string,
  params: readonly unknown[] = []
): Promise<T[]> {
  const result = await pool.query<T>(sql, [...params]);
  return result.rows;
}

interface RangeRow {
  min_timestamp: Date | null;
  max_timestamp: Date | null;
}

/**
 * MeasurementStore backed by the `argo_data` table in PostgreSQL
 */
export class PgMeasurementStore implements MeasurementStore {
  constructor(private pool: Pool) {}

  async listColumns(): Promise<string[]> {
    const rows = await query<{ column_name: string }>(
      this.pool,
      'SELECT column_name FROM information_schema.columns WHERE table_name = $1 ORDER BY ordinal_position',
      [MEASUREMENT_TABLE]
    );
    return rows.map((row) => row.column_name);
  }

  async getDataRange(): Promise<DataRange> {
    const rows = await query<RangeRow>(
      this.pool,
      `SELECT MIN("timestamp") AS min_timestamp, MAX("timestamp") AS max_timestamp FROM "${MEASUREMENT_TABLE}"`
    );
    const row = rows[0];
    return {
      min: row?.min_timestamp ?? null,
      max: row?.max_timestamp ?? null,
    };
  }

  run(statement: SqlStatement): Promise<MeasurementRow[]> {
    return query(this.pool, statement.sql, statement.params);
  }

  async ping(): Promise<void> {
    await this.pool.query('SELECT 1');
  }

  close(): Promise<void> {
    return this.pool.end();
  }
}
