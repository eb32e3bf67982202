/**
 * Measurement Store Interface
 *
 * Everything the answer pipeline needs from the database. The core never
 * talks to the store; only the boundary layer does.
 */

import type { SqlParam } from '../../../../shared/types/intent';
import type {
  DataRange,
  MeasurementRow,
} from '../../../../shared/types/measurements';

export interface SqlStatement {
  sql: string;
  params: readonly SqlParam[];
}

export interface MeasurementStore {
  /**
   * Column names currently present on the measurement table
   */
  listColumns(): Promise<string[]>;

  /**
   * Earliest and latest observation timestamps
   */
  getDataRange(): Promise<DataRange>;

  /**
   * Execute a compiled statement and return its rows
   */
  run(statement: SqlStatement): Promise<MeasurementRow[]>;

  /**
   * Cheap connectivity check
   *
   * @throws Error if the database cannot be reached
   */
  ping(): Promise<void>;
}
