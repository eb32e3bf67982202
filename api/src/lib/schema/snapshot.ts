import {
  CANONICAL_COLUMNS,
  isIdentityColumn,
  type MeasurementColumn,
} from '../../../../shared/types/measurements';

/**
 * Immutable set of columns currently usable on the measurement table.
 *
 * Built from whatever the database reports, intersected with the column
 * catalog, so only allow-listed identifiers can ever be looked up here.
 * Column order follows the catalog, never the database.
 */
export class SchemaSnapshot {
  readonly columns: readonly MeasurementColumn[];
  private readonly lookup: ReadonlySet<string>;

  constructor(reportedColumns: Iterable<string>) {
    const reported = new Set(
      Array.from(reportedColumns, (name) => name.trim().toLowerCase())
    );
    this.columns = Object.freeze(
      CANONICAL_COLUMNS.filter((column) => reported.has(column))
    );
    this.lookup = new Set(this.columns);
  }

  has(name: string): name is MeasurementColumn {
    return this.lookup.has(name);
  }

  /**
   * Columns that carry a measurement (identity/coordinate/time excluded)
   */
  measurementColumns(): MeasurementColumn[] {
    return this.columns.filter((column) => !isIdentityColumn(column));
  }

  /**
   * Keep only the names this snapshot knows, in the order given
   */
  pick(names: readonly string[]): MeasurementColumn[] {
    return names.filter((name): name is MeasurementColumn => this.has(name));
  }

  get size(): number {
    return this.columns.length;
  }
}
