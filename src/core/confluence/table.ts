import { InvalidArgumentError } from '../errors.js';
import type { CellValue, ColumnKey, TabularData } from '../../types/index.js';

/**
 * In-memory {@link TabularData} built from row entries or records.
 * Keeps rows and columns exactly in the order they were given.
 */
export class DataTable implements TabularData {
  readonly columns: readonly ColumnKey[];
  readonly rows: readonly ColumnKey[];
  private values: ReadonlyArray<readonly CellValue[]>;

  constructor(columns: readonly ColumnKey[], entries: ReadonlyArray<readonly [ColumnKey, readonly CellValue[]]>) {
    for (const [key, values] of entries) {
      if (values.length !== columns.length) {
        throw new InvalidArgumentError(
          `Row "${key}" has ${values.length} values but the table has ${columns.length} columns`,
          { argument: 'entries' }
        );
      }
    }
    this.columns = [...columns];
    this.rows = entries.map(([key]) => key);
    this.values = entries.map(([, values]) => [...values]);
  }

  /**
   * Columns follow the key order of the first record; later records may
   * leave a column out. Rows are keyed by position.
   */
  static fromRecords(records: ReadonlyArray<Record<string, CellValue>>): DataTable {
    const columns = records.length > 0 ? Object.keys(records[0]) : [];
    return new DataTable(
      columns,
      records.map((record, index) => [index, columns.map((column) => record[column])] as const)
    );
  }

  valueAt(row: number, column: number): CellValue {
    return this.values[row]?.[column];
  }
}
