export type ColumnKey = string | number;

export type CellValue = string | number | boolean | null | undefined;

/**
 * Two-dimensional labeled dataset read by the page builder.
 * Rows and columns are rendered in the order given here.
 */
export interface TabularData {
  readonly columns: readonly ColumnKey[];
  readonly rows: readonly ColumnKey[];
  valueAt(row: number, column: number): CellValue;
}
