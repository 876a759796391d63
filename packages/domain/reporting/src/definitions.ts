export type TableCell = string | number | null | undefined;

export interface ReportTable {
  readonly columns: readonly string[];
  readonly rows: readonly Readonly<Record<string, TableCell>>[];
}

/** Projects every row onto the table's columns, in column order. */
export const toMatrix = (table: ReportTable): TableCell[][] =>
  table.rows.map((row) => table.columns.map((column) => row[column]));
