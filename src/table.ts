/**
 * Columnar table model shared by generated parsers and the agent tooling.
 *
 * A parser's `parse()` returns a {@link Table}; the verifier compares it
 * against the table read from the fixture CSV.
 */

export type Cell = string | number | boolean | null;

export type CellType = "string" | "number" | "boolean" | "null";

export type Column = {
  name: string;
  values: Cell[];
};

export type Table = {
  columns: Column[];
};

export function columnNames(table: Table): string[] {
  return table.columns.map((column) => column.name);
}

/**
 * Row count of a table. Columns of unequal length are rejected by the
 * schema check before a table reaches comparison, so the first column
 * decides.
 */
export function rowCount(table: Table): number {
  return table.columns.length > 0 ? table.columns[0].values.length : 0;
}

export function cellType(value: Cell): CellType {
  if (value === null) return "null";
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  return "string";
}

/**
 * Build a table from row-major data. Short rows are padded with null.
 */
export function tableFromRows(names: readonly string[], rows: readonly (readonly Cell[])[]): Table {
  return {
    columns: names.map((name, index) => ({
      name,
      values: rows.map((row) => (index < row.length ? row[index] : null)),
    })),
  };
}

/**
 * Build a table from records keyed by column name. Missing keys become null.
 */
export function tableFromRecords(
  names: readonly string[],
  records: readonly Record<string, Cell | undefined>[]
): Table {
  return {
    columns: names.map((name) => ({
      name,
      values: records.map((record) => record[name] ?? null),
    })),
  };
}

export function getRow(table: Table, index: number): Cell[] {
  return table.columns.map((column) => column.values[index] ?? null);
}
