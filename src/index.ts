/**
 * statement-parser-agent: table contract for generated parsers
 */

export type { Cell, CellType, Column, Table } from "./table";

export {
  cellType,
  columnNames,
  getRow,
  rowCount,
  tableFromRecords,
  tableFromRows,
} from "./table";
