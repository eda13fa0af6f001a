/**
 * CSV reading for fixture tables
 */

import { readFileSync } from "fs";
import { Cell, Column, Table } from "../../src/table";

const NULL_TOKENS = new Set(["", "NA", "N/A", "NaN", "nan", "null", "NULL"]);
const NUMERIC_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const BOOLEAN_PATTERN = /^(?:true|false)$/i;

/**
 * Read only the header row of a CSV file.
 */
export function readCsvHeader(path: string): string[] {
  const [header] = parseCsvRows(stripBom(readFileSync(path, "utf8")), 1);
  return header ?? [];
}

export function readCsvTable(path: string): Table {
  return parseCsvTable(readFileSync(path, "utf8"));
}

/**
 * Parse CSV text into a typed table. Each column gets one type: number when
 * every non-empty cell is numeric, boolean when every non-empty cell is
 * true/false, string otherwise. Empty cells become null.
 */
export function parseCsvTable(content: string): Table {
  const rows = parseCsvRows(stripBom(content)).filter((row) => !(row.length === 1 && row[0] === ""));
  if (rows.length === 0) {
    return { columns: [] };
  }

  const [header, ...body] = rows;
  body.forEach((row, index) => {
    if (row.length > header.length) {
      throw new Error(`CSV row ${index + 2} has ${row.length} fields, header has ${header.length}`);
    }
  });

  const columns: Column[] = header.map((name, columnIndex) => {
    const raw = body.map((row) => (columnIndex < row.length ? row[columnIndex] : ""));
    return { name, values: inferColumn(raw) };
  });

  return { columns };
}

export function inferColumn(raw: readonly string[]): Cell[] {
  const present = raw.filter((cell) => !isNullToken(cell));

  if (present.length > 0 && present.every((cell) => NUMERIC_PATTERN.test(cell.trim()))) {
    return raw.map((cell) => (isNullToken(cell) ? null : Number(cell.trim())));
  }

  if (present.length > 0 && present.every((cell) => BOOLEAN_PATTERN.test(cell.trim()))) {
    return raw.map((cell) => (isNullToken(cell) ? null : cell.trim().toLowerCase() === "true"));
  }

  return raw.map((cell) => (isNullToken(cell) ? null : cell));
}

function isNullToken(cell: string): boolean {
  return NULL_TOKENS.has(cell.trim());
}

function stripBom(content: string): string {
  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Split CSV text into rows of raw fields. Quoted fields may contain commas,
 * newlines and doubled quotes. Stops after `limit` rows when given.
 */
export function parseCsvRows(content: string, limit = Infinity): string[][] {
  const rows: string[][] = [];
  let currentRow: string[] = [];
  let currentCell = "";
  let inQuotes = false;

  for (let i = 0; i < content.length && rows.length < limit; i++) {
    const char = content[i];
    const next = content[i + 1];

    if (char === '"') {
      if (inQuotes && next === '"') {
        currentCell += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }

    if (!inQuotes && char === ",") {
      currentRow.push(currentCell);
      currentCell = "";
      continue;
    }

    if (!inQuotes && (char === "\n" || char === "\r")) {
      if (char === "\r" && next === "\n") {
        i++;
      }
      currentRow.push(currentCell);
      rows.push(currentRow);
      currentRow = [];
      currentCell = "";
      continue;
    }

    currentCell += char;
  }

  if (rows.length < limit && (currentCell.length > 0 || currentRow.length > 0)) {
    currentRow.push(currentCell);
    rows.push(currentRow);
  }

  return rows;
}
