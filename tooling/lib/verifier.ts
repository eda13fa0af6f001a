/**
 * Verification of generated parsers against the fixture table
 */

import { z } from "zod";
import { Cell, Table, cellType, columnNames, rowCount } from "../../src/table";
import { readCsvTable } from "./csv";
import { AgentError, ExecutionError, LoadError, MismatchError, describeError, errorMessage } from "./errors";
import { CandidateModule, loadCandidateModule } from "./loader";
import { FailureKind, VerificationResult } from "./types";

export const ENTRY_POINT = "parse";
export const MAX_REPORTED_DIFFERENCES = 10;

const cellSchema = z.union([z.string(), z.number(), z.nan(), z.boolean(), z.null()]);

export const tableSchema = z
  .object({
    columns: z.array(
      z.object({
        name: z.string(),
        values: z.array(cellSchema),
      })
    ),
  })
  .superRefine((table, ctx) => {
    const lengths = new Set(table.columns.map((column) => column.values.length));
    if (lengths.size > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `columns have different lengths: ${table.columns
          .map((column) => `${column.name}=${column.values.length}`)
          .join(", ")}`,
      });
    }
  });

export type TableComparison = {
  equal: boolean;
  diagnostic: string;
};

function cellsEqual(actual: Cell, expected: Cell): boolean {
  if (typeof actual === "number" && typeof expected === "number") {
    return actual === expected || (Number.isNaN(actual) && Number.isNaN(expected));
  }
  return actual === expected;
}

function formatCell(value: Cell): string {
  if (typeof value === "number" && !Number.isFinite(value)) {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Exact comparison: column names and order, row count, and the type and
 * value of every cell. No numeric tolerance and no coercion.
 */
export function compareTables(actual: Table, expected: Table): TableComparison {
  const actualShape = [rowCount(actual), actual.columns.length];
  const expectedShape = [rowCount(expected), expected.columns.length];

  if (actualShape[0] !== expectedShape[0] || actualShape[1] !== expectedShape[1]) {
    return {
      equal: false,
      diagnostic: `Mismatch in tables: expected (${expectedShape.join(", ")}), got (${actualShape.join(", ")})`,
    };
  }

  const actualNames = columnNames(actual);
  const expectedNames = columnNames(expected);
  if (actualNames.some((name, index) => name !== expectedNames[index])) {
    return {
      equal: false,
      diagnostic: `Mismatch in columns: expected ${JSON.stringify(expectedNames)}, got ${JSON.stringify(actualNames)}`,
    };
  }

  const differences: string[] = [];
  let differing = 0;
  for (let row = 0; row < expectedShape[0]; row += 1) {
    expected.columns.forEach((column, index) => {
      const want = column.values[row];
      const got = actual.columns[index].values[row];
      if (cellsEqual(got, want)) return;
      differing += 1;
      if (differences.length < MAX_REPORTED_DIFFERENCES) {
        differences.push(
          `row ${row}, column "${column.name}": expected ${formatCell(want)} (${cellType(want)}), got ${formatCell(got)} (${cellType(got)})`
        );
      }
    });
  }

  if (differing > 0) {
    return {
      equal: false,
      diagnostic: [`Mismatch in values: ${differing} cell(s) differ`, ...differences].join("\n"),
    };
  }

  return {
    equal: true,
    diagnostic: `Tables match exactly (${expectedShape[0]} rows x ${expectedShape[1]} columns)`,
  };
}

async function runEntryPoint(candidate: CandidateModule, documentPath: string): Promise<Table> {
  const exported = candidate.exports;
  const entry: unknown =
    typeof exported === "object" && exported !== null ? Reflect.get(exported, ENTRY_POINT) : undefined;
  if (typeof entry !== "function") {
    throw new ExecutionError(`Candidate module does not export ${ENTRY_POINT}(documentPath)`);
  }

  let produced: unknown;
  try {
    produced = await entry(documentPath);
  } catch (error) {
    throw new ExecutionError(`Exception while running ${ENTRY_POINT}(): ${errorMessage(error)}\n${describeError(error)}`, error);
  }

  const parsed = tableSchema.safeParse(produced);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("\n");
    throw new ExecutionError(`${ENTRY_POINT}() did not return a table of { columns: [{ name, values }] }:\n${issues}`);
  }
  return parsed.data;
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof LoadError) return "load";
  if (error instanceof MismatchError) return "mismatch";
  return "execution";
}

function failure(error: unknown): VerificationResult {
  const diagnostic = error instanceof AgentError ? error.message : `Verification failed: ${describeError(error)}`;
  return { ok: false, diagnostic, failure: failureKind(error) };
}

/**
 * Run a loaded candidate against the fixture. Never throws.
 */
export async function verifyCandidate(
  candidate: CandidateModule,
  documentPath: string,
  tablePath: string
): Promise<VerificationResult> {
  try {
    const produced = await runEntryPoint(candidate, documentPath);
    const expected = readCsvTable(tablePath);
    const comparison = compareTables(produced, expected);
    if (!comparison.equal) {
      throw new MismatchError(comparison.diagnostic);
    }
    return { ok: true, diagnostic: comparison.diagnostic };
  } catch (error) {
    return failure(error);
  }
}

/**
 * Load the candidate at `modulePath` and verify it. Load failures are
 * reported as a result like any other failure.
 */
export async function verifyCandidateFile(
  modulePath: string,
  documentPath: string,
  tablePath: string
): Promise<VerificationResult> {
  let candidate: CandidateModule;
  try {
    candidate = loadCandidateModule(modulePath);
  } catch (error) {
    return failure(error);
  }
  return verifyCandidate(candidate, documentPath, tablePath);
}
