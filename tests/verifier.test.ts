/**
 * Test suite for verification and exact table comparison
 */

import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Table, tableFromRows } from "../src/table";
import { parseCsvTable } from "../tooling/lib/csv";
import { CandidateModule } from "../tooling/lib/loader";
import { compareTables, verifyCandidate, verifyCandidateFile } from "../tooling/lib/verifier";

const EXPECTED_CSV = "Date,Narration,Debit,Balance\n01-08-2024,Salary,,5000\n02-08-2024,Rent,1200,3800\n";

function expectedTable(): Table {
  return tableFromRows(
    ["Date", "Narration", "Debit", "Balance"],
    [
      ["01-08-2024", "Salary", null, 5000],
      ["02-08-2024", "Rent", 1200, 3800],
    ]
  );
}

function candidateReturning(parse: (documentPath: string) => unknown): CandidateModule {
  return { id: "custom_parser", path: "inline.ts", exports: { parse } };
}

describe("compareTables", () => {
  it("should accept identical tables", () => {
    expect(compareTables(expectedTable(), expectedTable())).toEqual({
      equal: true,
      diagnostic: "Tables match exactly (2 rows x 4 columns)",
    });
  });

  it("should report a row count mismatch as a shape mismatch", () => {
    const actual = tableFromRows(["Date", "Narration", "Debit", "Balance"], [["01-08-2024", "Salary", null, 5000]]);

    expect(compareTables(actual, expectedTable())).toEqual({
      equal: false,
      diagnostic: "Mismatch in tables: expected (2, 4), got (1, 4)",
    });
  });

  it("should report a missing column as a shape mismatch", () => {
    const actual = tableFromRows(
      ["Date", "Narration", "Debit"],
      [
        ["01-08-2024", "Salary", null],
        ["02-08-2024", "Rent", 1200],
      ]
    );

    expect(compareTables(actual, expectedTable()).diagnostic).toBe("Mismatch in tables: expected (2, 4), got (2, 3)");
  });

  it("should reject reordered columns", () => {
    const expected = expectedTable();
    const actual: Table = { columns: [expected.columns[1], expected.columns[0], ...expected.columns.slice(2)] };

    expect(compareTables(actual, expected)).toEqual({
      equal: false,
      diagnostic:
        'Mismatch in columns: expected ["Date","Narration","Debit","Balance"], got ["Narration","Date","Debit","Balance"]',
    });
  });

  it("should reject a value of a different type", () => {
    const actual = tableFromRows(
      ["Date", "Narration", "Debit", "Balance"],
      [
        ["01-08-2024", "Salary", null, 5000],
        ["02-08-2024", "Rent", "1200", 3800],
      ]
    );

    expect(compareTables(actual, expectedTable()).diagnostic).toBe(
      'Mismatch in values: 1 cell(s) differ\nrow 1, column "Debit": expected 1200 (number), got "1200" (string)'
    );
  });

  it("should not tolerate floating point drift", () => {
    const actual = tableFromRows(["x"], [[0.1 + 0.2]]);
    const expected = tableFromRows(["x"], [[0.3]]);

    expect(compareTables(actual, expected).equal).toBe(false);
  });

  it("should distinguish null from an empty string", () => {
    const comparison = compareTables(tableFromRows(["x"], [[""]]), tableFromRows(["x"], [[null]]));

    expect(comparison.diagnostic).toBe('Mismatch in values: 1 cell(s) differ\nrow 0, column "x": expected null (null), got "" (string)');
  });

  it("should treat NaN as equal to NaN", () => {
    expect(compareTables(tableFromRows(["x"], [[NaN]]), tableFromRows(["x"], [[NaN]])).equal).toBe(true);
  });

  it("should not distinguish integer and float spellings of the same amount", () => {
    const expected = parseCsvTable("Balance\n1500.0\n2000.50\n");

    expect(compareTables(tableFromRows(["Balance"], [[1500], [2000.5]]), expected).equal).toBe(true);
  });

  it("should cap the number of reported differences", () => {
    const rows = Array.from({ length: 12 }, (_, index) => [index]);
    const shifted = rows.map(([value]) => [value + 1]);

    const lines = compareTables(tableFromRows(["n"], shifted), tableFromRows(["n"], rows)).diagnostic.split("\n");
    expect(lines[0]).toBe("Mismatch in values: 12 cell(s) differ");
    expect(lines).toHaveLength(11);
  });
});

describe("verifyCandidate", () => {
  let dir: string;
  let tablePath: string;
  const documentPath = "/fixtures/icici/sample.pdf";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "agent-verify-"));
    tablePath = join(dir, "expected.csv");
    writeFileSync(tablePath, EXPECTED_CSV, "utf8");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("should succeed on an exact match and pass the document path", async () => {
    const seen: string[] = [];
    const candidate = candidateReturning((path) => {
      seen.push(path);
      return expectedTable();
    });

    const result = await verifyCandidate(candidate, documentPath, tablePath);

    expect(result).toEqual({ ok: true, diagnostic: "Tables match exactly (2 rows x 4 columns)" });
    expect(seen).toEqual([documentPath]);
  });

  it("should await async entry points", async () => {
    const candidate = candidateReturning(async () => expectedTable());

    expect((await verifyCandidate(candidate, documentPath, tablePath)).ok).toBe(true);
  });

  it("should report a mismatch without throwing", async () => {
    const candidate = candidateReturning(() => tableFromRows(["Date", "Narration", "Debit", "Balance"], []));

    expect(await verifyCandidate(candidate, documentPath, tablePath)).toEqual({
      ok: false,
      failure: "mismatch",
      diagnostic: "Mismatch in tables: expected (2, 4), got (0, 4)",
    });
  });

  it("should capture an exception with its stack trace", async () => {
    const candidate = candidateReturning(() => {
      throw new Error("no table found on page 1");
    });

    const result = await verifyCandidate(candidate, documentPath, tablePath);

    expect(result.ok).toBe(false);
    expect(result.ok ? undefined : result.failure).toBe("execution");
    expect(result.diagnostic.split("\n")[0]).toBe("Exception while running parse(): no table found on page 1");
    expect(result.diagnostic).toContain("Error: no table found on page 1\n    at ");
  });

  it("should capture a rejected promise", async () => {
    const candidate = candidateReturning(() => Promise.reject(new Error("async failure")));

    const result = await verifyCandidate(candidate, documentPath, tablePath);
    expect(result.diagnostic.split("\n")[0]).toBe("Exception while running parse(): async failure");
  });

  it("should fail when parse is not exported", async () => {
    const candidate: CandidateModule = { id: "custom_parser", path: "inline.ts", exports: { parser: () => null } };

    expect(await verifyCandidate(candidate, documentPath, tablePath)).toEqual({
      ok: false,
      failure: "execution",
      diagnostic: "Candidate module does not export parse(documentPath)",
    });
  });

  it("should fail when parse returns something other than a table", async () => {
    const candidate = candidateReturning(() => ({
      columns: [
        { name: "A", values: [1] },
        { name: "B", values: [1, 2] },
      ],
    }));

    const result = await verifyCandidate(candidate, documentPath, tablePath);
    expect(result.ok).toBe(false);
    expect(result.diagnostic).toBe(
      "parse() did not return a table of { columns: [{ name, values }] }:\n  (root): columns have different lengths: A=1, B=2"
    );
  });

  it("should report an unreadable expected table as a failure", async () => {
    const candidate = candidateReturning(() => expectedTable());

    const result = await verifyCandidate(candidate, documentPath, join(dir, "absent.csv"));
    expect(result.ok).toBe(false);
    expect(result.diagnostic.startsWith("Verification failed: Error: ENOENT")).toBe(true);
  });

  it("should give the same result when verifying twice", async () => {
    const candidate = candidateReturning(() => tableFromRows(["Date"], [["x"]]));

    const first = await verifyCandidate(candidate, documentPath, tablePath);
    const second = await verifyCandidate(candidate, documentPath, tablePath);
    expect(second).toEqual(first);
  });

  describe("verifyCandidateFile", () => {
    it("should verify a module saved on disk", async () => {
      const modulePath = join(dir, "icici_parser.ts");
      writeFileSync(
        modulePath,
        [
          "type Cell = string | number | null;",
          "export async function parse(pdfPath: string) {",
          "  const rows: Cell[][] = [",
          '    ["01-08-2024", "Salary", null, 5000],',
          '    ["02-08-2024", "Rent", 1200, 3800],',
          "  ];",
          '  const names = ["Date", "Narration", "Debit", "Balance"];',
          "  return { columns: names.map((name, i) => ({ name, values: rows.map((row) => row[i]) })) };",
          "}",
          "",
        ].join("\n"),
        "utf8"
      );

      const first = await verifyCandidateFile(modulePath, documentPath, tablePath);
      const second = await verifyCandidateFile(modulePath, documentPath, tablePath);

      expect(first).toEqual({ ok: true, diagnostic: "Tables match exactly (2 rows x 4 columns)" });
      expect(second).toEqual(first);
    });

    it("should report load failures", async () => {
      const modulePath = join(dir, "broken_parser.ts");
      writeFileSync(modulePath, "export function parse( {\n", "utf8");

      const result = await verifyCandidateFile(modulePath, documentPath, tablePath);
      expect(result.ok).toBe(false);
      expect(result.ok ? undefined : result.failure).toBe("load");
      expect(result.diagnostic.startsWith(`Failed to compile ${modulePath}:`)).toBe(true);
    });
  });
});
