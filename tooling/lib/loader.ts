/**
 * Loads a generated parser module straight from disk.
 *
 * The file is read, transpiled to CommonJS and evaluated in a fresh module
 * wrapper on every call, so an overwritten candidate is never served from a
 * cache. Every load uses the same module id regardless of the file's
 * location.
 */

import { readFileSync } from "fs";
import { createRequire } from "module";
import { dirname } from "path";
import vm from "vm";
import { ts } from "ts-morph";
import { LoadError, errorMessage } from "./errors";

export const CANDIDATE_MODULE_ID = "custom_parser";

export type CandidateModule = {
  id: string;
  path: string;
  exports: unknown;
};

const COMPILER_OPTIONS: ts.CompilerOptions = {
  module: ts.ModuleKind.CommonJS,
  target: ts.ScriptTarget.ES2022,
  esModuleInterop: true,
};

export function transpileCandidate(source: string, fileName: string): string {
  const output = ts.transpileModule(source, {
    fileName,
    reportDiagnostics: true,
    compilerOptions: COMPILER_OPTIONS,
  });

  const errors = (output.diagnostics ?? []).filter(
    (diagnostic) => diagnostic.category === ts.DiagnosticCategory.Error
  );
  if (errors.length > 0) {
    throw new LoadError(`Failed to compile ${fileName}:\n${errors.map(formatDiagnostic).join("\n")}`);
  }

  return output.outputText;
}

function formatDiagnostic(diagnostic: ts.Diagnostic): string {
  const message = ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n");
  if (diagnostic.file && diagnostic.start !== undefined) {
    const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
    return `  (${line + 1},${character + 1}): ${message}`;
  }
  return `  ${message}`;
}

export function loadCandidateModule(path: string): CandidateModule {
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch (error) {
    throw new LoadError(`Cannot read candidate module ${path}: ${errorMessage(error)}`, error);
  }

  const compiled = transpileCandidate(source, path);

  // Wrapper prefix stays on the first line so stack traces keep source line numbers.
  const wrapped = `(function (exports, require, module, __filename, __dirname) {${compiled}\n})`;

  let factory: unknown;
  try {
    factory = new vm.Script(wrapped, { filename: path }).runInThisContext();
  } catch (error) {
    throw new LoadError(`Syntax error in ${path}: ${errorMessage(error)}`, error);
  }
  if (typeof factory !== "function") {
    throw new LoadError(`Candidate module ${path} did not compile to a module body`);
  }

  const module: { id: string; filename: string; exports: unknown } = {
    id: CANDIDATE_MODULE_ID,
    filename: path,
    exports: {},
  };
  try {
    factory.call(module.exports, module.exports, createRequire(path), module, path, dirname(path));
  } catch (error) {
    throw new LoadError(`Error while loading ${path}: ${errorMessage(error)}`, error);
  }

  return { id: module.id, path, exports: module.exports };
}
