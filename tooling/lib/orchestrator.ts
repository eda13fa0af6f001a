/**
 * Retry orchestrator: generate -> save -> load/verify, up to maxAttempts.
 *
 * Only fixture resolution can abort a run. Generation, load, execution and
 * mismatch failures are folded into the diagnostic carried to the next
 * attempt.
 */

import { basename, relative } from "path";
import { AuditLog } from "./audit";
import { saveCandidate } from "./candidates";
import { readCsvHeader } from "./csv";
import { readDocumentPreview } from "./document";
import { errorMessage } from "./errors";
import { locateFixture, normalizeTarget } from "./fixtures";
import { runRegressionTests } from "./hook";
import { formatColumnList } from "./llm";
import { Logger } from "./logger";
import { AgentResult, AttemptRecord, Fixture, GenerationRequest, RuntimeConfig } from "./types";
import { verifyCandidateFile } from "./verifier";

export interface ParserGenerator {
  generate(request: GenerationRequest): Promise<string>;
}

/**
 * User-facing status output, kept apart from the log file
 */
export interface Reporter {
  line(message: string): void;
}

export const consoleReporter: Reporter = {
  line: (message) => console.log(message),
};

export type OrchestratorConfig = Pick<
  RuntimeConfig,
  "dataDir" | "parserDir" | "maxAttempts" | "previewChars" | "regressionCommand" | "projectRoot" | "logFile"
>;

export interface AgentDependencies {
  config: OrchestratorConfig;
  generator: ParserGenerator;
  logger: Logger;
  reporter?: Reporter;
  audit?: AuditLog;
  previewDocument?: (path: string, maxChars: number) => Promise<string>;
  runHook?: (command: string[], cwd: string, logger?: Logger) => Promise<number>;
}

async function loadPreview(fixture: Fixture, deps: AgentDependencies): Promise<string | undefined> {
  if (deps.config.previewChars <= 0) {
    return undefined;
  }
  const preview = deps.previewDocument ?? readDocumentPreview;
  try {
    const text = await preview(fixture.documentPath, deps.config.previewChars);
    return text || undefined;
  } catch (error) {
    deps.logger.warn(`Could not extract a text preview from ${fixture.documentPath}: ${errorMessage(error)}`);
    return undefined;
  }
}

async function runAttempt(
  attempt: number,
  request: Omit<GenerationRequest, "attempt" | "lastError">,
  lastError: string,
  fixture: Fixture,
  deps: AgentDependencies
): Promise<AttemptRecord> {
  let raw: string;
  try {
    raw = await deps.generator.generate({ ...request, attempt, lastError });
  } catch (error) {
    return {
      attempt,
      sourceLength: 0,
      outcome: { ok: false, failure: "generation", diagnostic: `Generation failed: ${errorMessage(error)}` },
    };
  }

  let modulePath: string;
  try {
    modulePath = saveCandidate(deps.config.parserDir, fixture.target, raw, deps.logger);
  } catch (error) {
    return {
      attempt,
      sourceLength: raw.length,
      outcome: { ok: false, failure: "load", diagnostic: `Could not save parser module: ${errorMessage(error)}` },
    };
  }
  const outcome = await verifyCandidateFile(modulePath, fixture.documentPath, fixture.tablePath);
  return { attempt, modulePath, sourceLength: raw.length, outcome };
}

export async function runAgent(rawTarget: string, deps: AgentDependencies): Promise<AgentResult> {
  const { config, logger } = deps;
  const reporter = deps.reporter ?? consoleReporter;
  const audit = deps.audit ?? new AuditLog();
  const target = normalizeTarget(rawTarget);

  const fixture = locateFixture(config.dataDir, target);
  const columns = readCsvHeader(fixture.tablePath);
  const documentPreview = await loadPreview(fixture, deps);

  reporter.line(`Starting LLM agent for target: ${target}`);
  reporter.line(`Expected columns: ${formatColumnList(columns)}`);

  const request = { target, columns, sampleName: basename(fixture.documentPath), documentPreview };
  const attempts: AttemptRecord[] = [];
  let lastError = "";

  for (let attempt = 1; attempt <= config.maxAttempts; attempt += 1) {
    reporter.line(`\nAttempt ${attempt}/${config.maxAttempts}`);
    logger.setContext({ target, attempt, phase: "attempt" });

    const record = await runAttempt(attempt, request, lastError, fixture, deps);
    attempts.push(record);
    audit.recordAttempt(target, record);
    reporter.line(record.outcome.diagnostic);

    if (record.outcome.ok) {
      logger.info("Verification passed");
      logger.clearContext();
      const modulePath = record.modulePath;
      reporter.line(
        `\nSuccess! Parser generated: ${modulePath ? relative(config.projectRoot, modulePath) : target}`
      );
      reporter.line("Running regression tests for verification...");
      const hookExitCode = await (deps.runHook ?? runRegressionTests)(
        config.regressionCommand,
        config.projectRoot,
        logger
      );
      reporter.line(`Regression tests exited with code ${hookExitCode}`);
      return { target, status: "success", attempts, modulePath, hookExitCode };
    }

    logger.warn(`Verification failed (${record.outcome.failure})`, {
      diagnostic: record.outcome.diagnostic.split("\n")[0],
    });
    lastError = record.outcome.diagnostic;
    if (attempt < config.maxAttempts) {
      reporter.line("Retry: refining based on last error...");
    }
  }

  logger.clearContext();
  reporter.line(
    `\nFailed after ${config.maxAttempts} attempts. Check ${relative(config.projectRoot, config.logFile)} for debug info.`
  );
  return { target, status: "exhausted", attempts };
}
