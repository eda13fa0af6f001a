#!/usr/bin/env node
/**
 * statement-agent: generate a parser for one target and verify it.
 *
 *   npm run agent -- --target icici
 */

import { join } from "path";
import { parseArgs } from "util";
import { AuditLog } from "./lib/audit";
import { ConfigManager, loadEnvironment, resolveRuntimeConfig } from "./lib/config";
import { errorMessage, isFatalError } from "./lib/errors";
import { normalizeTarget } from "./lib/fixtures";
import { createGenerationClient } from "./lib/generation";
import { Logger } from "./lib/logger";
import { ParserGenerator, Reporter, consoleReporter, runAgent } from "./lib/orchestrator";
import { RuntimeConfig } from "./lib/types";

export const CONFIG_FILE = "agent.config.json";
export const USAGE = "Usage: statement-agent --target <name>";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_USAGE = 2;

export interface MainOptions {
  projectRoot?: string;
  env?: NodeJS.ProcessEnv;
  reporter?: Reporter;
  errorOutput?: (message: string) => void;
  createGenerator?: (config: RuntimeConfig, logger: Logger) => ParserGenerator;
  runHook?: (command: string[], cwd: string, logger?: Logger) => Promise<number>;
}

function parseTarget(argv: string[]): string | undefined {
  const { values } = parseArgs({
    args: argv,
    options: {
      target: { type: "string", short: "t" },
    },
  });
  const target = values.target ? normalizeTarget(values.target) : "";
  return target || undefined;
}

/**
 * Run the agent and return the process exit code. Exhausting every attempt
 * is a clean exit; only usage and fatal errors are not.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const reporter = options.reporter ?? consoleReporter;
  const errorOutput = options.errorOutput ?? ((message: string) => console.error(message));
  const projectRoot = options.projectRoot ?? process.cwd();

  let target: string | undefined;
  try {
    target = parseTarget(argv);
  } catch (error) {
    errorOutput(`${errorMessage(error)}\n${USAGE}`);
    return EXIT_USAGE;
  }
  if (!target) {
    errorOutput(USAGE);
    return EXIT_USAGE;
  }

  const manager = new ConfigManager(projectRoot, join(projectRoot, CONFIG_FILE));
  try {
    if (!options.env) {
      loadEnvironment(manager);
    }
    const config = resolveRuntimeConfig(manager, options.env ?? process.env);
    const logger = new Logger({ level: "info", console: false, logFile: config.logFile });
    const generator = (options.createGenerator ?? createGenerationClient)(config, logger);
    const audit = new AuditLog();

    const result = await runAgent(target, {
      config,
      generator,
      logger,
      reporter,
      audit,
      runHook: options.runHook,
    });
    audit.save(join(config.parserDir, `${result.target}_audit.json`));
    return EXIT_OK;
  } catch (error) {
    if (isFatalError(error)) {
      errorOutput(`Fatal: ${error.message}`);
      return EXIT_FATAL;
    }
    throw error;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error(error);
      process.exitCode = EXIT_FATAL;
    });
}
