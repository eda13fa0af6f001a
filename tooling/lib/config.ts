/**
 * Configuration loading and path expansion utilities
 */

import { existsSync, readFileSync } from "fs";
import { isAbsolute, join } from "path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import { MissingCredentialError } from "./errors";
import { Config, RuntimeConfig } from "./types";

export const DEFAULT_ENV_SEARCH_PATHS = [".env"];
export const DEFAULT_DATA_DIR = "data";
export const DEFAULT_PARSER_DIR = "custom_parsers";
export const DEFAULT_LOG_FILE = "agent.log";
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_MODEL = "openai/gpt-oss-120b";
export const DEFAULT_TEMPERATURE = 0.2;
export const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";
export const DEFAULT_API_KEY_ENV = "GROQ_API_KEY";
export const DEFAULT_PREVIEW_CHARS = 2000;
export const DEFAULT_REGRESSION_COMMAND = ["npm", "test"];

const configSchema = z.object({
  envSearchPaths: z.array(z.string()).optional(),
  dataDir: z.string().min(1).optional(),
  parserDir: z.string().min(1).optional(),
  logFile: z.string().min(1).optional(),
  maxAttempts: z.number().int().positive().optional(),
  model: z.string().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  baseURL: z.string().url().optional(),
  apiKeyEnv: z.string().min(1).optional(),
  previewChars: z.number().int().nonnegative().optional(),
  regressionCommand: z.array(z.string()).nonempty().optional(),
});

export class ConfigManager {
  private config: Config;
  private projectRoot: string;

  constructor(projectRoot: string, configPath: string) {
    this.projectRoot = projectRoot;
    this.config = this.readConfig(configPath);
  }

  private readConfig(configPath: string): Config {
    if (!existsSync(configPath)) {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }

    try {
      const raw = readFileSync(configPath, "utf8");
      const parsed = configSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    } catch {
      return { envSearchPaths: DEFAULT_ENV_SEARCH_PATHS };
    }
  }

  expandPath(rawPath: string): string {
    if (rawPath.startsWith("~/")) {
      const home = process.env.HOME;
      if (!home) {
        return rawPath.slice(2);
      }
      return join(home, rawPath.slice(2));
    }

    if (isAbsolute(rawPath)) {
      return rawPath;
    }

    return join(this.projectRoot, rawPath);
  }

  getProjectRoot(): string {
    return this.projectRoot;
  }

  getEnvSearchPaths(): string[] {
    return this.config.envSearchPaths ?? DEFAULT_ENV_SEARCH_PATHS;
  }

  getDataDir(): string {
    return this.expandPath(this.config.dataDir ?? DEFAULT_DATA_DIR);
  }

  getParserDir(): string {
    return this.expandPath(this.config.parserDir ?? DEFAULT_PARSER_DIR);
  }

  getLogFile(): string {
    return this.expandPath(this.config.logFile ?? DEFAULT_LOG_FILE);
  }

  getMaxAttempts(): number {
    return this.config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  }

  getModel(): string {
    return this.config.model ?? DEFAULT_MODEL;
  }

  getTemperature(): number {
    return this.config.temperature ?? DEFAULT_TEMPERATURE;
  }

  getBaseURL(): string {
    return this.config.baseURL ?? DEFAULT_BASE_URL;
  }

  getApiKeyEnv(): string {
    return this.config.apiKeyEnv ?? DEFAULT_API_KEY_ENV;
  }

  getPreviewChars(): number {
    return this.config.previewChars ?? DEFAULT_PREVIEW_CHARS;
  }

  getRegressionCommand(): string[] {
    return this.config.regressionCommand ?? DEFAULT_REGRESSION_COMMAND;
  }

  getConfig(): Config {
    return this.config;
  }
}

/**
 * Load .env files from the configured search paths until the key is present.
 * Existing environment variables are never overridden.
 */
export function loadEnvironment(manager: ConfigManager): void {
  const keyName = manager.getApiKeyEnv();
  for (const candidate of manager.getEnvSearchPaths()) {
    if (process.env[keyName]) {
      break;
    }
    const expanded = manager.expandPath(candidate);
    if (!expanded || !existsSync(expanded)) {
      continue;
    }
    loadEnv({ path: expanded, override: false });
  }
}

export function resolveRuntimeConfig(
  manager: ConfigManager,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const keyName = manager.getApiKeyEnv();
  const apiKey = env[keyName]?.trim();
  if (!apiKey) {
    throw new MissingCredentialError(keyName);
  }

  return {
    apiKey,
    baseURL: manager.getBaseURL(),
    model: manager.getModel(),
    temperature: manager.getTemperature(),
    maxAttempts: manager.getMaxAttempts(),
    dataDir: manager.getDataDir(),
    parserDir: manager.getParserDir(),
    logFile: manager.getLogFile(),
    previewChars: manager.getPreviewChars(),
    regressionCommand: manager.getRegressionCommand(),
    projectRoot: manager.getProjectRoot(),
  };
}
