/**
 * Shared type definitions for the parser agent
 */

export type Config = {
  envSearchPaths?: string[];
  dataDir?: string;
  parserDir?: string;
  logFile?: string;
  maxAttempts?: number;
  model?: string;
  temperature?: number;
  baseURL?: string;
  apiKeyEnv?: string;
  previewChars?: number;
  regressionCommand?: string[];
};

/**
 * Fully resolved settings, built once at startup and passed explicitly.
 */
export type RuntimeConfig = {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature: number;
  maxAttempts: number;
  dataDir: string;
  parserDir: string;
  logFile: string;
  previewChars: number;
  regressionCommand: string[];
  projectRoot: string;
};

export type Fixture = {
  target: string;
  documentPath: string;
  tablePath: string;
};

export type FailureKind = "generation" | "load" | "execution" | "mismatch";

export type VerificationResult =
  | { ok: true; diagnostic: string }
  | { ok: false; diagnostic: string; failure: FailureKind };

export type GenerationRequest = {
  target: string;
  columns: string[];
  sampleName: string;
  attempt: number;
  lastError: string;
  documentPreview?: string;
};

export type AttemptRecord = {
  attempt: number;
  modulePath?: string;
  sourceLength: number;
  outcome: VerificationResult;
};

export type AgentStatus = "success" | "exhausted";

export type AgentResult = {
  target: string;
  status: AgentStatus;
  attempts: AttemptRecord[];
  modulePath?: string;
  hookExitCode?: number;
};
