/**
 * Error taxonomy for the parser agent.
 *
 * Fatal errors abort the run before any attempt. Everything else is local to
 * one attempt and ends up as feedback for the next prompt.
 */

import { types } from "util";

export class AgentError extends Error {
  public readonly code: string;
  public readonly fatal: boolean;

  constructor(message: string, options: { code: string; fatal?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.fatal = options.fatal ?? false;
  }
}

export class MissingFixtureError extends AgentError {
  constructor(message: string) {
    super(message, { code: "MISSING_FIXTURE", fatal: true });
  }
}

export class MissingCredentialError extends AgentError {
  constructor(variable: string) {
    super(`${variable} missing. Set it in the environment or a .env file.`, {
      code: "MISSING_CREDENTIAL",
      fatal: true,
    });
  }
}

export class GenerationServiceError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "GENERATION_FAILED", cause });
  }
}

export class LoadError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "LOAD_FAILED", cause });
  }
}

export class ExecutionError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "EXECUTION_FAILED", cause });
  }
}

export class MismatchError extends AgentError {
  constructor(message: string) {
    super(message, { code: "TABLE_MISMATCH" });
  }
}

export function isFatalError(error: unknown): error is AgentError {
  return error instanceof AgentError && error.fatal;
}

/**
 * Render any thrown value for a diagnostic: message plus stack when there is one.
 * Generated code runs outside the caller's realm, so errors are recognised
 * with `isNativeError` rather than `instanceof`.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error || types.isNativeError(error)) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error || types.isNativeError(error) ? error.message : String(error);
}
