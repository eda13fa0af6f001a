/**
 * Persistence of generated parser modules. One file per target, overwritten
 * on every attempt.
 */

import { existsSync, mkdirSync, readdirSync, writeFileSync } from "fs";
import { join } from "path";
import { prepareSource } from "./extract";
import { Logger } from "./logger";

export const CANDIDATE_SUFFIX = "_parser.ts";

export function candidatePath(parserDir: string, target: string): string {
  return join(parserDir, `${target}${CANDIDATE_SUFFIX}`);
}

export function saveCandidate(parserDir: string, target: string, raw: string, logger?: Logger): string {
  mkdirSync(parserDir, { recursive: true });
  const path = candidatePath(parserDir, target);
  writeFileSync(path, prepareSource(raw), "utf8");
  logger?.info(`Saved cleaned parser to ${path}`);
  return path;
}

/**
 * Targets that currently have a generated parser on disk.
 */
export function listCandidateTargets(parserDir: string): string[] {
  if (!existsSync(parserDir)) {
    return [];
  }
  return readdirSync(parserDir)
    .filter((name) => name.endsWith(CANDIDATE_SUFFIX))
    .map((name) => name.slice(0, -CANDIDATE_SUFFIX.length))
    .sort();
}
