/**
 * Audit Trail System
 * Tracks every attempt of a run and its verification outcome
 */

import { writeFileSync, mkdirSync } from "fs";
import { dirname } from "path";
import { AttemptRecord, FailureKind } from "./types";

export interface AuditEntry {
  timestamp: string;
  type: "attempt_passed" | "attempt_failed";
  target: string;
  details: {
    attempt: number;
    modulePath?: string;
    failure?: FailureKind;
    diagnostic: string;
  };
}

export interface AuditSummary {
  totalAttempts: number;
  succeeded: boolean;
  failuresByKind: Record<FailureKind, number>;
}

export class AuditLog {
  private entries: AuditEntry[] = [];
  private attempts: Map<string, AttemptRecord[]> = new Map();

  /**
   * Record the outcome of one attempt
   */
  recordAttempt(target: string, record: AttemptRecord): void {
    const existing = this.attempts.get(target) ?? [];
    existing.push(record);
    this.attempts.set(target, existing);

    const { outcome } = record;
    this.entries.push({
      timestamp: new Date().toISOString(),
      type: outcome.ok ? "attempt_passed" : "attempt_failed",
      target,
      details: {
        attempt: record.attempt,
        modulePath: record.modulePath,
        failure: outcome.ok ? undefined : outcome.failure,
        diagnostic: outcome.diagnostic,
      },
    });
  }

  getAttempts(target: string): AttemptRecord[] {
    return this.attempts.get(target) ?? [];
  }

  getSummary(target?: string): AuditSummary {
    const records = target ? this.getAttempts(target) : Array.from(this.attempts.values()).flat();
    const failuresByKind: Record<FailureKind, number> = {
      generation: 0,
      load: 0,
      execution: 0,
      mismatch: 0,
    };
    for (const record of records) {
      if (!record.outcome.ok) {
        failuresByKind[record.outcome.failure] += 1;
      }
    }

    return {
      totalAttempts: records.length,
      succeeded: records.some((record) => record.outcome.ok),
      failuresByKind,
    };
  }

  toJSON(): { entries: AuditEntry[]; summary: AuditSummary } {
    return {
      entries: this.entries,
      summary: this.getSummary(),
    };
  }

  /**
   * Persist as pretty-printed JSON
   */
  save(path: string): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(this.toJSON(), null, 2) + "\n", "utf8");
  }
}
