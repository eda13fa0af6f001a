/**
 * Structured Logging for the parser agent
 * Keeps entries in memory, optionally echoes to the console and appends
 * one line per entry to a log file.
 */

import { appendFileSync, mkdirSync } from "fs";
import { dirname } from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  target?: string;
  attempt?: number;
  phase?: string;
  component?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export interface LoggerOptions {
  level?: LogLevel;
  console?: boolean;
  logFile?: string;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private shouldLog: boolean;
  private logFile?: string;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.shouldLog = options.console ?? true;
    this.logFile = options.logFile;
    if (this.logFile) {
      mkdirSync(dirname(this.logFile), { recursive: true });
    }
  }

  /**
   * Merge context into all subsequent logs
   */
  setContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };

    this.entries.push(entry);

    const line = this.formatLog(entry, this.buildPrefix(entry));
    if (this.logFile) {
      appendFileSync(this.logFile, `${entry.timestamp} ${level.toUpperCase()} ${line}\n`, "utf8");
    }
    if (this.shouldLog) {
      this.consoleLog(level, line);
    }
  }

  private buildPrefix(entry: LogEntry): string {
    if (!entry.context) return "";

    const parts: string[] = [];
    if (entry.context.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context.component) parts.push(`<${entry.context.component}>`);
    if (entry.context.target) parts.push(`${entry.context.target}`);
    if (entry.context.attempt) parts.push(`Attempt ${entry.context.attempt}`);

    return parts.length > 0 ? parts.join(" ") + ": " : "";
  }

  /**
   * Single-line rendering used for both the console and the log file
   */
  private formatLog(entry: LogEntry, prefix: string): string {
    let result = prefix + entry.message;

    if (entry.data) {
      const dataStr = this.formatData(entry.data);
      if (dataStr) {
        result += ` (${dataStr})`;
      }
    }

    return result;
  }

  private formatData(data: Record<string, unknown>): string {
    const parts: string[] = [];

    for (const [key, value] of Object.entries(data)) {
      if (Array.isArray(value)) {
        parts.push(`${key}: [${value.length} items]`);
      } else if (typeof value === "object" && value !== null) {
        parts.push(`${key}: ${JSON.stringify(value)}`);
      } else {
        parts.push(`${key}: ${String(value)}`);
      }
    }

    return parts.join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Entries at or above a level
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    const index = LEVELS.indexOf(level);
    return this.entries.filter(entry => LEVELS.indexOf(entry.level) >= index);
  }
}
