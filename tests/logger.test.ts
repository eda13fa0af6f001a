/**
 * Test suite for the Logger
 */

import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Logger } from "../tooling/lib/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger({ level: "debug", console: false });
  });

  describe("logging levels", () => {
    it("should log at debug level", () => {
      logger.debug("Debug message", { value: 42 });
      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("debug");
      expect(entries[0].message).toBe("Debug message");
    });

    it("should log at warn and error level", () => {
      logger.warn("Warning message");
      logger.error("Error message");
      const entries = logger.getEntries();
      expect(entries.map(e => e.level)).toEqual(["warn", "error"]);
    });
  });

  describe("log levels filtering", () => {
    it("should only log at or above configured level", () => {
      const infoLogger = new Logger({ level: "info", console: false });
      infoLogger.debug("Debug message");
      infoLogger.info("Info message");
      infoLogger.warn("Warn message");

      const entries = infoLogger.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe("info");
      expect(entries[1].level).toBe("warn");
    });
  });

  describe("context management", () => {
    it("should merge context updates", () => {
      logger.setContext({ target: "icici" });
      logger.setContext({ attempt: 1 });
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ target: "icici", attempt: 1 });
    });

    it("should clear all context", () => {
      logger.setContext({ target: "icici", attempt: 1 });
      logger.clearContext();
      logger.info("Message");

      expect(logger.getEntries()[0].context).toBeUndefined();
    });
  });

  describe("entry filtering", () => {
    it("should filter entries by level", () => {
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");
      logger.error("Error");

      const warnAndAbove = logger.getEntriesAtLevel("warn");
      expect(warnAndAbove.map(e => e.level)).toEqual(["warn", "error"]);
    });
  });

  describe("line format", () => {
    it("should prefix phase, target and attempt from the context", () => {
      const lines: string[] = [];
      const spy = jest.spyOn(console, "warn").mockImplementation((message: string) => {
        lines.push(message);
      });
      const consoleLogger = new Logger({ console: true });

      consoleLogger.setContext({ phase: "attempt", target: "icici", attempt: 3 });
      consoleLogger.warn("Verification failed", { diagnostic: "Mismatch in tables", rows: [1, 2] });
      spy.mockRestore();

      expect(lines).toEqual([
        "[attempt] icici Attempt 3: Verification failed (diagnostic: Mismatch in tables, rows: [2 items])",
      ]);
    });
  });

  describe("file sink", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "agent-log-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should append one line per entry with timestamp and level", () => {
      const logFile = join(dir, "logs", "agent.log");
      const fileLogger = new Logger({ console: false, logFile });

      fileLogger.info("Sending prompt to test-model");
      fileLogger.setContext({ target: "icici", attempt: 2 });
      fileLogger.warn("Verification failed", { failure: "load" });

      const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z INFO Sending prompt to test-model$/);
      expect(lines[1]).toMatch(/ WARN icici Attempt 2: Verification failed \(failure: load\)$/);
    });

    it("should append to an existing log file", () => {
      const logFile = join(dir, "agent.log");
      new Logger({ console: false, logFile }).info("first run");
      new Logger({ console: false, logFile }).info("second run");

      const lines = readFileSync(logFile, "utf8").trimEnd().split("\n");
      expect(lines).toHaveLength(2);
      expect(lines[1]).toMatch(/INFO second run$/);
    });

    it("should skip entries below the level threshold", () => {
      const logFile = join(dir, "agent.log");
      const fileLogger = new Logger({ level: "warn", console: false, logFile });
      fileLogger.info("ignored");

      expect(existsSync(logFile)).toBe(false);
    });
  });
});
