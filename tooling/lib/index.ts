/**
 * Central export point for all library modules
 */

export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./logger";
export * from "./csv";
export * from "./fixtures";
export * from "./extract";
export * from "./candidates";
export * from "./loader";
export * from "./verifier";
export * from "./llm";
export * from "./generation";
export * from "./document";
export * from "./hook";
export * from "./audit";
export * from "./orchestrator";
