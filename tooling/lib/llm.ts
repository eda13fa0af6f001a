/**
 * LLM prompt construction
 * Builds the instructions that ask the model for a statement parser module
 */

import { GenerationRequest } from "./types";

export const NO_PREVIOUS_ERROR = "None";

export type ChatMessage = {
  role: "system" | "user";
  content: string;
};

/**
 * Builds the system prompt that defines the model's role
 */
export function buildSystemPrompt(): string {
  return "You are a senior TypeScript engineer who writes deterministic parsers for bank statement PDFs.";
}

/**
 * Format the ordered column list exactly as the parser must produce it
 */
export function formatColumnList(columns: string[]): string {
  return JSON.stringify(columns);
}

/**
 * Requirements every generated module must satisfy
 */
export function buildRequirements(columns: string[]): string[] {
  return [
    "Generate a TypeScript module that exports:",
    "    export async function parse(pdfPath: string): Promise<Table>",
    "where Table is { columns: Array<{ name: string; values: Array<string | number | boolean | null> }> }.",
    "Requirements:",
    "  - Use the \"unpdf\" package (extractText, getDocumentProxy) to read the PDF; read the file with \"fs\".",
    `  - Return exactly these columns, in this order: ${formatColumnList(columns)}.`,
    "  - Every column must have the same number of values, one per statement row.",
    "  - Output must equal the expected CSV exactly: same rows, same order, same cell types.",
    "  - Use numbers for numeric amounts, null for empty cells, strings for everything else; trim spaces.",
    "  - Do not depend on any package other than unpdf and Node built-ins.",
    "  - Must be deterministic and runnable without network access.",
    "  - Start with a doc comment describing the module's purpose.",
  ];
}

/**
 * Build complete user message for one attempt
 */
export function buildUserMessage(request: GenerationRequest): string {
  const sections: string[] = [
    ...buildRequirements(request.columns),
    "",
    `Bank name: ${request.target.toUpperCase()}.`,
    `Sample PDF: ${request.sampleName}.`,
    `Attempt #: ${request.attempt}.`,
    `Last error summary: ${request.lastError ? request.lastError : NO_PREVIOUS_ERROR}.`,
  ];

  if (request.documentPreview) {
    sections.push("", "Sample PDF text (excerpt):", request.documentPreview);
  }

  sections.push("", "Respond with the module source in a single fenced code block.");

  return sections.join("\n");
}

export function buildMessages(request: GenerationRequest): ChatMessage[] {
  return [
    { role: "system", content: buildSystemPrompt() },
    { role: "user", content: buildUserMessage(request) },
  ];
}
