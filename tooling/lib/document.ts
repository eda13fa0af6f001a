/**
 * Text preview of a sample statement for the prompt
 */

import { readFileSync } from "fs";

/**
 * Extract the PDF's text and cut it to `maxChars`. Pages are joined with a
 * blank line.
 */
export async function readDocumentPreview(path: string, maxChars: number): Promise<string> {
  if (maxChars <= 0) {
    return "";
  }

  const { extractText, getDocumentProxy } = await import("unpdf");
  const pdf = await getDocumentProxy(new Uint8Array(readFileSync(path)));
  try {
    const { text } = await extractText(pdf, { mergePages: false });
    return truncatePreview(text.join("\n\n"), maxChars);
  } finally {
    await pdf.cleanup();
  }
}

export function truncatePreview(text: string, maxChars: number): string {
  const normalized = text.replace(/[ \t]+\n/g, "\n").trim();
  if (normalized.length <= maxChars) {
    return normalized;
  }
  return `${normalized.slice(0, maxChars)}\n[... truncated]`;
}
