/**
 * Pull module source out of a chat completion
 */

const FENCED_BLOCK = /```[^\n`]*\r?\n([\s\S]*?)```/;

/**
 * Interior of the first fenced code block, or the text unchanged when there
 * is none.
 */
export function extractCode(raw: string): string {
  const match = FENCED_BLOCK.exec(raw);
  return match ? match[1] : raw;
}

/**
 * Source as written to disk: trailing whitespace removed, one final newline.
 */
export function prepareSource(raw: string): string {
  return extractCode(raw).trimEnd() + "\n";
}
