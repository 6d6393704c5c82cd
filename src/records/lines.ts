/**
 * Trimmed, non-blank lines of a record file.
 */
export function recordLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
