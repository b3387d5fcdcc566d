/**
 * Word list parsing for the scramble importer: one word per line, `#` starts
 * a comment line.
 */
import { normalizeWordList } from "@/db";

export function parseWordList(text: string): string[] {
  const lines = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
  return normalizeWordList(lines);
}
