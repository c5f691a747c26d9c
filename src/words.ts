// ABOUTME: Loads the noun pool used for memorable passwords.
// ABOUTME: Reads a one-word-per-line text file, optionally truncated to its first N words.

import { readFileSync } from "fs";
import { fileURLToPath } from "node:url";

export const DEFAULT_WORD_LIST = fileURLToPath(new URL("../data/nouns.txt", import.meta.url));

export function loadWords(path: string, limit?: number): string[] {
  const words = readFileSync(path, "utf-8")
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return limit === undefined ? words : words.slice(0, limit);
}
