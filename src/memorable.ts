// ABOUTME: Memorable password generator: hyphen-joined nouns with optional digit suffixes.
// ABOUTME: Words and case styles come from the general PRNG, digits from the CSPRNG.

import type { History } from "./history.js";
import { defaultSources, pick, sample, type RandomSources } from "./rng.js";

export const WORD_CASES = ["lower", "upper", "title", "mixed"] as const;
export type WordCase = (typeof WORD_CASES)[number];
export type CaseStyle = Exclude<WordCase, "mixed">;

const MIXED_STYLES: readonly CaseStyle[] = ["lower", "upper", "title"];

export interface MemorableOptions {
  pool: readonly string[];
  wordCount?: number;
  // Accepts untrusted input; validated against WORD_CASES
  case?: string;
  appendDigits?: boolean;
}

export function isWordCase(value: string): value is WordCase {
  return WORD_CASES.some((c) => c === value);
}

export function validateWordCount(wordCount: number): void {
  if (!Number.isInteger(wordCount) || wordCount < 1) {
    throw new Error(`Invalid word count: ${wordCount}. Must be an integer >= 1.`);
  }
}

export function applyCase(word: string, style: CaseStyle): string {
  switch (style) {
    case "lower":
      return word.toLowerCase();
    case "upper":
      return word.toUpperCase();
    case "title":
      // Every run of letters starts a new capitalised word: "o'neil" -> "O'Neil"
      return word.replace(/\p{L}+/gu, (run) => run.charAt(0).toUpperCase() + run.slice(1).toLowerCase());
  }
}

export function generateMemorable(
  options: MemorableOptions,
  history: History,
  sources: RandomSources = defaultSources,
): string {
  const wordCount = options.wordCount ?? 4;
  const wordCase = options.case ?? "lower";
  const appendDigits = options.appendDigits ?? true;

  validateWordCount(wordCount);
  if (!isWordCase(wordCase)) {
    throw new Error(`Invalid case: ${wordCase}. Must be one of: ${WORD_CASES.join(", ")}`);
  }

  const distinct = [...new Set(options.pool)];
  if (wordCount > distinct.length) {
    throw new Error(
      `Invalid word count: ${wordCount}. The word pool only has ${distinct.length} distinct word(s).`
    );
  }

  const words = sample(sources.rng, distinct, wordCount).map((word) => {
    const style = wordCase === "mixed" ? pick(sources.rng, MIXED_STYLES) : wordCase;
    const cased = applyCase(word, style);
    return appendDigits ? `${cased}${sources.secureRng.int(10)}` : cased;
  });

  const password = words.join("-");
  history.append(password);
  return password;
}
