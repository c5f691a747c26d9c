// ABOUTME: Random password generator drawing every character from a CSPRNG.
// ABOUTME: Builds a sorted, de-duplicated alphabet from letters, digits and optional punctuation.

import type { History } from "./history.js";
import { defaultSources, type RandomSources } from "./rng.js";

export const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
export const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const DIGITS = "0123456789";
export const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";

export interface RandomOptions {
  length?: number;
  includePunctuation?: boolean;
  forbidden?: Iterable<string>;
}

export function buildAlphabet(includePunctuation: boolean, forbidden: Iterable<string> = []): string {
  const chars = new Set(LOWERCASE + UPPERCASE + DIGITS + (includePunctuation ? PUNCTUATION : ""));
  for (const entry of forbidden) {
    // A forbidden entry may itself be a string of several characters
    for (const ch of entry) {
      chars.delete(ch);
    }
  }
  return [...chars].sort().join("");
}

export function generateRandom(
  options: RandomOptions,
  history: History,
  sources: Pick<RandomSources, "secureRng"> = defaultSources,
): string {
  const length = options.length ?? 16;
  if (!Number.isInteger(length) || length < 1) {
    throw new Error(`Invalid length: ${length}. Must be an integer >= 1.`);
  }

  const alphabet = buildAlphabet(options.includePunctuation ?? true, options.forbidden ?? "");
  if (alphabet.length === 0) {
    throw new Error("No characters available to generate password.");
  }

  let password = "";
  for (let i = 0; i < length; i++) {
    password += alphabet[sources.secureRng.int(alphabet.length)];
  }

  history.append(password);
  return password;
}
