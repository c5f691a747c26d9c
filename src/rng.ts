// ABOUTME: Injectable random sources used by the password generators.
// ABOUTME: Pairs a general-purpose PRNG with a CSPRNG and provides pick/sample helpers.

import { randomInt } from "crypto";

export interface RandomSource {
  /** Uniform integer in [0, max). */
  int(max: number): number;
}

export interface RandomSources {
  // Word sampling, case selection and stress parameters
  rng: RandomSource;
  // Digit suffixes and random-password characters
  secureRng: RandomSource;
}

export const mathRandom: RandomSource = {
  int(max: number): number {
    return Math.floor(Math.random() * max);
  },
};

export const cryptoRandom: RandomSource = {
  int(max: number): number {
    return randomInt(max);
  },
};

export const defaultSources: RandomSources = {
  rng: mathRandom,
  secureRng: cryptoRandom,
};

export function pick<T>(source: RandomSource, items: readonly T[]): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  return items[source.int(items.length)];
}

/**
 * Draws `k` items without replacement (partial Fisher-Yates over a copy).
 * Order of the result is random; the input is left untouched.
 */
export function sample<T>(source: RandomSource, items: readonly T[], k: number): T[] {
  if (k < 0 || k > items.length) {
    throw new Error(`Cannot sample ${k} item(s) from a list of ${items.length}`);
  }
  const copy = [...items];
  for (let i = 0; i < k; i++) {
    const j = i + source.int(copy.length - i);
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy.slice(0, k);
}
