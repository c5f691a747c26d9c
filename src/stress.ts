// ABOUTME: Batch driver that fills both password logs with randomly parameterised passwords.
// ABOUTME: Each iteration flips a coin between the memorable and random generators.

import type { History } from "./history.js";
import { WORD_CASES, generateMemorable } from "./memorable.js";
import { generateRandom } from "./random.js";
import { defaultSources, pick, type RandomSources } from "./rng.js";

export const DEFAULT_STRESS_COUNT = 1000;

// Visually ambiguous characters excluded from stress-mode random passwords
export const AMBIGUOUS_CHARACTERS = "O0Il|`'\" ";

const WORD_COUNTS = [3, 4, 5] as const;
const LENGTHS = [12, 14, 16, 20] as const;
const BOOLEANS = [true, false] as const;

export interface StressOptions {
  pool: readonly string[];
  histories: {
    memorable: History;
    random: History;
  };
  count?: number;
}

export interface StressSummary {
  memorable: number;
  random: number;
}

export function runStress(options: StressOptions, sources: RandomSources = defaultSources): StressSummary {
  const count = options.count ?? DEFAULT_STRESS_COUNT;
  const summary: StressSummary = { memorable: 0, random: 0 };

  for (let i = 0; i < count; i++) {
    if (sources.rng.int(2) === 0) {
      generateMemorable(
        {
          pool: options.pool,
          wordCount: pick(sources.rng, WORD_COUNTS),
          case: pick(sources.rng, WORD_CASES),
          appendDigits: true,
        },
        options.histories.memorable,
        sources,
      );
      summary.memorable++;
    } else {
      generateRandom(
        {
          length: pick(sources.rng, LENGTHS),
          includePunctuation: pick(sources.rng, BOOLEANS),
          forbidden: AMBIGUOUS_CHARACTERS,
        },
        options.histories.random,
        sources,
      );
      summary.random++;
    }
  }

  return summary;
}
