// ABOUTME: Tests for the random source helpers.
// ABOUTME: Verifies pick/sample against scripted sources and the range of the built-in sources.

import { describe, it, expect } from "vitest";
import { cryptoRandom, mathRandom, pick, sample, type RandomSource } from "./rng.js";

const lastIndex: RandomSource = { int: (max) => max - 1 };

function fixed(value: number): RandomSource {
  return { int: () => value };
}

describe("sample", () => {
  it("draws every item when k equals the list length", () => {
    expect(sample(lastIndex, ["cat", "dog", "sun"], 3)).toEqual(["sun", "cat", "dog"]);
  });

  it("returns only k items", () => {
    expect(sample(lastIndex, ["cat", "dog", "sun"], 2)).toEqual(["sun", "cat"]);
  });

  it("keeps input order when the source always returns 0", () => {
    expect(sample(fixed(0), ["a", "b", "c", "d"], 3)).toEqual(["a", "b", "c"]);
  });

  it("does not mutate the input", () => {
    const items = ["cat", "dog", "sun"];
    sample(lastIndex, items, 3);
    expect(items).toEqual(["cat", "dog", "sun"]);
  });

  it("never repeats an item", () => {
    const items = ["a", "b", "c", "d", "e", "f", "g"];
    for (let i = 0; i < 100; i++) {
      const drawn = sample(mathRandom, items, 5);
      expect(new Set(drawn).size).toBe(5);
    }
  });

  it("throws when k exceeds the list length", () => {
    expect(() => sample(mathRandom, ["a", "b", "c"], 4)).toThrow(
      "Cannot sample 4 item(s) from a list of 3"
    );
  });
});

describe("pick", () => {
  it("returns the item at the drawn index", () => {
    expect(pick(fixed(1), ["a", "b", "c"])).toBe("b");
  });

  it("throws on an empty list", () => {
    expect(() => pick(mathRandom, [])).toThrow("Cannot pick from an empty list");
  });
});

describe("built-in sources", () => {
  const builtIn: Array<[string, RandomSource]> = [
    ["mathRandom", mathRandom],
    ["cryptoRandom", cryptoRandom],
  ];

  it.each(builtIn)("%s stays within [0, max)", (_name, source) => {
    for (let i = 0; i < 500; i++) {
      const n = source.int(10);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(10);
    }
  });
});
