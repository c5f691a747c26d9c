// ABOUTME: Tests for the interactive mode prompt.
// ABOUTME: Verifies choice parsing, reading the first answer line and EOF handling.

import { describe, it, expect } from "vitest";
import { Readable, Writable } from "node:stream";
import { MODE_QUESTION, parseModeChoice, readAnswer } from "./prompt.js";

function readableFrom(data: string): Readable {
  return new Readable({
    read() {
      this.push(data);
      this.push(null);
    },
  });
}

function collectWritable(): { stream: Writable; data: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk, _encoding, cb) {
      chunks.push(Buffer.from(chunk));
      cb();
    },
  });
  return { stream, data: () => Buffer.concat(chunks).toString() };
}

describe("parseModeChoice", () => {
  it("defaults to memorable on an empty answer", () => {
    expect(parseModeChoice("")).toBe("memorable");
    expect(parseModeChoice("   ")).toBe("memorable");
  });

  it("normalises case and whitespace", () => {
    expect(parseModeChoice(" Random ")).toBe("random");
    expect(parseModeChoice("STRESS")).toBe("stress");
  });

  it("returns undefined for an unknown mode", () => {
    expect(parseModeChoice("bogus")).toBeUndefined();
  });
});

describe("readAnswer", () => {
  it("writes the question to the output", async () => {
    const { stream, data } = collectWritable();
    await readAnswer({ input: readableFrom("random\n"), output: stream });
    expect(data()).toBe("Choose mode [memorable/random/stress] (default: memorable): ");
    expect(data()).toBe(MODE_QUESTION);
  });

  it("reads the first line from input", async () => {
    const { stream } = collectWritable();
    const answer = await readAnswer({ input: readableFrom("stress\nrandom\n"), output: stream });
    expect(answer).toBe("stress");
  });

  it("resolves an empty line as an empty answer", async () => {
    const { stream } = collectWritable();
    const answer = await readAnswer({ input: readableFrom("\n"), output: stream });
    expect(answer).toBe("");
  });

  it("rejects on EOF before an answer", async () => {
    const { stream } = collectWritable();
    await expect(readAnswer({ input: readableFrom(""), output: stream })).rejects.toThrow(
      "stdin closed before a mode was chosen",
    );
  });
});
