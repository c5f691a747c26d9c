// ABOUTME: Interactive mode prompt used when the CLI is started without a subcommand.
// ABOUTME: Writes the question to an output stream and reads the first line of the answer.

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

export const MODES = ["memorable", "random", "stress"] as const;
export type Mode = (typeof MODES)[number];

export const DEFAULT_MODE: Mode = "memorable";
export const MODE_QUESTION = `Choose mode [${MODES.join("/")}] (default: ${DEFAULT_MODE}): `;

interface PromptOptions {
  input?: Readable;
  output?: Writable;
}

function isMode(value: string): value is Mode {
  return MODES.some((m) => m === value);
}

export function parseModeChoice(answer: string): Mode | undefined {
  const choice = answer.trim().toLowerCase() || DEFAULT_MODE;
  return isMode(choice) ? choice : undefined;
}

export function readAnswer(opts: PromptOptions = {}): Promise<string> {
  const input = opts.input ?? process.stdin;
  const output = opts.output ?? process.stderr;

  output.write(MODE_QUESTION);

  return new Promise((resolve, reject) => {
    const rl = createInterface({ input });
    let settled = false;

    rl.on("line", (line: string) => {
      if (!settled) {
        settled = true;
        rl.close();
        resolve(line);
      }
    });

    rl.on("close", () => {
      if (!settled) {
        settled = true;
        reject(new Error("stdin closed before a mode was chosen"));
      }
    });
  });
}
