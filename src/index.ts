#!/usr/bin/env node
// ABOUTME: CLI entry point for the password generator.
// ABOUTME: Wires the commander program to the process streams and reports fatal errors.

import { createProgram } from "./cli.js";
import { log } from "./log.js";

async function main() {
  try {
    const program = createProgram({
      input: process.stdin,
      output: process.stdout,
      errors: process.stderr,
    });
    await program.parseAsync();
  } catch (err) {
    log(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

void main();
