// ABOUTME: Configuration parsing from CLI args into explicit log and word-list paths.
// ABOUTME: Defines the PasswordGenConfig interface, buildConfig and ensureLogDirs.

import { existsSync, mkdirSync } from "fs";
import { dirname, join, resolve } from "path";
import { DEFAULT_WORD_LIST } from "./words.js";

export const LOG_FILE_NAME = "Generated_Passwords.txt";

export interface PasswordGenConfig {
  // One append-only log per generation mode
  logs: {
    memorable: string;
    random: string;
  };

  // Noun pool for memorable passwords
  words: {
    path: string;
    limit?: number;
  };
}

export interface CLIOptions {
  logDir?: string;
  wordList?: string;
  wordLimit?: number;
}

export function buildConfig(options: CLIOptions): PasswordGenConfig {
  const logDir = resolve(options.logDir || process.cwd());

  const limit = options.wordLimit;
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new Error(`Invalid word limit: ${limit}. Must be a positive integer.`);
  }

  return {
    logs: {
      memorable: join(logDir, "Memorable", LOG_FILE_NAME),
      random: join(logDir, "Random", LOG_FILE_NAME),
    },
    words: {
      path: options.wordList || DEFAULT_WORD_LIST,
      limit,
    },
  };
}

export function ensureLogDirs(config: PasswordGenConfig): void {
  for (const file of [config.logs.memorable, config.logs.random]) {
    const dir = dirname(file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}
