// ABOUTME: Append-only password log with one timestamped line per generated password.
// ABOUTME: Formats and parses "<timestamp>  |  <password>" entries.

import { appendFileSync, existsSync, mkdirSync } from "fs";
import { dirname } from "path";

export const ENTRY_SEPARATOR = "  |  ";

export interface HistoryEntry {
  timestamp: string;
  password: string;
}

export interface History {
  readonly file: string;
  append(password: string): void;
}

// e.g. "Mon Jan 05 2026 09:07:03", local time
export function formatTimestamp(date: Date): string {
  return `${date.toDateString()} ${date.toTimeString().slice(0, 8)}`;
}

export function formatEntry(password: string, date: Date): string {
  return `${formatTimestamp(date)}${ENTRY_SEPARATOR}${password}\n`;
}

export function parseEntry(line: string): HistoryEntry | undefined {
  const trimmed = line.replace(/\r?\n$/, "");
  const at = trimmed.indexOf(ENTRY_SEPARATOR);
  if (at <= 0) {
    return undefined;
  }
  return {
    timestamp: trimmed.slice(0, at),
    password: trimmed.slice(at + ENTRY_SEPARATOR.length),
  };
}

export function createHistory(file: string, now: () => Date = () => new Date()): History {
  return {
    file,

    append(password: string): void {
      const dir = dirname(file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      appendFileSync(file, formatEntry(password, now()), "utf-8");
    },
  };
}
