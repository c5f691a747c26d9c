// ABOUTME: Stderr logging helper that keeps stdout clean for generated passwords.
// ABOUTME: Diagnostics go through log(); passwords themselves go to stdout and the history files.

export function log(msg: string): void {
  process.stderr.write(msg + "\n");
}
