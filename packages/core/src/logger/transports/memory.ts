import type { LogEntry, LogLevel, LogTransport } from "../types.js";

/**
 * Keeps entries in memory. Meant for tests.
 */
export class MemoryTransport implements LogTransport {
  readonly entries: LogEntry[] = [];

  log(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
