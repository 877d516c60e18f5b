import type { LogEntry, LogTransport } from "../types.js";

export interface JsonTransportOptions {
  /** Custom output function (default: console.log) */
  output?: (line: string) => void;
}

/**
 * One JSON object per line.
 *
 * @example
 * ```typescript
 * const lines: string[] = [];
 * const transport = new JsonTransport({ output: (line) => lines.push(line) });
 * // {"time":"2025-01-01T10:00:00.000Z","level":"info","message":"Hello"}
 * ```
 */
export class JsonTransport implements LogTransport {
  private readonly output: (line: string) => void;

  constructor(options: JsonTransportOptions = {}) {
    this.output = options.output ?? ((line) => console.log(line));
  }

  log(entry: LogEntry): void {
    const record: Record<string, unknown> = {
      time: entry.timestamp.toISOString(),
      level: entry.level,
    };

    if (entry.context && Object.keys(entry.context).length > 0) {
      record.context = entry.context;
    }
    record.message = entry.message;
    if (entry.data !== undefined) {
      record.data = entry.data;
    }
    if (entry.traceId) {
      record.traceId = entry.traceId;
      record.spanId = entry.spanId;
    }

    this.output(JSON.stringify(record));
  }
}
