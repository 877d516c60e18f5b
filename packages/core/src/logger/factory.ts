import { Logger } from "./logger.js";
import { ConsoleTransport } from "./transports/console.js";
import { JsonTransport } from "./transports/json.js";
import type { LogLevel } from "./types.js";

export interface CreateLoggerOptions {
  /** Logger name, bound as `logger` in the context (default: 'tessera') */
  name?: string;
  /** Minimum log level (default: 'info') */
  level?: LogLevel;
  /** Single-line JSON instead of human-readable output */
  json?: boolean;
  /** Force console colors on or off; auto-detected otherwise */
  colors?: boolean;
  /** Line sink for JSON output */
  output?: (line: string) => void;
}

/**
 * Build a logger with one console or JSON transport.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "debug" });
 * const prodLogger = createLogger({ name: "ingest", json: true });
 * ```
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const transport = options.json
    ? new JsonTransport({ output: options.output })
    : new ConsoleTransport({ colors: options.colors });

  return new Logger({
    level: options.level ?? "info",
    context: { logger: options.name ?? "tessera" },
    transports: [transport],
  });
}
