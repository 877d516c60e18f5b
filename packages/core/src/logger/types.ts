/**
 * Log severity levels in ascending order of importance.
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

/**
 * Numeric priority for log levels (higher = more severe).
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * A single log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  /** Context bound to the logger (logger name, model, request id) */
  context?: Record<string, unknown>;
  /** Payload passed with this call */
  data?: unknown;
  /** OpenTelemetry trace ID (when within an active span) */
  traceId?: string;
  /** OpenTelemetry span ID (when within an active span) */
  spanId?: string;
}

/**
 * Handle returned by `Logger.time()`.
 */
export interface TimerResult {
  /** Milliseconds measured by the last `end()`/`stop()` call */
  readonly duration: number;
  /** Stop the timer and log the duration at debug level */
  end(message?: string, data?: Record<string, unknown>): void;
  /** Stop the timer without logging */
  stop(): number;
}

/**
 * Output destination for log entries.
 */
export interface LogTransport {
  log(entry: LogEntry): void;
  flush?(): Promise<void>;
  dispose?(): void;
}

export interface LoggerOptions {
  /** Minimum level to log (default: 'info') */
  level?: LogLevel;
  context?: Record<string, unknown>;
  transports?: LogTransport[];
}
