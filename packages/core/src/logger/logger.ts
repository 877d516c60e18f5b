import { context, trace } from "@opentelemetry/api";
import type { LogEntry, LoggerOptions, LogLevel, LogTransport, TimerResult } from "./types.js";
import { LOG_LEVEL_PRIORITY } from "./types.js";

/**
 * Level-filtered logger fanning entries out to its transports.
 *
 * Children share the parent's transports (so transports added later reach
 * them too) and start at the parent's level.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ level: "debug", transports: [new ConsoleTransport()] });
 * const modelLogger = logger.child({ provider: "azure-openai", model: "gpt-4o" });
 * modelLogger.debug("request", { messages: 3 });
 * ```
 */
export class Logger {
  private level: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly transports: LogTransport[];

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.context = options.context ?? {};
    this.transports = options.transports ?? [];
  }

  /**
   * A logger without transports. Every call is dropped.
   */
  static silent(): Logger {
    return new Logger({ level: "fatal" });
  }

  trace(message: string, data?: unknown): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.log("fatal", message, data);
  }

  /**
   * Start a timer. `end()` logs `<label> completed` with `durationMs`.
   */
  time(label: string): TimerResult {
    const start = performance.now();
    let duration = 0;

    return {
      get duration() {
        return duration;
      },
      end: (message?: string, data?: Record<string, unknown>) => {
        duration = performance.now() - start;
        this.log("debug", message ?? `${label} completed`, { ...data, label, durationMs: duration });
      },
      stop: () => {
        duration = performance.now() - start;
        return duration;
      },
    };
  }

  addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Would an entry at `level` reach the transports? Lets callers skip building
   * expensive payloads.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.transports.length > 0 && LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.level];
  }

  child(context: Record<string, unknown>): Logger {
    return new Logger({
      level: this.level,
      context: { ...this.context, ...context },
      transports: this.transports,
    });
  }

  async flush(): Promise<void> {
    await Promise.all(this.transports.map((transport) => transport.flush?.()));
  }

  dispose(): void {
    for (const transport of this.transports) {
      transport.dispose?.();
    }
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      data,
      ...this.getTraceContext(),
    };

    for (const transport of this.transports) {
      transport.log(entry);
    }
  }

  private getTraceContext(): { traceId?: string; spanId?: string } {
    const span = trace.getSpan(context.active());
    if (!span) {
      return {};
    }
    const { traceId, spanId } = span.spanContext();
    return { traceId, spanId };
  }
}
