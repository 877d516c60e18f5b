import type { LogEntry, LogLevel, LogTransport } from "../types.js";

const RESET = "\x1b[0m";

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: "\x1b[90m",
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
  fatal: "\x1b[35m",
};

export interface ConsoleTransportOptions {
  /** Force colors on or off. Auto-detects if not specified. */
  colors?: boolean;
  /** Line sink for info and below (default: console.log) */
  stdout?: (line: string) => void;
  /** Line sink for warn and above (default: console.error) */
  stderr?: (line: string) => void;
}

/**
 * Colors are off when NO_COLOR (https://no-color.org/) or CI is set, or when
 * stdout is not a TTY.
 */
export function shouldEnableColors(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined || env.CI) {
    return false;
  }
  return process.stdout.isTTY === true;
}

function formatTimestamp(date: Date): string {
  return date.toISOString().replace("T", " ").slice(0, 19);
}

function formatContext(context: Record<string, unknown> | undefined): string {
  if (!context) {
    return "";
  }
  const name = context.logger;
  return typeof name === "string" ? ` (${name})` : "";
}

/**
 * Human-readable single-line output.
 *
 * `[2025-01-01 10:00:00] [INFO ] (tessera) message {"data":1}`
 */
export class ConsoleTransport implements LogTransport {
  private readonly useColors: boolean;
  private readonly stdout: (line: string) => void;
  private readonly stderr: (line: string) => void;

  constructor(options: ConsoleTransportOptions = {}) {
    this.useColors = options.colors ?? shouldEnableColors();
    this.stdout = options.stdout ?? ((line) => console.log(line));
    this.stderr = options.stderr ?? ((line) => console.error(line));
  }

  log(entry: LogEntry): void {
    const level = entry.level.toUpperCase().padEnd(5);
    const tag = this.useColors ? `${LEVEL_COLORS[entry.level]}[${level}]${RESET}` : `[${level}]`;

    let line = `[${formatTimestamp(entry.timestamp)}] ${tag}${formatContext(entry.context)} ${entry.message}`;
    if (entry.data !== undefined) {
      line += ` ${typeof entry.data === "string" ? entry.data : JSON.stringify(entry.data)}`;
    }

    if (entry.level === "warn" || entry.level === "error" || entry.level === "fatal") {
      this.stderr(line);
    } else {
      this.stdout(line);
    }
  }
}
