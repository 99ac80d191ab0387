/**
 * Structured logger with level-based filtering and environment-aware formatting.
 * - json: one JSON object per line (CI, log shipping)
 * - pretty: colored single-line output for operators at a terminal
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";
export type LogMeta = Record<string, unknown>;

/**
 * Receives every formatted line. Defaults to the matching console method.
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  sink?: LogSink;
  defaultMeta?: LogMeta;
  /** Level and format are read from the parent on every call. */
  parent?: Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};
const RESET = "\x1b[0m";

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error"
  ) {
    return normalized;
  }
  return undefined;
}

export function parseLogFormat(
  value: string | undefined
): LogFormat | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "json" || normalized === "pretty") return normalized;
  return undefined;
}

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

class Logger {
  private level: LogLevel;
  private format: LogFormat;
  private readonly sink: LogSink;
  private readonly defaultMeta: LogMeta;
  private readonly parent?: Logger;

  constructor(options: LoggerOptions = {}) {
    this.parent = options.parent;
    this.level =
      options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? "info";
    this.format =
      options.format ?? parseLogFormat(process.env.LOG_FORMAT) ?? "pretty";
    this.sink = options.sink ?? consoleSink;
    this.defaultMeta = options.defaultMeta ?? {};
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  getFormat(): LogFormat {
    return this.parent ? this.parent.getFormat() : this.format;
  }

  setFormat(format: LogFormat): void {
    this.format = format;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMeta): string {
    const merged: LogMeta = { ...this.defaultMeta, ...meta };
    const hasMeta = Object.keys(merged).length > 0;
    const timestamp = new Date().toISOString();

    if (this.getFormat() === "json") {
      return JSON.stringify({ timestamp, level, message, ...merged });
    }

    const prefix = `${COLORS[level]}[${level.toUpperCase()}]${RESET}`;
    const metaStr = hasMeta ? ` ${JSON.stringify(merged)}` : "";
    return `${prefix} ${timestamp} ${message}${metaStr}`;
  }

  private log(level: LogLevel, message: string, meta?: LogMeta): void {
    if (!this.shouldLog(level)) return;
    this.sink(level, this.formatMessage(level, message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  /**
   * Create a child logger that stamps every line with `defaultMeta`.
   */
  child(defaultMeta: LogMeta): Logger {
    return new Logger({
      sink: this.sink,
      defaultMeta: { ...this.defaultMeta, ...defaultMeta },
      parent: this,
    });
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
