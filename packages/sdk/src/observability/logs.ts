/**
 * Structured logging for table operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  index?: string;
  partition?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel) {
    this.#minLevel = minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    return this.#enabled && LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.table || entry.index || entry.partition) {
      parts.push(`${entry.table ?? ""}/${entry.index ?? ""}/${entry.partition ?? ""}`);
    }
    if (entry.message) {
      parts.push(entry.message);
    }
    if (entry.details) {
      parts.push(
        JSON.stringify(entry.details, (_key, value: unknown) =>
          typeof value === "bigint" ? value.toString() : value
        )
      );
    }

    // stdout is left to callers (the CLI prints results there)
    const line = parts.join(" ");
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }

  get level(): LogLevel {
    return this.#minLevel;
  }
}

const envLevel = process.env.TABLEMAT_LOG_LEVEL;

/**
 * Global logger instance
 */
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");
