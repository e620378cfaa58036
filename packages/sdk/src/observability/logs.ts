/**
 * Structured diagnostics for store operations
 *
 * Diagnostics are human-readable lines on the console and are not part of
 * the programmatic contract; callers inspect StoreResult values instead.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  section?: string;
  key?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Resolve the minimum level from INIKV_DEBUG / INIKV_LOG_LEVEL
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.INIKV_DEBUG === "1") {
    return "debug";
  }
  const requested = env.INIKV_LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === requested) ?? "info";
}

export class Logger {
  #enabled = true;
  #minLevel: LogLevel;

  constructor(minLevel: LogLevel = resolveLogLevel()) {
    this.#minLevel = minLevel;
  }

  get level(): LogLevel {
    return this.#minLevel;
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

    if (entry.section !== undefined || entry.key !== undefined) {
      parts.push(`${entry.section ?? ""}.${entry.key ?? ""}`);
    }

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    // Route to appropriate console method
    switch (level) {
      case "debug":
        console.debug(parts.join(" "));
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
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

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#minLevel = level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
