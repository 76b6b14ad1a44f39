/**
 * Structured logging to stderr for server observability
 * All logs go to stderr since stdout is reserved for the MCP protocol
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEvent {
  ts: string;
  level: LogLevel;
  event: string;
  op?: string;
  table?: string;
  duration_ms?: number;
  err_code?: string;
  err_message?: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export type LogWriter = (line: string) => void;

export class Logger {
  #minLevel: LogLevel;
  #write: LogWriter;

  constructor(minLevel: LogLevel = "info", write: LogWriter = (line) => console.error(line)) {
    this.#minLevel = minLevel;
    this.#write = write;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.#minLevel);
  }

  private log(level: LogLevel, event: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const logEvent: LogEvent = {
      ts: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    this.#write(JSON.stringify(logEvent));
  }

  debug(event: string, data?: Record<string, unknown>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Record<string, unknown>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Record<string, unknown>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Record<string, unknown>): void {
    this.log("error", event, data);
  }

  // Helper for dispatch logging
  dispatch(
    op: string,
    duration_ms: number,
    outcome: { ok: true } | { ok: false; code: string; message: string },
    table?: string
  ): void {
    if (outcome.ok) {
      this.info("dispatch.success", { op, table, duration_ms });
    } else {
      this.error("dispatch.error", {
        op,
        table,
        duration_ms,
        err_code: outcome.code,
        err_message: outcome.message,
      });
    }
  }
}

export function parseLogLevel(text: string | undefined): LogLevel {
  const normalized = text?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? "info";
}

// Singleton logger instance
export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL));
