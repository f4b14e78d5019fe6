/**
 * Structured Logging Utility
 * Consistent logging across the codec, sessions, commands and attestation.
 *
 * Byte arrays in the context are rendered as hex so APDU traces stay
 * readable; the default level comes from CARDKIT_LOG_LEVEL.
 */

import { bytesToHex } from "./hex.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component: string;
  operation?: string;
  [key: string]: unknown;
}

export type LogSink = Pick<Console, "debug" | "info" | "warn" | "error">;

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.CARDKIT_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function renderValue(value: unknown): string {
  if (value instanceof Uint8Array) {
    return bytesToHex(value);
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * Structured logger with context support
 */
export class Logger {
  constructor(
    private component: string,
    private minLevel: LogLevel = defaultLevel(),
    private baseContext: Partial<LogContext> = {},
    private sink: LogSink = console,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  private format(level: LogLevel, message: string, context?: Partial<LogContext>): string {
    const timestamp = new Date().toISOString();
    const ctx = { component: this.component, ...this.baseContext, ...context };
    const contextStr = Object.entries(ctx)
      .filter(([, v]) => v !== undefined)
      .map(([k, v]) => `${k}=${renderValue(v)}`)
      .join(" ");
    return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
  }

  debug(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("debug")) {
      this.sink.debug(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("info")) {
      this.sink.info(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("warn")) {
      this.sink.warn(this.format("warn", message, context));
    }
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    if (this.shouldLog("error")) {
      const errorContext = error
        ? { ...context, error: error.message, stack: error.stack }
        : context;
      this.sink.error(this.format("error", message, errorContext));
    }
  }

  /**
   * Create child logger with additional context
   */
  child(additionalContext: Partial<LogContext>): Logger {
    return new Logger(
      this.component,
      this.minLevel,
      { ...this.baseContext, ...additionalContext },
      this.sink,
    );
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

export function createLogger(component: string, level?: LogLevel, sink?: LogSink): Logger {
  return new Logger(component, level, {}, sink);
}
