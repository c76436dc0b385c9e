/**
 * Structured Logging Utility
 * Provides consistent logging across the codec, decoder and reader packages
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component: string;
  operation?: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

/**
 * Level used when a logger is created without one: FELICA_LOG_LEVEL, else "info"
 */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.FELICA_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

/**
 * Structured logger with context support
 */
export class Logger {
  constructor(
    private component: string,
    private readonly minLevel: LogLevel = defaultLogLevel(),
    private baseContext: Partial<LogContext> = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.minLevel);
  }

  /**
   * Format log message with context
   */
  format(level: LogLevel, message: string, context?: Partial<LogContext>): string {
    const timestamp = new Date().toISOString();
    const ctx = { component: this.component, ...this.baseContext, ...context };
    const contextStr = Object.entries(ctx)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(" ");
    return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
  }

  debug(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("info")) {
      console.info(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    if (this.shouldLog("error")) {
      const errorContext = error
        ? { ...context, error: error.message, stack: error.stack }
        : context;
      console.error(this.format("error", message, errorContext));
    }
  }

  /**
   * Create child logger with additional context
   */
  child(additionalContext: Partial<LogContext>): Logger {
    return new Logger(this.component, this.minLevel, {
      ...this.baseContext,
      ...additionalContext,
    });
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }
}

export function createLogger(component: string, level?: LogLevel): Logger {
  return new Logger(component, level);
}
