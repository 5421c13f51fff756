// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Logger adapter interface for structured logging in the agent.
 *
 * Allows hosts to plug in their own logging solution instead of console.
 *
 * @example
 * ```typescript
 * import { createLogger } from "@vigil/core";
 *
 * const logger = createLogger({
 *   minLevel: "info",
 *   log: (level, context, message, data) => {
 *     logService.write({ level, context, message, data, at: new Date() });
 *   },
 * });
 * ```
 */
export interface LoggerAdapter {
  /**
   * @param context - Category or source of the log (e.g., "dispatch", "auth")
   * @param message - Log message
   * @param data - Optional structured data
   */
  debug(context: string, message: string, data?: unknown): void;

  info(context: string, message: string, data?: unknown): void;

  warn(context: string, message: string, data?: unknown): void;

  /**
   * @param data - Optional structured data (error details, stack trace, etc.)
   */
  error(context: string, message: string, data?: unknown): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Levels in ascending severity.
 */
export const LOG_LEVELS = [
  "debug",
  "info",
  "warn",
  "error",
] as const satisfies readonly LogLevel[];

/**
 * Default logger adapter that uses console methods
 *
 * @internal
 */
export class DefaultLoggerAdapter implements LoggerAdapter {
  debug(context: string, message: string, data?: unknown): void {
    console.debug(`[${context}] ${message}`, data);
  }

  info(context: string, message: string, data?: unknown): void {
    console.info(`[${context}] ${message}`, data);
  }

  warn(context: string, message: string, data?: unknown): void {
    console.warn(`[${context}] ${message}`, data);
  }

  error(context: string, message: string, data?: unknown): void {
    console.error(`[${context}] ${message}`, data);
  }
}

export interface LoggerOptions {
  /**
   * Custom log function. When set, console is not used.
   */
  log?: (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ) => void;

  /**
   * Minimum log level to output (default: "debug")
   */
  minLevel?: LogLevel;
}

/**
 * Create a logger adapter with custom configuration
 */
export function createLogger(options: LoggerOptions = {}): LoggerAdapter {
  const minLevelValue = LOG_LEVELS.indexOf(options.minLevel ?? "debug");
  const fallback = new DefaultLoggerAdapter();

  const emit = (
    level: LogLevel,
    context: string,
    message: string,
    data?: unknown,
  ): void => {
    if (LOG_LEVELS.indexOf(level) < minLevelValue) {
      return;
    }
    if (options.log) {
      options.log(level, context, message, data);
    } else {
      fallback[level](context, message, data);
    }
  };

  return {
    debug: (context, message, data) => emit("debug", context, message, data),
    info: (context, message, data) => emit("info", context, message, data),
    warn: (context, message, data) => emit("warn", context, message, data),
    error: (context, message, data) => emit("error", context, message, data),
  };
}

/**
 * Logger that drops everything. Default for components built without one.
 */
export const noopLogger: LoggerAdapter = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Log context constants used by the agent
 */
export const LOG_CONTEXT = {
  CONNECTION: "connection",
  DISPATCH: "dispatch",
  HANDLER: "handler",
  AUTH: "auth",
  HEALTH: "health",
  STATS: "stats",
} as const;
