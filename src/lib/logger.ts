/**
 * Leveled logging utility
 *
 * - debug/info: only when the configured level allows them
 * - warn/error: always visible
 *
 * Usage:
 *   import { captureLog } from './lib/logger';
 *   captureLog.debug('Frame processed', metrics);
 *   captureLog.warn('Body tracking lost');
 *   captureLog.error('Save failed', err);
 *
 * The level is read from POSTURE_LOG_LEVEL, falling back to "debug" when
 * NODE_ENV is "development" and "warn" otherwise.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

interface LogOptions {
  /** Force log regardless of the configured level */
  force?: boolean;
  /** Add timestamp prefix */
  timestamp?: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    value === "debug" ||
    value === "info" ||
    value === "warn" ||
    value === "error"
  );
}

function resolveInitialLevel(): LogLevel {
  const env = typeof process !== "undefined" ? process.env : {};
  const configured = env.POSTURE_LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return env.NODE_ENV === "development" ? "debug" : "warn";
}

let activeLevel: LogLevel = resolveInitialLevel();

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  log(
    level: LogLevel,
    message: string,
    data?: unknown,
    options?: LogOptions,
  ): void;
  child(subPrefix: string): Logger;
}

function createLogger(prefix: string): Logger {
  return {
    debug(message: string, ...args: unknown[]) {
      if (enabled("debug")) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    info(message: string, ...args: unknown[]) {
      if (enabled("info")) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    error(message: string, ...args: unknown[]) {
      console.error(formatMessage(prefix, message, true), ...args);
    },

    /**
     * Conditional log based on options
     */
    log(
      level: LogLevel,
      message: string,
      data?: unknown,
      options?: LogOptions,
    ) {
      const shouldLog =
        options?.force || enabled(level) || level === "warn" || level === "error";
      if (!shouldLog) return;

      const formatted = formatMessage(
        prefix,
        message,
        options?.timestamp ?? false,
      );

      switch (level) {
        case "debug":
          console.debug(formatted, data ?? "");
          break;
        case "info":
          console.info(formatted, data ?? "");
          break;
        case "warn":
          console.warn(formatted, data ?? "");
          break;
        case "error":
          console.error(formatted, data ?? "");
          break;
      }
    },

    /**
     * Create a sub-logger with extended prefix
     */
    child(subPrefix: string) {
      return createLogger(`${prefix}:${subPrefix}`);
    },
  };
}

// Pre-configured loggers for common modules
export const log = createLogger("App");
export const captureLog = createLogger("Capture");
export const recorderLog = createLogger("Recorder");
export const analysisLog = createLogger("Analysis");
export const motionLog = createLogger("Motion");
export const mlLog = createLogger("ML");
export const persistenceLog = createLogger("Persistence");

// Factory for custom loggers
export { createLogger };

export default log;
