/**
 * Pipeline logging utility
 *
 * - In development: All logs are visible
 * - With NODE_ENV=production: Only errors and warnings (no debug noise)
 *
 * Usage:
 *   import { log } from './lib/logger';
 *   log.debug('Detailed info', data);  // Silent in production
 *   log.info('Important info');        // Silent in production
 *   log.warn('Warning');               // Always visible
 *   log.error('Error', err);           // Always visible
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogOptions {
  /** Force log even in production */
  force?: boolean;
  /** Add timestamp prefix */
  timestamp?: boolean;
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  log(level: LogLevel, message: string, data?: unknown, options?: LogOptions): void;
  child(subPrefix: string): Logger;
}

function isDev(): boolean {
  return process.env.NODE_ENV !== "production";
}

function formatMessage(
  prefix: string,
  message: string,
  timestamp: boolean,
): string {
  const ts = timestamp ? `[${new Date().toISOString()}] ` : "";
  return `${ts}[${prefix}] ${message}`;
}

function createLogger(prefix: string): Logger {
  return {
    /**
     * Debug-level logging (dev only)
     */
    debug(message: string, ...args: unknown[]) {
      if (isDev()) {
        console.debug(formatMessage(prefix, message, false), ...args);
      }
    },

    /**
     * Info-level logging (dev only)
     */
    info(message: string, ...args: unknown[]) {
      if (isDev()) {
        console.info(formatMessage(prefix, message, false), ...args);
      }
    },

    /**
     * Warning-level logging (always visible)
     */
    warn(message: string, ...args: unknown[]) {
      console.warn(formatMessage(prefix, message, false), ...args);
    },

    /**
     * Error-level logging (always visible)
     */
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
        options?.force || isDev() || level === "warn" || level === "error";
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

// Pre-configured loggers for the pipeline stages
export const log = createLogger("LimbUse");
export const filterLog = createLogger("Filter");
export const detectLog = createLogger("Detect");
export const fusionLog = createLogger("Fusion");
export const pipelineLog = createLogger("Pipeline");
export const exportLog = createLogger("Export");

// Factory for custom loggers
export { createLogger };

// Default export
export default log;
