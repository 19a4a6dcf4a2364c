/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * text: `[ts] [LEVEL] message {meta}`; json: one object per line
 */
export type LogFormat = "text" | "json";

/**
 * Same shape as the @/logger module, so a bound logger (withContext, job
 * logger) can stand in for it
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
