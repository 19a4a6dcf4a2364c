/**
 * Logger constants
 */

import type { LogFormat, LogLevel } from "@/types";

/**
 * Level priority; a line is written when its level is at or above LOG_LEVEL
 */
export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LOG_FORMATS: readonly LogFormat[] = ["text", "json"];
