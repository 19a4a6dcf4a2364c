/**
 * Micro-logger: level filtering over console.error
 *
 * Every level goes to stderr: stdout carries only command output (the JSON
 * envelope in --json mode). LOG_FORMAT=json switches to one JSON object per
 * line for the worker and spawned runners, whose stderr is usually collected.
 */

import type { Logger, LogFormat, LogLevel } from "@/types";
import { LOG_FORMATS, LOG_LEVELS } from "@/constants";

type Meta = Record<string, unknown>;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some((format) => format === value);
}

/**
 * Active level from LOG_LEVEL, default 'info'
 */
function resolveLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function resolveFormat(): LogFormat {
  const raw = (process.env.LOG_FORMAT || "text").toLowerCase();
  return isLogFormat(raw) ? raw : "text";
}

const currentLevelValue = LOG_LEVELS[resolveLevel()];
const currentFormat = resolveFormat();

function hasMeta(meta?: Meta): meta is Meta {
  return meta !== undefined && Object.keys(meta).length > 0;
}

/**
 * Render one log line
 */
export function formatLine(
  format: LogFormat,
  timestamp: string,
  level: LogLevel,
  message: string,
  meta?: Meta,
): string {
  if (format === "json") {
    return JSON.stringify({ ts: timestamp, level, msg: message, ...(hasMeta(meta) && { meta }) });
  }
  const suffix = hasMeta(meta) ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${suffix}`;
}

function log(level: LogLevel, message: string, meta?: Meta): void {
  if (LOG_LEVELS[level] >= currentLevelValue) {
    console.error(formatLine(currentFormat, new Date().toISOString(), level, message, meta));
  }
}

export function debug(message: string, meta?: Meta): void {
  log("debug", message, meta);
}

export function info(message: string, meta?: Meta): void {
  log("info", message, meta);
}

export function warn(message: string, meta?: Meta): void {
  log("warn", message, meta);
}

export function error(message: string, meta?: Meta): void {
  log("error", message, meta);
}

/**
 * Logger with bound context (merged under each call's meta)
 */
export function withContext(context: Meta): Logger {
  return {
    debug: (message, meta) => debug(message, { ...context, ...meta }),
    info: (message, meta) => info(message, { ...context, ...meta }),
    warn: (message, meta) => warn(message, { ...context, ...meta }),
    error: (message, meta) => error(message, { ...context, ...meta }),
  };
}
