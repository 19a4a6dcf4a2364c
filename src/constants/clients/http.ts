/**
 * HTTP client constants: defaults and configuration
 */

import type { HttpMethod } from "@/types";

/**
 * Request timeout; BigQuery jobs.query waits up to its own timeoutMs server-side
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

/**
 * Default headers for URL-encoded form requests
 */
export const DEFAULT_FORM_HEADERS: Record<string, string> = {
  "Content-Type": "application/x-www-form-urlencoded",
  Accept: "application/json",
};

/**
 * Default headers for JSON requests
 */
export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Error body kept on HttpError; long enough for a Google error object
 * ({"error": {"code", "message", "errors", "status"}})
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 2_000;

/**
 * Attempts per request, initial one included
 */
export const DEFAULT_MAX_ATTEMPTS = 3;

// Backoff: ~1s, ~2s, ... with jitter, capped at DEFAULT_MAX_DELAY_MS
export const DEFAULT_BASE_DELAY_MS = 1_000;

export const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Upper bound on a Retry-After wait
 */
export const DEFAULT_MAX_RETRY_AFTER_MS = 60_000;

/**
 * HTTP methods that are safe to retry (idempotent).
 * Other methods retry only when the request sets `idempotent: true`.
 */
export const RETRYABLE_HTTP_METHODS: readonly HttpMethod[] = ["GET", "HEAD"];

/**
 * 408, 429 (quota) and transient 5xx
 */
export const RETRYABLE_STATUS_CODES: readonly number[] = [408, 429, 500, 502, 503, 504];
