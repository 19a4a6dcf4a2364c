/**
 * HTTP client: JSON over native fetch for the Google REST APIs
 *
 * One call is one logical request. Idempotent requests (GET, HEAD, or
 * `idempotent: true` such as GA4 runReport) are retried with exponential
 * backoff on network failures, timeouts, 408, 429 and 5xx. A Retry-After
 * header on 429/503 replaces the computed backoff, up to a cap.
 */

import type { HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_FORM_HEADERS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_MAX_DELAY_MS,
  DEFAULT_MAX_RETRY_AFTER_MS,
  RETRYABLE_HTTP_METHODS,
} from "@/constants/clients/http";
import * as logger from "@/logger";
import { sleep } from "@/utils";

interface RetryPolicy {
  retryable: boolean;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  maxRetryAfterMs: number;
}

function resolveRetryPolicy(req: HttpRequest): RetryPolicy {
  return {
    retryable: req.idempotent === true || RETRYABLE_HTTP_METHODS.includes(req.method),
    maxAttempts: req.retry?.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    baseDelayMs: req.retry?.baseDelayMs ?? DEFAULT_BASE_DELAY_MS,
    maxDelayMs: req.retry?.maxDelayMs ?? DEFAULT_MAX_DELAY_MS,
    maxRetryAfterMs: req.retry?.maxRetryAfterMs ?? DEFAULT_MAX_RETRY_AFTER_MS,
  };
}

/**
 * Append query params; array values become repeated params
 */
function buildUrl(baseUrl: string, query: HttpRequest["query"]): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    for (const item of Array.isArray(value) ? value : [value]) {
      url.searchParams.append(key, String(item));
    }
  }
  return url.toString();
}

/**
 * Headers and body for the request; caller headers win over the defaults
 */
function encodeBody(req: HttpRequest): { headers: Record<string, string>; body?: string } {
  if (req.form) {
    return {
      headers: { ...DEFAULT_FORM_HEADERS, ...req.headers },
      body: new URLSearchParams(req.form).toString(),
    };
  }
  if (req.json !== undefined) {
    return { headers: { ...DEFAULT_JSON_HEADERS, ...req.headers }, body: JSON.stringify(req.json) };
  }
  return { headers: { ...req.headers } };
}

async function readBodySnippet(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    // Body stream already failed; the status line still goes into the error
    return undefined;
  }
  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? `${text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
    : text;
}

function isJsonContentType(contentType: string | null): boolean {
  return contentType !== null && (contentType.includes("application/json") || contentType.includes("+json"));
}

/**
 * One attempt: fetch under a timeout, then map the response to T or an error
 */
async function attempt<T>(req: HttpRequest, url: string, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const { headers, body } = encodeBody(req);
    const response = await fetch(url, { method: req.method, headers, body, signal: controller.signal });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await readBodySnippet(response),
        headers: response.headers,
      });
    }

    const text = await response.text();
    if (!text) {
      // 204 / DELETE
      return JSON.parse("{}");
    }

    const contentType = response.headers.get("content-type");
    if (!isJsonContentType(contentType)) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        url,
        status: response.status,
        contentType: contentType || "none",
      });
      throw new Error(`Unexpected non-JSON response from ${url} (${contentType || "no content-type"})`);
    }

    try {
      return JSON.parse(text);
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        url,
        error: parseError instanceof Error ? parseError.message : String(parseError),
      });
      throw new Error(`Invalid JSON response from ${url}`);
    }
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Transient failure: retryable status, timeout (AbortError) or network error (TypeError)
 */
function isTransient(error: unknown): boolean {
  if (error instanceof HttpError) {
    return error.retryable;
  }
  return error instanceof Error && (error.name === "AbortError" || error.name === "TypeError");
}

/**
 * Delay before the next attempt: Retry-After when the server sent one,
 * else min(maxDelay, baseDelay * 2^(n-1)) scaled by a 0.5-1.0 jitter
 */
function retryDelayMs(error: unknown, attemptNo: number, policy: RetryPolicy): number {
  const retryAfter = error instanceof HttpError ? error.retryAfterMs() : undefined;
  if (retryAfter !== undefined) {
    return Math.min(retryAfter, policy.maxRetryAfterMs);
  }
  const backoff = Math.min(policy.baseDelayMs * 2 ** (attemptNo - 1), policy.maxDelayMs);
  return Math.floor(backoff * (0.5 + Math.random() * 0.5));
}

function describeFailure(error: unknown): string {
  if (error instanceof HttpError) {
    return `status ${error.status}`;
  }
  return error instanceof Error ? error.name : String(error);
}

/**
 * Perform a JSON request with timeout and retries
 *
 * @returns Parsed JSON body (an empty object for empty bodies)
 * @throws {HttpError} On a non-2xx status once retries are spent
 * @throws {Error} On network errors, timeouts or non-JSON bodies
 */
export async function httpRequest<T>(req: HttpRequest): Promise<T> {
  const url = buildUrl(req.url, req.query);
  const timeoutMs = req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  const policy = resolveRetryPolicy(req);

  for (let attemptNo = 1; ; attemptNo++) {
    try {
      return await attempt<T>(req, url, timeoutMs);
    } catch (error) {
      if (!policy.retryable || attemptNo >= policy.maxAttempts || !isTransient(error)) {
        throw error;
      }
      const delayMs = retryDelayMs(error, attemptNo, policy);
      logger.debug("Retrying HTTP request", {
        method: req.method,
        url: req.url,
        attempt: attemptNo,
        maxAttempts: policy.maxAttempts,
        delayMs,
        reason: describeFailure(error),
      });
      await sleep(delayMs);
    }
  }
}
