/**
 * HttpError: a non-2xx response from a Google REST endpoint
 *
 * Google APIs answer errors with `{"error": {"code", "message", "status"}}`
 * (or `{"error": "invalid_grant"}` from the token endpoint). `apiMessage`
 * pulls that message out of the body snippet when it parses.
 */

import type { HttpErrorDetails } from "@/types";
import { RETRYABLE_STATUS_CODES } from "@/constants/clients/http";
import { isPlainObject } from "@/utils";

function readApiMessage(bodySnippet: string | undefined): string | undefined {
  if (!bodySnippet) {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodySnippet);
  } catch {
    // Truncated or non-JSON body
    return undefined;
  }
  if (!isPlainObject(parsed)) {
    return undefined;
  }
  const error = parsed.error;
  if (typeof error === "string") {
    return error;
  }
  if (isPlainObject(error) && typeof error.message === "string") {
    return error.message;
  }
  return undefined;
}

export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;
  /** Error message reported by the API, when the body carries one */
  public readonly apiMessage?: string;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;
    this.apiMessage = readApiMessage(details.bodySnippet);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }

  /**
   * 408, 429 and 5xx are worth retrying on an idempotent request
   */
  get retryable(): boolean {
    return RETRYABLE_STATUS_CODES.includes(this.status);
  }

  /**
   * Wait requested by a 429 or 503 Retry-After header (delay-seconds or
   * HTTP-date), in milliseconds
   */
  retryAfterMs(now = Date.now()): number | undefined {
    if (this.status !== 429 && this.status !== 503) {
      return undefined;
    }
    const header = this.headers?.get("retry-after");
    if (!header) {
      return undefined;
    }
    const seconds = Number.parseInt(header, 10);
    if (seconds > 0) {
      return seconds * 1000;
    }
    const at = Date.parse(header);
    return Number.isNaN(at) || at <= now ? undefined : at - now;
  }
}
