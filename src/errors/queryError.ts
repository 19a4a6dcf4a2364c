/**
 * QueryError: error carrying a stable error code
 *
 * Everything the CLI reports in an error envelope is a QueryError; other
 * errors are wrapped at the boundary that knows which code applies.
 */

import type { ErrorCode, QueryErrorOptions } from "@/types";
import { ERROR_HINTS } from "@/constants";

export class QueryError extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: QueryErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "QueryError";
    this.code = code;
    this.hint = options.hint ?? ERROR_HINTS[code];
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryError);
    }
  }
}

/**
 * Extract a message from any thrown value
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Return err unchanged when it is a QueryError, otherwise wrap it with `code`
 */
export function asQueryError(
  err: unknown,
  code: ErrorCode,
  prefix?: string,
): QueryError {
  if (err instanceof QueryError) {
    return err;
  }
  const message = prefix ? `${prefix}: ${errorMessage(err)}` : errorMessage(err);
  return new QueryError(code, message, { cause: err });
}
