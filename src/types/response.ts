/**
 * Response envelope type definitions
 *
 * Machine-readable output is always exactly one of these two shapes.
 */

import type { ErrorCode } from "./errors";

export type ResponseMode =
  | "query"
  | "submit"
  | "job_status"
  | "cancel"
  | "job_result"
  | "list_jobs"
  | "batch";

export type SuccessEnvelope<T = unknown> = {
  status: "ok";
  mode: ResponseMode;
  data: T;
};

export type ErrorEnvelope = {
  status: "error";
  error_code: ErrorCode;
  message: string;
  hint?: string;
  details?: Record<string, unknown>;
};

export type Envelope<T = unknown> = SuccessEnvelope<T> | ErrorEnvelope;
