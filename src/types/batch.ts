/**
 * Batch run type definitions
 */

import type { ErrorCode } from "./errors";

export type BatchItemStatus = "ok" | "error" | "skipped";

export type BatchItemResult = {
  config: string;
  status: BatchItemStatus;
  row_count?: number;
  error_code?: ErrorCode;
  message?: string;
  hint?: string;
  details?: Record<string, unknown>;
  elapsed_sec: number;
};

export type BatchSummary = {
  path: string;
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
  elapsed_sec: number;
  results: BatchItemResult[];
};

export type BatchProgress = {
  index: number;
  total: number;
  config: string;
};
