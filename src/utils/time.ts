/**
 * Time helpers
 */

/**
 * Current time as ISO 8601 (UTC)
 */
export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Seconds elapsed since `startMs`, rounded to milliseconds
 */
export function elapsedSeconds(startMs: number): number {
  return Math.round(Date.now() - startMs) / 1000;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
