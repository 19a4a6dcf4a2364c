/**
 * Job identity
 *
 * job_YYYYMMDD_HHMMSS_<8 hex>, timestamp in UTC.
 */

import { randomBytes } from "crypto";
import { JOB_ID_PREFIX, JOB_ID_RANDOM_BYTES } from "@/constants";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function generateJobId(now: Date = new Date(), suffix?: string): string {
  const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
  const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
  const random = suffix ?? randomBytes(JOB_ID_RANDOM_BYTES).toString("hex");
  return `${JOB_ID_PREFIX}_${date}_${time}_${random}`;
}
