/**
 * Params issue collection
 */

import type { ParamsIssue } from "@/types";

export class IssueCollector {
  readonly issues: ParamsIssue[] = [];

  add(errorCode: string, message: string, path: string, hint: string): void {
    this.issues.push({ error_code: errorCode, message, path, hint });
  }

  get hasIssues(): boolean {
    return this.issues.length > 0;
  }
}
