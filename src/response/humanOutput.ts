/**
 * Human-mode output
 *
 * Plain text renderings for a terminal. Not a stable format; scripts use --json.
 */

import type {
  BatchSummary,
  ErrorEnvelope,
  JobRecord,
  ResultTable,
  TableSummary,
} from "@/types";
import { HUMAN_TABLE_MAX_ROWS } from "@/constants";
import type { JobListItem } from "./responseFormatter";

function cellText(value: unknown): string {
  return value === null || value === undefined ? "" : String(value);
}

/**
 * Fixed-width text table, truncated to `maxRows` rows
 */
export function formatTable(table: ResultTable, maxRows: number = HUMAN_TABLE_MAX_ROWS): string {
  const names = table.columns.map((c) => c.name);
  const shown = table.rows.slice(0, maxRows);
  const cells = shown.map((row) => names.map((name) => cellText(row[name])));
  const widths = names.map((name, i) =>
    Math.max(name.length, ...cells.map((line) => line[i].length)),
  );

  const render = (values: string[]) => values.map((v, i) => v.padEnd(widths[i])).join("  ").trimEnd();
  const lines = [render(names), render(widths.map((w) => "-".repeat(w))), ...cells.map(render)];

  if (table.rows.length > shown.length) {
    lines.push(`... ${table.rows.length - shown.length} more row(s)`);
  }
  return lines.join("\n");
}

export function formatError(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.error_code}]: ${envelope.message}`];
  if (envelope.hint) {
    lines.push(`Hint: ${envelope.hint}`);
  }
  const issues = envelope.details?.errors;
  if (Array.isArray(issues)) {
    for (const issue of issues) {
      if (typeof issue === "object" && issue !== null && "path" in issue && "message" in issue) {
        lines.push(`  - ${cellText(issue.path)}: ${cellText(issue.message)}`);
      }
    }
  }
  return lines.join("\n");
}

export function formatJob(job: JobRecord): string {
  const lines = [
    `Job:      ${job.job_id}`,
    `Status:   ${job.status}`,
    `Source:   ${job.source}`,
    `Created:  ${job.created_at}`,
  ];
  if (job.started_at) lines.push(`Started:  ${job.started_at}`);
  if (job.finished_at) lines.push(`Finished: ${job.finished_at}`);
  if (job.row_count !== null) lines.push(`Rows:     ${job.row_count}`);
  if (job.error) lines.push(`Error:    ${job.error.code ?? job.error.type}: ${job.error.message}`);
  return lines.join("\n");
}

export function formatJobList(jobs: JobListItem[]): string {
  if (jobs.length === 0) {
    return "No jobs.";
  }
  return jobs
    .map((job) => `${job.job_id}  ${job.status.padEnd(9)}  ${job.source.padEnd(8)}  ${job.created_at}`)
    .join("\n");
}

export function formatSummary(summary: TableSummary): string {
  const lines = [`Rows: ${summary.row_count}  Columns: ${summary.column_count}`];
  for (const name of summary.columns) {
    lines.push(`  ${name} (${summary.dtypes[name]}), nulls: ${summary.null_counts[name]}`);
    const stats = summary.numeric_summary[name];
    if (stats) {
      lines.push(
        `    mean=${cellText(stats.mean)} min=${cellText(stats.min)} p50=${cellText(stats.p50)} max=${cellText(stats.max)}`,
      );
    }
    const top = summary.top_values[name];
    if (top && top.length > 0) {
      lines.push(`    top: ${top.map((t) => `${t.value} (${t.count})`).join(", ")}`);
    }
  }
  return lines.join("\n");
}

export function formatBatch(summary: BatchSummary): string {
  const lines = summary.results.map((item) => {
    const outcome =
      item.status === "ok"
        ? `${cellText(item.row_count)} row(s)`
        : `${cellText(item.error_code)} ${cellText(item.message)}`.trim();
    return `[${item.status}] ${item.config}: ${outcome}`;
  });
  lines.push(
    `Total: ${summary.total}  Succeeded: ${summary.succeeded}  Failed: ${summary.failed}  Skipped: ${summary.skipped}  (${summary.elapsed_sec}s)`,
  );
  return lines.join("\n");
}
