/**
 * CLI program: flag parsing and command dispatch
 *
 * One invocation runs one action:
 * - default: synchronous query from --params or --inline
 * - --submit: queue the query as a job
 * - --status / --cancel / --result / --list-jobs: job operations
 * - --batch: run every config of a directory
 * - --run-job (hidden): execute a queued job, used by the spawned runner
 *
 * With --json, stdout carries exactly one envelope. Otherwise stdout gets
 * plain text and errors go to stderr.
 */

import { Command, CommanderError, Option } from "commander";
import { resolve } from "path";
import type {
  PipelineSpec,
  QueryDescriptor,
  ResultTable,
  SitesConfig,
  SuccessEnvelope,
} from "@/types";
import { CLI_NAME, DEFAULT_JOB_LIST_LIMIT, DEFAULT_PARAMS_PATH, RUN_JOB_FLAG } from "@/constants";
import { runBatch } from "@/batch";
import { QueryError, asQueryError, errorMessage } from "@/errors";
import { executeQuery, type ExecutionContext } from "@/execution";
import { runJob, type JobManager } from "@/jobs";
import * as logger from "@/logger";
import { isEmptyPipelineSpec, loadParamsFile, loadParamsInline, prepareParams } from "@/params";
import {
  cancelData,
  errorEnvelope,
  formatBatch,
  formatError,
  formatJob,
  formatJobList,
  formatSummary,
  formatTable,
  jobListData,
  jobResultData,
  ok,
  queryData,
  serializeEnvelope,
  submitData,
} from "@/response";
import { writeCsvFile } from "@/table";

export type CliContext = {
  /** Writes one block of text to stdout */
  stdout: (text: string) => void;
  /** Writes one block of text to stderr */
  stderr: (text: string) => void;
  jobManager: JobManager;
  execution: ExecutionContext;
  /** Starts a runner for a submitted job; null when autorun is disabled */
  spawnRunner: ((jobId: string) => number | null) | null;
  /** Reference date for date templates */
  reference?: Date;
  sites?: SitesConfig;
};

export type CliOptions = {
  params?: string;
  inline?: string;
  json?: boolean;
  output?: string;
  submit?: boolean;
  status?: string;
  cancel?: string;
  result?: string;
  head?: string;
  summary?: boolean;
  where?: string;
  sort?: string;
  columns?: string;
  groupBy?: string;
  aggregate?: string;
  transform?: string;
  batch?: string;
  listJobs?: boolean;
  jobLimit?: string;
  runJob?: string;
};

type Action = "query" | "submit" | "status" | "cancel" | "result" | "batch" | "list_jobs" | "run_job";

type CommandOutput = {
  envelope: SuccessEnvelope;
  human: string;
  exitCode?: number;
};

const PIPELINE_FLAGS = [
  ["transform", "--transform"],
  ["where", "--where"],
  ["groupBy", "--group-by"],
  ["aggregate", "--aggregate"],
  ["sort", "--sort"],
  ["columns", "--columns"],
] as const;

function invalidArgument(message: string, details?: Record<string, unknown>): QueryError {
  return new QueryError("INVALID_ARGUMENT", message, { details });
}

function buildProgram(ctx: CliContext): Command {
  return new Command()
    .name(CLI_NAME)
    .description("Run GA4, Search Console and BigQuery queries with a result pipeline and durable jobs")
    .option("--params <path>", `params JSON file (default: ${DEFAULT_PARAMS_PATH})`)
    .option("--inline <json>", "params JSON given inline")
    .option("--json", "print exactly one JSON envelope to stdout")
    .option("--output <path>", "also write the result table to a CSV file")
    .option("--submit", "queue the query as a job instead of running it now")
    .option("--status <jobId>", "show a job")
    .option("--cancel <jobId>", "cancel a queued or running job")
    .option("--result <jobId>", "read a succeeded job's result")
    .option("--head <n>", "with --result: first N rows")
    .option("--summary", "with --result: summary statistics")
    .option("--transform <expr>", "with --result: col:func[:args],...")
    .option("--where <expr>", "with --result: row filter expression")
    .option("--group-by <cols>", "with --result: group columns (needs --aggregate)")
    .option("--aggregate <expr>", "with --result: func:col,... (needs --group-by)")
    .option("--sort <expr>", "with --result: 'col [ASC|DESC]',...")
    .option("--columns <cols>", "with --result: columns to keep, in order")
    .option("--batch <path>", "run every *.json config of a directory (or one file)")
    .option("--list-jobs", "list recent jobs")
    .option("--job-limit <n>", `jobs to list (default: ${DEFAULT_JOB_LIST_LIMIT})`)
    .addOption(new Option(`${RUN_JOB_FLAG} <jobId>`).hideHelp())
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => ctx.stdout(text.trimEnd()),
      writeErr: (text) => ctx.stderr(text.trimEnd()),
      outputError: () => undefined,
    });
}

/**
 * Parse argv (without node and script). Null means help was printed.
 */
export function parseCliArgs(argv: string[], ctx: CliContext): CliOptions | null {
  const program = buildProgram(ctx);
  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) {
        return null;
      }
      throw invalidArgument(err.message.replace(/^error: /, ""), { reason: err.code });
    }
    throw err;
  }
  return program.opts<CliOptions>();
}

function selectAction(opts: CliOptions): Action {
  const chosen: Array<[Action, string]> = [];
  if (opts.submit) chosen.push(["submit", "--submit"]);
  if (opts.status !== undefined) chosen.push(["status", "--status"]);
  if (opts.cancel !== undefined) chosen.push(["cancel", "--cancel"]);
  if (opts.result !== undefined) chosen.push(["result", "--result"]);
  if (opts.batch !== undefined) chosen.push(["batch", "--batch"]);
  if (opts.listJobs) chosen.push(["list_jobs", "--list-jobs"]);
  if (opts.runJob !== undefined) chosen.push(["run_job", RUN_JOB_FLAG]);

  if (chosen.length > 1) {
    const flags = chosen.map(([, flag]) => flag);
    throw invalidArgument(`${flags.join(" and ")} cannot be combined`, { flags });
  }
  return chosen.length === 0 ? "query" : chosen[0][0];
}

/**
 * Reject flags that do not apply to the selected action
 */
function checkFlagCombinations(action: Action, opts: CliOptions): void {
  const pipelineFlags = PIPELINE_FLAGS.filter(([key]) => opts[key] !== undefined).map(([, flag]) => flag);

  if (action !== "result") {
    if (pipelineFlags.length > 0) {
      throw invalidArgument(
        `${pipelineFlags.join(", ")} can only be used with --result; put the pipeline in the params document instead`,
        { flags: pipelineFlags },
      );
    }
    if (opts.head !== undefined) {
      throw invalidArgument("--head can only be used with --result");
    }
    if (opts.summary) {
      throw invalidArgument("--summary can only be used with --result");
    }
  }

  if (opts.params !== undefined && opts.inline !== undefined) {
    throw invalidArgument("--params and --inline cannot be combined");
  }
  if (action !== "query" && action !== "submit" && (opts.params !== undefined || opts.inline !== undefined)) {
    throw invalidArgument("--params and --inline apply only to a query or --submit");
  }
  if (opts.output !== undefined && action !== "query" && action !== "result") {
    throw invalidArgument("--output applies only to a query or --result");
  }
  if (opts.output !== undefined && opts.summary) {
    throw invalidArgument("--output cannot be combined with --summary");
  }
  if (opts.jobLimit !== undefined && action !== "list_jobs") {
    throw invalidArgument("--job-limit can only be used with --list-jobs");
  }
}

function parseIntegerFlag(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw invalidArgument(`${flag} must be an integer: ${value}`, { flag, value });
  }
  return Number(value.trim());
}

function pipelineFromFlags(opts: CliOptions): PipelineSpec | undefined {
  const spec: PipelineSpec = {};
  if (opts.transform !== undefined) spec.transform = opts.transform;
  if (opts.where !== undefined) spec.where = opts.where;
  if (opts.groupBy !== undefined) spec.group_by = opts.groupBy;
  if (opts.aggregate !== undefined) spec.aggregate = opts.aggregate;
  if (opts.sort !== undefined) spec.sort = opts.sort;
  if (opts.columns !== undefined) spec.columns = opts.columns;
  return isEmptyPipelineSpec(spec) ? undefined : spec;
}

function loadDescriptor(
  opts: CliOptions,
  ctx: CliContext,
): { descriptor: QueryDescriptor; paramsPath: string | null } {
  const paramsPath = opts.inline === undefined ? opts.params ?? DEFAULT_PARAMS_PATH : null;
  const raw = paramsPath === null ? loadParamsInline(opts.inline ?? "") : loadParamsFile(paramsPath);
  const descriptor = prepareParams(raw, { reference: ctx.reference, sites: ctx.sites });
  return { descriptor, paramsPath };
}

function writeOutput(path: string, table: ResultTable): string {
  const target = resolve(path);
  try {
    writeCsvFile(target, table);
  } catch (err) {
    throw asQueryError(err, "SAVE_FAILED", `Failed to write ${target}`);
  }
  logger.info("Result written", { path: target, rows: table.rows.length });
  return target;
}

async function runQuery(opts: CliOptions, ctx: CliContext): Promise<CommandOutput> {
  const { descriptor } = loadDescriptor(opts, ctx);
  const outcome = await executeQuery(descriptor, ctx.execution);
  const outputPath = opts.output === undefined ? undefined : writeOutput(opts.output, outcome.table);

  const lines = [formatTable(outcome.table), `${outcome.table.rows.length} row(s)`];
  if (outcome.pipeline) {
    lines.push(`Pipeline: ${outcome.pipeline.input_rows} -> ${outcome.pipeline.output_rows} rows (${outcome.pipeline.stages.join(", ")})`);
  }
  if (outcome.save) {
    lines.push(`Saved ${outcome.save.rows_written} row(s) to ${outcome.save.target}: ${outcome.save.destination}`);
  }
  if (outputPath) {
    lines.push(`Written to ${outputPath}`);
  }

  return {
    envelope: ok("query", queryData(descriptor.source, outcome, outputPath)),
    human: lines.join("\n"),
  };
}

function submit(opts: CliOptions, ctx: CliContext): CommandOutput {
  const { descriptor, paramsPath } = loadDescriptor(opts, ctx);
  const job = ctx.jobManager.submit(descriptor, { paramsPath });
  const runnerPid = ctx.spawnRunner ? ctx.spawnRunner(job.job_id) : null;

  const lines = [`Submitted ${job.job_id} (${job.status})`];
  if (!ctx.spawnRunner) {
    lines.push("Autorun is off; start a worker to run it.");
  }
  return {
    envelope: ok("submit", submitData(job, ctx.spawnRunner !== null, runnerPid)),
    human: lines.join("\n"),
  };
}

function jobResult(jobId: string, opts: CliOptions, ctx: CliContext): CommandOutput {
  const view = ctx.jobManager.result(jobId, {
    head: opts.head === undefined ? undefined : parseIntegerFlag(opts.head, "--head"),
    summary: opts.summary,
    pipeline: pipelineFromFlags(opts),
  });

  if (view.kind === "summary") {
    return { envelope: ok("job_result", jobResultData(view)), human: formatSummary(view.summary) };
  }

  const outputPath = opts.output === undefined ? undefined : writeOutput(opts.output, view.table);
  const lines = [formatTable(view.table), `${view.table.rows.length} of ${view.total_rows} row(s)`];
  if (outputPath) {
    lines.push(`Written to ${outputPath}`);
  }
  return { envelope: ok("job_result", jobResultData(view, outputPath)), human: lines.join("\n") };
}

async function batch(path: string, opts: CliOptions, ctx: CliContext): Promise<CommandOutput> {
  const summary = await runBatch(path, {
    execute: async (raw) => {
      const descriptor = prepareParams(raw, { reference: ctx.reference, sites: ctx.sites });
      const outcome = await executeQuery(descriptor, ctx.execution);
      return { row_count: outcome.table.rows.length };
    },
    onProgress: opts.json
      ? undefined
      : ({ index, total, config }) => ctx.stderr(`[${index}/${total}] ${config}`),
  });
  return {
    envelope: ok("batch", summary),
    human: formatBatch(summary),
    exitCode: summary.failed > 0 ? 1 : 0,
  };
}

async function dispatch(opts: CliOptions, ctx: CliContext): Promise<CommandOutput> {
  const action = selectAction(opts);
  checkFlagCombinations(action, opts);

  switch (action) {
    case "query":
      return runQuery(opts, ctx);
    case "submit":
      return submit(opts, ctx);
    case "status": {
      const job = ctx.jobManager.status(opts.status ?? "");
      return { envelope: ok("job_status", job), human: formatJob(job) };
    }
    case "cancel": {
      const { job, already_canceled } = ctx.jobManager.cancel(opts.cancel ?? "");
      return {
        envelope: ok("cancel", cancelData(job, already_canceled)),
        human: already_canceled ? `${job.job_id} was already canceled` : `Canceled ${job.job_id}`,
      };
    }
    case "result":
      return jobResult(opts.result ?? "", opts, ctx);
    case "batch":
      return batch(opts.batch ?? "", opts, ctx);
    case "list_jobs": {
      const limit =
        opts.jobLimit === undefined ? DEFAULT_JOB_LIST_LIMIT : parseIntegerFlag(opts.jobLimit, "--job-limit");
      const data = jobListData(ctx.jobManager.list(limit));
      return { envelope: ok("list_jobs", data), human: formatJobList(data.jobs) };
    }
    case "run_job": {
      const job = await runJob(opts.runJob ?? "", {
        manager: ctx.jobManager,
        context: ctx.execution,
      });
      return {
        envelope: ok("job_status", job),
        human: formatJob(job),
        exitCode: job.status === "failed" ? 1 : 0,
      };
    }
  }
}

/**
 * Print an error the way the selected output mode expects
 */
export function reportError(err: unknown, json: boolean, ctx: Pick<CliContext, "stdout" | "stderr">): void {
  if (!(err instanceof QueryError)) {
    logger.error("Unexpected error", {
      error: errorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
  }
  const envelope = errorEnvelope(err);
  if (json) {
    ctx.stdout(serializeEnvelope(envelope));
  } else {
    ctx.stderr(formatError(envelope));
  }
}

/**
 * Run one CLI invocation
 *
 * @returns The process exit code
 */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const json = argv.includes("--json");

  let output: CommandOutput;
  try {
    const opts = parseCliArgs(argv, ctx);
    if (opts === null) {
      return 0;
    }
    output = await dispatch(opts, ctx);
  } catch (err) {
    reportError(err, json, ctx);
    return 1;
  }

  ctx.stdout(json ? serializeEnvelope(output.envelope) : output.human);
  return output.exitCode ?? 0;
}
