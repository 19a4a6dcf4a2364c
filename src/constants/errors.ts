/**
 * Default remediation hints per error code
 */

import type { ErrorCode } from "@/types";

export const ERROR_HINTS: Record<ErrorCode, string> = {
  PARAMS_VALIDATION_FAILED: "Fix the fields listed in details.errors and retry.",
  INVALID_JSON: "Check the JSON syntax of the params document.",
  PARAMS_FILE_NOT_FOUND: "Check the --params path.",
  INVALID_SITE_ALIAS: "Add the alias to the sites config or set site_url/property_id directly.",
  INVALID_ARGUMENT: "Run with --help to see valid flag combinations.",
  INVALID_TRANSFORM:
    "Use col:func[:args] with date_format, url_decode, path_only or strip_qs.",
  INVALID_WHERE: "Check column names, quoting and operators in the where expression.",
  INVALID_SORT: "Use 'col [ASC|DESC]' keys separated by commas.",
  INVALID_COLUMNS: "Use existing, non-duplicated column names separated by commas.",
  INVALID_AGGREGATE: "Use func:col pairs with sum, mean, median, min, max or count.",
  JOB_NOT_FOUND: "Check the job ID with --list-jobs.",
  JOB_NOT_READY: "Check progress with --status and retry once the job has succeeded.",
  JOB_NOT_CANCELABLE: "Only queued or running jobs can be canceled.",
  QUERY_EXECUTION_FAILED: "Check credentials, query fields and access to the source.",
  NO_DATA_RETURNED: "Widen the date range or relax the filter.",
  PIPELINE_FAILED: "Check the pipeline settings in the params document.",
  SAVE_FAILED: "Check the save destination and write permissions.",
  ARTIFACT_NOT_FOUND: "The result artifact is missing. Resubmit the query.",
  RESULT_READ_FAILED: "The result artifact could not be read. Resubmit the query.",
  BATCH_FAILED: "Pass a directory containing *.json configs or a single .json file.",
  INTERNAL_ERROR: "Re-run with LOG_LEVEL=debug and check the logs.",
};
