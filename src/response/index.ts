export {
  ok,
  errorEnvelope,
  serializeEnvelope,
  tablePayload,
  queryData,
  submitData,
  cancelData,
  jobResultData,
  jobListData,
  type TablePayload,
  type QueryData,
  type SubmitData,
  type JobListItem,
} from "./responseFormatter";
export {
  formatTable,
  formatError,
  formatJob,
  formatJobList,
  formatSummary,
  formatBatch,
} from "./humanOutput";
