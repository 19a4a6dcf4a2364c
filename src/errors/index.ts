export { QueryError, errorMessage, asQueryError } from "./queryError";
export { PipelineStageError } from "./pipelineStageError";
export { JobCanceledError } from "./jobCanceledError";
