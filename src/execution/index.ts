export {
  executeQuery,
  type ExecutionContext,
  type ExecuteOptions,
  type QueryOutcome,
} from "./executeQuery";
