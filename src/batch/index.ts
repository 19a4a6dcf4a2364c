export { runBatch, collectConfigs, type BatchExecute, type BatchOptions } from "./batchRunner";
