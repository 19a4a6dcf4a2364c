export { JobManager, isTerminal, toJobError, type JobManagerOptions } from "./jobManager";
export { ArtifactStore, getJobDir } from "./artifactStore";
export { generateJobId } from "./jobId";
export { createJobLogger } from "./jobLogger";
export { runJob, executeClaimedJob, type JobRunnerDeps } from "./jobRunner";
export { spawnJobRunner, isAutorunEnabled } from "./spawnJobRunner";
export {
  runWorker,
  parseWorkerMode,
  type WorkerMode,
  type WorkerOptions,
  type WorkerResult,
} from "./worker";
