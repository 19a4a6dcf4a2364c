/**
 * Thrown from a job checkpoint once the job has been canceled.
 * The job runner stops work and leaves the record in `canceled`.
 */
export class JobCanceledError extends Error {
  constructor(
    public readonly jobId: string,
    public readonly stage: string,
  ) {
    super(`Job ${jobId} was canceled (observed before ${stage})`);
    this.name = "JobCanceledError";
  }
}
