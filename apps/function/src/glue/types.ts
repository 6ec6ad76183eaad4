export type StartedJobRun = {
  runId: string;
};

/** Starts a named job without waiting for it to finish. */
export interface JobRunner {
  startJobRun(jobName: string): Promise<StartedJobRun>;
}
