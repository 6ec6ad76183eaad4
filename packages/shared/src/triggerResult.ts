export const RESULT_KEY = {
  jobRunId: 'JobRunId',
  error: 'Error',
} as const;

export const TRIGGER_MESSAGES = {
  failed: 'Failed to start Glue job',
} as const;

export function startedMessage(jobName: string): string {
  return `Glue job for ${jobName} started successfully`;
}

export type TriggerSuccess = {
  JobRunId: string;
  Message: string;
};

export type TriggerFailure = {
  Error: string;
  Message: string;
};

export type TriggerResult = TriggerSuccess | TriggerFailure;

export function isTriggerSuccess(result: TriggerResult): result is TriggerSuccess {
  return RESULT_KEY.jobRunId in result;
}

export function isTriggerFailure(result: TriggerResult): result is TriggerFailure {
  return RESULT_KEY.error in result;
}
