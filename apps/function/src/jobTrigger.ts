import {
  TRIGGER_MESSAGES,
  startedMessage,
  type TriggerResult,
} from '@glue-trigger/shared';
import { LOG_PREFIX } from './constants';
import type { JobRunner } from './glue/types';

export type TriggerTarget = {
  jobName: string;
  runner: JobRunner;
};

export type TriggerJobParams = {
  acquire: () => TriggerTarget | Promise<TriggerTarget>;
  requestId?: string;
};

/**
 * Requests one run of the acquired job and reports whether the request was accepted.
 * Resolves with the failure variant on any error, acquisition included; never rejects.
 */
export async function triggerJob(params: TriggerJobParams): Promise<TriggerResult> {
  const { acquire, requestId } = params;
  const tag = requestId ? `${LOG_PREFIX} ${requestId}` : LOG_PREFIX;
  let jobName: string | undefined;

  try {
    const target = await acquire();
    jobName = target.jobName;
    const { runId } = await target.runner.startJobRun(jobName);

    // eslint-disable-next-line no-console
    console.log(`${tag} started job=${jobName} runId=${runId}`);

    return { JobRunId: runId, Message: startedMessage(jobName) };
  } catch (err) {
    const description = describeError(err);

    // eslint-disable-next-line no-console
    console.error(`${tag} failed to start job=${jobName ?? '(unresolved)'}: ${description}`);

    return { Error: description, Message: TRIGGER_MESSAGES.failed };
  }
}

export const UNKNOWN_ERROR = 'Unknown error';

// Runs inside the catch of triggerJob, so it must not throw for any thrown value.
export function describeError(err: unknown): string {
  try {
    if (err instanceof Error) return String(err.message || err.name);
    if (typeof err === 'string') return err;
    return String(err);
  } catch {
    return fallbackDescription(err);
  }
}

function fallbackDescription(err: unknown): string {
  try {
    return Object.prototype.toString.call(err);
  } catch {
    return UNKNOWN_ERROR;
  }
}
