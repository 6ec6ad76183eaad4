import type { Context } from 'aws-lambda';
import type { TriggerResult } from '@glue-trigger/shared';
import { ENV_KEYS } from './constants';
import { loadEnv, type TriggerEnv } from './env';
import { createGlueClient, createGlueJobRunner } from './glue/glueClient';
import type { JobRunner } from './glue/types';
import { triggerJob } from './jobTrigger';

export type TriggerHandler = (
  event: unknown,
  context?: Pick<Context, 'awsRequestId'>,
) => Promise<TriggerResult>;

export type HandlerDeps = {
  loadConfig: () => TriggerEnv;
  createRunner: (env: TriggerEnv) => JobRunner;
};

const defaultDeps: HandlerDeps = {
  loadConfig: () => loadEnv(process.env),
  createRunner: (env) => createGlueJobRunner(createGlueClient(env)),
};

export function createHandler(deps: Partial<HandlerDeps> = {}): TriggerHandler {
  const { loadConfig, createRunner } = { ...defaultDeps, ...deps };

  // The event is never read: every invocation starts the configured job.
  return async (_event, context) =>
    triggerJob({
      acquire: () => {
        const env = loadConfig();
        return { jobName: env[ENV_KEYS.glueJobName], runner: createRunner(env) };
      },
      requestId: context?.awsRequestId,
    });
}

export const handler = createHandler();
