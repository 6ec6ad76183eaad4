import {
  GlueClient,
  StartJobRunCommand,
  type GlueClientConfig,
  type StartJobRunCommandOutput,
} from '@aws-sdk/client-glue';
import { ENV_KEYS } from '../constants';
import type { TriggerEnv } from '../env';
import type { JobRunner } from './types';

// The slice of GlueClient the runner calls; tests hand in a fake.
export type GlueSender = {
  send(command: StartJobRunCommand): Promise<StartJobRunCommandOutput>;
};

export function createGlueClient(env: TriggerEnv): GlueClient {
  const config: GlueClientConfig = {
    region: env[ENV_KEYS.awsRegion],
  };

  if (env[ENV_KEYS.glueEndpoint]) {
    config.endpoint = env[ENV_KEYS.glueEndpoint];
  }

  // If credentials are provided, use them; otherwise fall back to default AWS resolution.
  const accessKeyId = env[ENV_KEYS.awsAccessKeyId];
  const secretAccessKey = env[ENV_KEYS.awsSecretAccessKey];
  if (accessKeyId && secretAccessKey) {
    config.credentials = { accessKeyId, secretAccessKey };
  }

  return new GlueClient(config);
}

export function createGlueJobRunner(glue: GlueSender): JobRunner {
  return {
    async startJobRun(jobName) {
      const response = await glue.send(new StartJobRunCommand({ JobName: jobName }));
      if (!response.JobRunId) {
        throw new Error(`Glue did not return a JobRunId for ${jobName}`);
      }
      return { runId: response.JobRunId };
    },
  };
}
