import { z } from 'zod';
import { DEFAULTS, ENV_KEYS } from './constants';

function emptyStringToUndefined(value: unknown): unknown {
  return value === '' ? undefined : value;
}

const envSchema = z.object({
  [ENV_KEYS.glueJobName]: z.preprocess(
    emptyStringToUndefined,
    z.string().min(1).max(255).default(DEFAULTS.glueJobName),
  ),

  [ENV_KEYS.awsRegion]: z.preprocess(
    emptyStringToUndefined,
    z.string().min(1).default(DEFAULTS.awsRegion),
  ),
  [ENV_KEYS.awsAccessKeyId]: z.preprocess(emptyStringToUndefined, z.string().min(1).optional()),
  [ENV_KEYS.awsSecretAccessKey]: z.preprocess(emptyStringToUndefined, z.string().min(1).optional()),
  [ENV_KEYS.glueEndpoint]: z.preprocess(emptyStringToUndefined, z.string().url().optional()),
});

export type TriggerEnv = z.infer<typeof envSchema>;

export function loadEnv(processEnv: NodeJS.ProcessEnv): TriggerEnv {
  const parsed = envSchema.safeParse(processEnv);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${message}`);
  }
  return parsed.data;
}
