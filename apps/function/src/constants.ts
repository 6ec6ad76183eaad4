export const LOG_PREFIX = '[glue-trigger]' as const;

export const ENV_KEYS = {
  glueJobName: 'GLUE_JOB_NAME',

  awsRegion: 'AWS_REGION',
  awsAccessKeyId: 'AWS_ACCESS_KEY_ID',
  awsSecretAccessKey: 'AWS_SECRET_ACCESS_KEY',
  glueEndpoint: 'GLUE_ENDPOINT',

  dotenvDebug: 'TRIGGER_DOTENV_DEBUG',
} as const;

export const DEFAULTS = {
  glueJobName: 'ad_etl',
  awsRegion: 'us-east-1',
} as const;
