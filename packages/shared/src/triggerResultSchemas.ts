import { z } from 'zod';

export const triggerSuccessSchema = z
  .object({
    JobRunId: z.string().min(1),
    Message: z.string(),
  })
  .strict();

export const triggerFailureSchema = z
  .object({
    Error: z.string(),
    Message: z.string(),
  })
  .strict();

// Strict members: a mapping carrying both JobRunId and Error matches neither.
export const triggerResultSchema = z.union([triggerSuccessSchema, triggerFailureSchema]);
