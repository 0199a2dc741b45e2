import { z } from 'zod';
import { ConfigError } from './errors';
import type { PipelineConfig } from './types';

export const DEFAULT_REGION = 'us-east-1';

/** Shape of an AWS region id such as us-east-1 or us-gov-west-1 */
export const REGION_ID_PATTERN = /^[a-z]+(-[a-z0-9]+)+$/;

// Env values arrive as strings; empty strings count as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const positiveInt = (fallback: number) =>
  z
    .union([z.number(), z.string().transform((value) => (value.trim() === '' ? fallback : Number(value)))])
    .optional()
    .transform((value) => value ?? fallback)
    .pipe(z.number().int().positive());

const nonNegativeInt = (fallback: number) =>
  z
    .union([z.number(), z.string().transform((value) => (value.trim() === '' ? fallback : Number(value)))])
    .optional()
    .transform((value) => value ?? fallback)
    .pipe(z.number().int().nonnegative());

const EnvSchema = z.object({
  AWS_REGION: optionalString
    .transform((value) => value ?? DEFAULT_REGION)
    .refine((value) => REGION_ID_PATTERN.test(value), 'AWS_REGION must be an AWS region id such as us-east-1'),
  S3_BUCKET_NAME: z
    .string({ required_error: 'S3_BUCKET_NAME is required' })
    .trim()
    .regex(/^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/, 'S3_BUCKET_NAME must be a valid S3 bucket name'),
  GLUE_DATABASE_NAME: z
    .string({ required_error: 'GLUE_DATABASE_NAME is required' })
    .trim()
    .regex(/^[a-z0-9_]{1,255}$/, 'GLUE_DATABASE_NAME may only contain lowercase letters, digits and underscores'),
  SPORTS_DATA_API_KEY: z.string({ required_error: 'SPORTS_DATA_API_KEY is required' }).trim().min(1, 'SPORTS_DATA_API_KEY is required'),
  NBA_ENDPOINT: z
    .string({ required_error: 'NBA_ENDPOINT is required' })
    .trim()
    .url('NBA_ENDPOINT must be a URL')
    .refine((value) => /^https?:\/\//.test(value), 'NBA_ENDPOINT must use http or https'),
  FETCH_TIMEOUT_MS: positiveInt(30_000),
  BUCKET_READY_MAX_ATTEMPTS: positiveInt(10),
  BUCKET_READY_INTERVAL_MS: nonNegativeInt(1_000),
});

/**
 * Build the pipeline configuration from environment-style key/value pairs.
 * Throws ConfigError listing every invalid or missing variable.
 */
export const loadConfig = (env: Record<string, string | undefined>): PipelineConfig => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const key = issue.path.join('.');
      return issue.message.startsWith(key) ? issue.message : `${key}: ${issue.message}`;
    });
    throw new ConfigError(issues);
  }

  const parsed = result.data;
  return {
    region: parsed.AWS_REGION,
    bucketName: parsed.S3_BUCKET_NAME,
    databaseName: parsed.GLUE_DATABASE_NAME,
    apiKey: parsed.SPORTS_DATA_API_KEY,
    endpoint: parsed.NBA_ENDPOINT,
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    bucketReady: {
      maxAttempts: parsed.BUCKET_READY_MAX_ATTEMPTS,
      intervalMs: parsed.BUCKET_READY_INTERVAL_MS,
    },
  };
};
