/**
 * Application Configuration
 * Reads environment variables (dotenv is loaded by the entry point) and
 * validates them with zod. Invalid settings stop start-up.
 */

import { z } from 'zod';

import type { FileSizeBounds, TieringPolicyConfig } from '../types/index.js';
import { DAY_MS } from '../types/index.js';

const MIB = 1024 * 1024;
const GIB = 1024 * MIB;

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value === '' ? undefined : value));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    STORAGE_BACKEND: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    RUN_STORE: z.enum(['memory', 'redis']).default('memory'),
    UPSTASH_REDIS_URL: optionalString,
    UPSTASH_REDIS_TOKEN: optionalString,
    HOT_TO_WARM_IDLE_DAYS: z.coerce.number().positive().default(30),
    WARM_TO_COLD_IDLE_DAYS: z.coerce.number().positive().default(90),
    PROMOTION_THRESHOLD: z.coerce.number().positive().default(5),
    PROMOTION_WINDOW_DAYS: z.coerce.number().positive().default(7),
    MIN_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(MIB),
    MAX_FILE_SIZE_BYTES: z.coerce.number().int().positive().default(10 * GIB),
    TIERING_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    TIERING_INTERVAL_MINUTES: z.coerce.number().min(0).default(0),
  })
  .superRefine((env, ctx) => {
    if (env.HOT_TO_WARM_IDLE_DAYS >= env.WARM_TO_COLD_IDLE_DAYS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['HOT_TO_WARM_IDLE_DAYS'],
        message: 'must be less than WARM_TO_COLD_IDLE_DAYS',
      });
    }
    if (env.MIN_FILE_SIZE_BYTES > env.MAX_FILE_SIZE_BYTES) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['MIN_FILE_SIZE_BYTES'],
        message: 'must not exceed MAX_FILE_SIZE_BYTES',
      });
    }
    if (
      env.STORAGE_BACKEND === 'supabase' &&
      (env.SUPABASE_URL === undefined || env.SUPABASE_SERVICE_KEY === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message:
          'SUPABASE_URL and SUPABASE_SERVICE_KEY are required when STORAGE_BACKEND=supabase',
      });
    }
    if (
      env.RUN_STORE === 'redis' &&
      (env.UPSTASH_REDIS_URL === undefined ||
        env.UPSTASH_REDIS_TOKEN === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['UPSTASH_REDIS_URL'],
        message:
          'UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN are required when RUN_STORE=redis',
      });
    }
  });

export interface AppConfig {
  port: number;
  storage:
    | { backend: 'memory' }
    | { backend: 'supabase'; url: string; serviceKey: string };
  runStore:
    | { backend: 'memory' }
    | { backend: 'redis'; url: string; token: string };
  policy: TieringPolicyConfig;
  fileSize: FileSizeBounds;
  tiering: {
    concurrency: number;
    /** 0 disables the timer */
    intervalMs: number;
  };
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Build the application configuration from environment variables
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      )
    );
  }
  const values = parsed.data;

  const storage: AppConfig['storage'] =
    values.STORAGE_BACKEND === 'supabase' &&
    values.SUPABASE_URL !== undefined &&
    values.SUPABASE_SERVICE_KEY !== undefined
      ? {
          backend: 'supabase',
          url: values.SUPABASE_URL,
          serviceKey: values.SUPABASE_SERVICE_KEY,
        }
      : { backend: 'memory' };

  const runStore: AppConfig['runStore'] =
    values.RUN_STORE === 'redis' &&
    values.UPSTASH_REDIS_URL !== undefined &&
    values.UPSTASH_REDIS_TOKEN !== undefined
      ? {
          backend: 'redis',
          url: values.UPSTASH_REDIS_URL,
          token: values.UPSTASH_REDIS_TOKEN,
        }
      : { backend: 'memory' };

  return {
    port: values.PORT,
    storage,
    runStore,
    policy: {
      hotToWarmIdleMs: values.HOT_TO_WARM_IDLE_DAYS * DAY_MS,
      warmToColdIdleMs: values.WARM_TO_COLD_IDLE_DAYS * DAY_MS,
      promotionThreshold: values.PROMOTION_THRESHOLD,
      promotionWindowMs: values.PROMOTION_WINDOW_DAYS * DAY_MS,
    },
    fileSize: {
      minBytes: values.MIN_FILE_SIZE_BYTES,
      maxBytes: values.MAX_FILE_SIZE_BYTES,
    },
    tiering: {
      concurrency: values.TIERING_CONCURRENCY,
      intervalMs: values.TIERING_INTERVAL_MINUTES * 60 * 1000,
    },
  };
}
