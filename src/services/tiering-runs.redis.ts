/**
 * Redis TieringRunStore
 * Run handles are JSON values under tiering:run:<id> with a TTL, so any
 * instance sharing the Redis database can report on a run.
 */

import { z } from 'zod';

import type { TieringRunHandle } from '../types/index.js';
import { TIER_ORDER, TieringError, errorMessage } from '../types/index.js';

import type { TieringRunStore } from './tiering-runs.service.js';

export const RUN_KEY_PREFIX = 'tiering:run:';
export const RUN_TTL_SECONDS = 24 * 60 * 60;

const tierSchema = z.enum(TIER_ORDER);

const decisionSchema = z.object({
  fileId: z.string(),
  fromTier: tierSchema,
  toTier: tierSchema,
  reason: z.enum([
    'IDLE_COLD',
    'IDLE_WARM',
    'FREQUENT_ACCESS',
    'MANUAL_PROMOTION',
  ]),
});

const resultSchema = z.object({
  runId: z.string(),
  startedAt: z.coerce.date(),
  finishedAt: z.coerce.date(),
  filesEvaluated: z.number(),
  filesMoved: z.number(),
  moves: z.array(decisionSchema),
  skipped: z.array(
    z.object({
      fileId: z.string(),
      reason: z.enum(['CONFLICT', 'NOT_FOUND']),
    })
  ),
  failures: z.array(
    z.object({
      fileId: z.string(),
      errorKind: z.enum([
        'STORAGE_UNAVAILABLE',
        'VERIFICATION_FAILED',
        'INTERNAL_ERROR',
      ]),
      message: z.string(),
    })
  ),
  cancelled: z.boolean(),
});

const handleSchema = z.object({
  runId: z.string(),
  status: z.enum(['running', 'completed', 'failed', 'cancelled']),
  startedAt: z.coerce.date(),
  result: resultSchema.optional(),
  error: z.string().optional(),
});

/**
 * The part of the Upstash client the store uses
 */
export interface RunStoreRedis {
  get(key: string): Promise<unknown>;
  set(key: string, value: string, options: { ex: number }): Promise<unknown>;
}

function runKey(runId: string): string {
  return `${RUN_KEY_PREFIX}${runId}`;
}

/**
 * Parse a stored handle (dates arrive as ISO strings)
 */
export function parseStoredHandle(value: unknown): TieringRunHandle {
  const parsed = handleSchema.safeParse(value);
  if (!parsed.success) {
    throw new TieringError(
      'INTERNAL_ERROR',
      `Stored tiering run is malformed: ${parsed.error.message}`
    );
  }
  return parsed.data;
}

export function createRedisTieringRunStore(
  redis: RunStoreRedis,
  ttlSeconds: number = RUN_TTL_SECONDS
): TieringRunStore {
  return {
    async save(handle: TieringRunHandle): Promise<void> {
      try {
        await redis.set(runKey(handle.runId), JSON.stringify(handle), {
          ex: ttlSeconds,
        });
      } catch (error) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to save tiering run: ${errorMessage(error)}`
        );
      }
    },

    async get(runId: string): Promise<TieringRunHandle | null> {
      let value: unknown;
      try {
        value = await redis.get(runKey(runId));
      } catch (error) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to load tiering run: ${errorMessage(error)}`
        );
      }

      if (value === null) {
        return null;
      }
      // Upstash parses JSON on read; a plain string means it did not
      return parseStoredHandle(
        typeof value === 'string' ? JSON.parse(value) : value
      );
    },
  };
}
