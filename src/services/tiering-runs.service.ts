/**
 * TieringRunService Implementation
 *
 * Purpose: start tiering runs in the background and let callers poll or
 * cancel them by id.
 * Owns: tiering run handles (TieringRunStore)
 * Dependencies: TieringScheduler
 *
 * Cancellation only reaches runs started by this process; the store lets
 * any process read their status.
 */

import { nanoid } from 'nanoid';

import type {
  Result,
  TieringRunHandle,
  TieringRunResult,
} from '../types/index.js';
import {
  success,
  failure,
  failureFromError,
  errorMessage,
} from '../types/index.js';

import type { TieringLogger, TieringScheduler } from './tiering.scheduler.js';

/**
 * Run handle storage abstraction (in-memory, Redis, etc.)
 */
export interface TieringRunStore {
  save: (handle: TieringRunHandle) => Promise<void>;
  get: (runId: string) => Promise<TieringRunHandle | null>;
}

/**
 * TieringRunService interface
 */
export interface TieringRunService {
  /** Runs synchronously and returns the report */
  run(options?: StartOptions): Promise<Result<TieringRunResult>>;
  /** Starts a background run and returns its handle immediately */
  start(options?: StartOptions): Promise<Result<TieringRunHandle>>;
  get(runId: string): Promise<Result<TieringRunHandle>>;
  cancel(runId: string): Promise<Result<TieringRunHandle>>;
  /** Resolves once a background run started here has settled */
  waitFor(runId: string): Promise<Result<TieringRunHandle>>;
}

export interface StartOptions {
  requestId?: string;
}

interface ActiveRun {
  controller: AbortController;
  settled: Promise<void>;
}

/**
 * Create TieringRunService instance
 */
export function createTieringRunService(deps: {
  scheduler: TieringScheduler;
  store: TieringRunStore;
  clock?: () => Date;
  logger?: TieringLogger;
}): TieringRunService {
  const { scheduler, store } = deps;
  const clock = deps.clock ?? (() => new Date());
  const logger = deps.logger ?? console;
  const active = new Map<string, ActiveRun>();

  async function finish(
    handle: TieringRunHandle,
    controller: AbortController,
    requestId: string | undefined
  ): Promise<void> {
    const outcome = await scheduler.runOnce({
      runId: handle.runId,
      signal: controller.signal,
      requestId,
    });

    const finished: TieringRunHandle = outcome.success
      ? {
          ...handle,
          status: outcome.data.cancelled ? 'cancelled' : 'completed',
          result: outcome.data,
        }
      : { ...handle, status: 'failed', error: outcome.error.message };

    await store.save(finished);
  }

  async function lookup(runId: string): Promise<Result<TieringRunHandle>> {
    try {
      const handle = await store.get(runId);
      if (handle === null) {
        return failure('NOT_FOUND', `Tiering run ${runId} not found`);
      }
      return success(handle);
    } catch (error) {
      return failureFromError(error);
    }
  }

  return {
    async run(options: StartOptions = {}): Promise<Result<TieringRunResult>> {
      return scheduler.runOnce({ requestId: options.requestId });
    },

    async start(options: StartOptions = {}): Promise<Result<TieringRunHandle>> {
      const handle: TieringRunHandle = {
        runId: nanoid(),
        status: 'running',
        startedAt: clock(),
      };

      try {
        await store.save(handle);
      } catch (error) {
        return failureFromError(error);
      }

      const controller = new AbortController();
      const settled = finish(handle, controller, options.requestId)
        .catch((error: unknown) => {
          logger.error(
            `[tiering] background run ${handle.runId} could not be recorded:`,
            errorMessage(error)
          );
        })
        .finally(() => {
          active.delete(handle.runId);
        });

      active.set(handle.runId, { controller, settled });
      return success(handle);
    },

    get: lookup,

    async cancel(runId: string): Promise<Result<TieringRunHandle>> {
      const run = active.get(runId);
      if (run === undefined) {
        const existing = await lookup(runId);
        if (!existing.success) {
          return existing;
        }
        if (existing.data.status === 'running') {
          return failure(
            'CONFLICT',
            `Tiering run ${runId} is not owned by this process`
          );
        }
        return existing;
      }

      run.controller.abort();
      await run.settled;
      return lookup(runId);
    },

    async waitFor(runId: string): Promise<Result<TieringRunHandle>> {
      const run = active.get(runId);
      if (run !== undefined) {
        await run.settled;
      }
      return lookup(runId);
    },
  };
}
