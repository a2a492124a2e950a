/**
 * Tiering Worker
 *
 * Runs a tiering pass every `intervalMs`. A tick that fires while the
 * previous pass is still running is skipped, so passes never overlap
 * within one process.
 */

import type { TieringRunService } from '../services/tiering-runs.service.js';
import type { TieringLogger } from '../services/tiering.scheduler.js';
import { errorMessage } from '../types/index.js';

export interface TieringWorker {
  start(): void;
  /** Clears the timer and waits for a pass in progress */
  stop(): Promise<void>;
  /** Runs one pass now unless one is already running */
  tick(): Promise<void>;
}

export function createTieringWorker(deps: {
  runs: Pick<TieringRunService, 'run'>;
  intervalMs: number;
  logger?: TieringLogger;
}): TieringWorker {
  const { runs, intervalMs } = deps;
  const logger = deps.logger ?? console;

  let timer: ReturnType<typeof setInterval> | null = null;
  let current: Promise<void> | null = null;

  async function pass(): Promise<void> {
    const result = await runs.run();
    if (!result.success) {
      logger.error(`[tiering-worker] run failed: ${result.error.message}`);
    }
  }

  function tick(): Promise<void> {
    if (current !== null) {
      logger.warn('[tiering-worker] previous run still in progress, skipping');
      return current;
    }
    current = pass()
      .catch((error: unknown) => {
        logger.error('[tiering-worker] run crashed:', errorMessage(error));
      })
      .finally(() => {
        current = null;
      });
    return current;
  }

  return {
    start(): void {
      if (timer !== null || intervalMs <= 0) {
        return;
      }
      logger.info(`[tiering-worker] running every ${intervalMs / 60000} min`);
      timer = setInterval(() => {
        void tick();
      }, intervalMs);
      timer.unref();
    },

    async stop(): Promise<void> {
      if (timer !== null) {
        clearInterval(timer);
        timer = null;
      }
      if (current !== null) {
        await current;
      }
    },

    tick,
  };
}
