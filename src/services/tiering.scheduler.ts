/**
 * TieringScheduler Implementation
 *
 * Purpose: one tiering run = stream the catalog, ask the policy about each
 * record, and apply the resulting moves.
 * Dependencies: MetadataCatalog, TierStore, TieringPolicy, AccessTracker,
 * AuditService
 *
 * Each move is its own transaction:
 *   1. re-read the record; a version other than the evaluated one skips
 *   2. copy the blob from the source tier to the destination tier, after
 *      checking the source against the record's SHA-256
 *   3. read the copy back and check its SHA-256 against the record
 *   4. commit the tier in the catalog against the version we evaluated
 *   5. delete the source blob
 * A failure in 2-4 removes the destination copy and leaves the file where
 * it was. If another mover committed the same destination meanwhile, the
 * verified source bytes are written back instead. Until step 4 commits,
 * readers keep using the source blob.
 *
 * Failures are contained per file; only a listing failure fails the run.
 * Access events older than the promotion window are compacted after each
 * completed listing.
 */

import { nanoid } from 'nanoid';

import { computeChecksum } from '../lib/checksum.js';
import type {
  AuditEvent,
  FileRecord,
  MoveOutcome,
  Result,
  TieringDecision,
  TieringFailure,
  TieringRunResult,
  TieringSkip,
} from '../types/index.js';
import {
  success,
  failure,
  errorMessage,
  isAdjacent,
  isTieringError,
} from '../types/index.js';

import type { AccessTracker } from './access-tracker.service.js';
import type { AuditService } from './audit.service.js';
import type { MetadataCatalog } from './catalog.js';
import type { TierStore } from './tier-store.js';
import type { TieringPolicy } from './tiering.policy.js';

export const DEFAULT_TIERING_CONCURRENCY = 4;

export type TieringLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export interface RunOptions {
  runId?: string;
  signal?: AbortSignal;
  /** Request that triggered the run, copied to its audit entries */
  requestId?: string;
}

/**
 * TieringScheduler interface
 */
export interface TieringScheduler {
  runOnce(options?: RunOptions): Promise<Result<TieringRunResult>>;
  /** Runs the move transaction for one decision made on `record` */
  applyDecision(
    record: FileRecord,
    decision: TieringDecision,
    options?: { requestId?: string }
  ): Promise<MoveOutcome>;
}

function toAuditEvent(
  decision: TieringDecision,
  outcome: MoveOutcome,
  runId: string | null,
  requestId: string | undefined
): AuditEvent {
  const details: Record<string, unknown> = {
    fromTier: decision.fromTier,
    toTier: decision.toTier,
    reason: decision.reason,
    runId,
  };

  if (outcome.status === 'moved') {
    return {
      actorType: 'system',
      action: 'tiering:moved',
      resourceType: 'file',
      resourceId: decision.fileId,
      details,
      requestId,
    };
  }

  return {
    actorType: 'system',
    action:
      outcome.status === 'skipped' ? 'tiering:skipped' : 'tiering:failed',
    resourceType: 'file',
    resourceId: decision.fileId,
    details: {
      ...details,
      ...(outcome.status === 'skipped'
        ? { skipReason: outcome.reason }
        : { errorKind: outcome.errorKind, message: outcome.message }),
    },
    requestId,
  };
}

/**
 * Create TieringScheduler instance
 */
export function createTieringScheduler(deps: {
  catalog: MetadataCatalog;
  tierStore: TierStore;
  policy: TieringPolicy;
  tracker: Pick<AccessTracker, 'recentAccesses' | 'compact'>;
  auditService?: Pick<AuditService, 'log' | 'logBatch'>;
  clock?: () => Date;
  concurrency?: number;
  logger?: TieringLogger;
}): TieringScheduler {
  const { catalog, tierStore, policy, tracker, auditService } = deps;
  const clock = deps.clock ?? (() => new Date());
  const concurrency = Math.max(
    1,
    deps.concurrency ?? DEFAULT_TIERING_CONCURRENCY
  );
  const logger = deps.logger ?? console;

  // Files with a move in flight in this process. Overlapping runs skip
  // them instead of racing on the destination copy.
  const inFlight = new Set<string>();

  /**
   * Remove the destination copy. When the catalog already points at the
   * destination (another mover committed the same step), our write may
   * have replaced the live copy, so the verified source bytes go back in.
   */
  async function rollbackCopy(
    record: FileRecord,
    decision: TieringDecision,
    source: Uint8Array
  ): Promise<string> {
    const { fileId, toTier } = decision;
    try {
      const current = await catalog.get(fileId);
      if (current === null || current.tier !== toTier) {
        await tierStore.delete(toTier, fileId);
        return 'destination copy removed';
      }

      await tierStore.put(toTier, fileId, source);
      const restored = await tierStore.get(toTier, fileId);
      if (restored !== null && computeChecksum(restored) === record.checksum) {
        return 'destination restored, committed by another mover';
      }
      logger.error(
        `[tiering] live copy of ${fileId} in ${toTier} does not match its checksum after restore`
      );
      return 'destination restore failed verification';
    } catch (error) {
      logger.error(
        `[tiering] rollback of ${fileId} in ${toTier} failed:`,
        errorMessage(error)
      );
      return `rollback failed: ${errorMessage(error)}`;
    }
  }

  /**
   * Work out why the source blob is gone
   */
  async function missingSource(record: FileRecord): Promise<MoveOutcome> {
    const current = await catalog.get(record.id);
    if (current === null) {
      return { status: 'skipped', reason: 'NOT_FOUND' };
    }
    if (current.version !== record.version) {
      return { status: 'skipped', reason: 'CONFLICT' };
    }
    return {
      status: 'failed',
      errorKind: 'STORAGE_UNAVAILABLE',
      message: `Blob for ${record.id} missing from ${record.tier}`,
    };
  }

  async function moveFile(
    record: FileRecord,
    decision: TieringDecision,
    now: Date
  ): Promise<MoveOutcome> {
    const { fileId, fromTier, toTier } = decision;

    if (record.tier !== fromTier || !isAdjacent(fromTier, toTier)) {
      return {
        status: 'failed',
        errorKind: 'INTERNAL_ERROR',
        message: `Invalid move ${fromTier} -> ${toTier} for ${fileId} in ${record.tier}`,
      };
    }

    // 1. still the record we evaluated?
    let latest: FileRecord | null;
    try {
      latest = await catalog.get(fileId);
    } catch (error) {
      return {
        status: 'failed',
        errorKind: 'STORAGE_UNAVAILABLE',
        message: errorMessage(error),
      };
    }
    if (latest === null) {
      return { status: 'skipped', reason: 'NOT_FOUND' };
    }
    if (latest.version !== record.version) {
      return { status: 'skipped', reason: 'CONFLICT' };
    }

    // 2. copy
    let bytes: Uint8Array | null;
    try {
      bytes = await tierStore.get(fromTier, fileId);
    } catch (error) {
      return {
        status: 'failed',
        errorKind: 'STORAGE_UNAVAILABLE',
        message: errorMessage(error),
      };
    }
    if (bytes === null) {
      return missingSource(record);
    }
    if (computeChecksum(bytes) !== record.checksum) {
      return {
        status: 'failed',
        errorKind: 'VERIFICATION_FAILED',
        message: `Source copy of ${fileId} in ${fromTier} does not match its checksum`,
      };
    }
    const source = bytes;

    try {
      await tierStore.put(toTier, fileId, source);
    } catch (error) {
      const rollback = await rollbackCopy(record, decision, source);
      return {
        status: 'failed',
        errorKind: 'STORAGE_UNAVAILABLE',
        message: `${errorMessage(error)} (${rollback})`,
      };
    }

    // 3. verify
    let copy: Uint8Array | null;
    try {
      copy = await tierStore.get(toTier, fileId);
    } catch (error) {
      const rollback = await rollbackCopy(record, decision, source);
      return {
        status: 'failed',
        errorKind: 'STORAGE_UNAVAILABLE',
        message: `${errorMessage(error)} (${rollback})`,
      };
    }
    if (copy === null || computeChecksum(copy) !== record.checksum) {
      const rollback = await rollbackCopy(record, decision, source);
      return {
        status: 'failed',
        errorKind: 'VERIFICATION_FAILED',
        message: `Checksum mismatch for ${fileId} in ${toTier} (${rollback})`,
      };
    }

    // 4. commit
    let updated: FileRecord;
    try {
      updated = await catalog.updateTier(fileId, toTier, record.version, now);
    } catch (error) {
      const rollback = await rollbackCopy(record, decision, source);
      if (isTieringError(error, 'CONFLICT')) {
        return { status: 'skipped', reason: 'CONFLICT' };
      }
      if (isTieringError(error, 'NOT_FOUND')) {
        return { status: 'skipped', reason: 'NOT_FOUND' };
      }
      return {
        status: 'failed',
        errorKind: 'STORAGE_UNAVAILABLE',
        message: `${errorMessage(error)} (${rollback})`,
      };
    }

    // 5. delete source; the move is already committed
    try {
      await tierStore.delete(fromTier, fileId);
    } catch (error) {
      logger.warn(
        `[tiering] moved ${fileId} to ${toTier} but left an orphaned copy in ${fromTier}:`,
        errorMessage(error)
      );
    }

    return { status: 'moved', decision, record: updated };
  }

  async function guardedMove(
    record: FileRecord,
    decision: TieringDecision,
    now: Date
  ): Promise<MoveOutcome> {
    if (inFlight.has(record.id)) {
      return { status: 'skipped', reason: 'CONFLICT' };
    }
    inFlight.add(record.id);
    try {
      return await moveFile(record, decision, now);
    } catch (error) {
      return {
        status: 'failed',
        errorKind: 'INTERNAL_ERROR',
        message: errorMessage(error),
      };
    } finally {
      inFlight.delete(record.id);
    }
  }

  return {
    async runOnce(options?: RunOptions): Promise<Result<TieringRunResult>> {
      const runId = options?.runId ?? nanoid();
      const signal = options?.signal;
      const requestId = options?.requestId;
      const startedAt = clock();
      const windowMs = policy.config.promotionWindowMs;

      let filesEvaluated = 0;
      const movedFiles = new Set<string>();
      const moves: TieringDecision[] = [];
      const skipped: TieringSkip[] = [];
      const failures: TieringFailure[] = [];
      const auditEvents: AuditEvent[] = [];
      let listingError: unknown = null;

      /**
       * Decide for one record; the access count is only read when no
       * demotion applies and a promotion is possible.
       */
      async function evaluate(
        record: FileRecord
      ): Promise<Result<TieringDecision | null>> {
        const demoted = policy.demotion(record, startedAt);
        if (demoted !== null || record.tier === 'HOT') {
          return success(demoted);
        }
        const counted = await tracker.recentAccesses(record, windowMs, startedAt);
        if (!counted.success) {
          return counted;
        }
        return success(policy.decide(record, startedAt, counted.data));
      }

      /**
       * Apply the decision for one record, continuing an IDLE_COLD
       * demotion through WARM within the same run.
       */
      async function processRecord(record: FileRecord): Promise<void> {
        let current = record;
        const evaluated = await evaluate(current);
        if (!evaluated.success) {
          failures.push({
            fileId: current.id,
            errorKind: 'STORAGE_UNAVAILABLE',
            message: `Cannot count accesses of ${current.id}: ${evaluated.error.message}`,
          });
          return;
        }
        let decision = evaluated.data;

        while (decision !== null) {
          const outcome = await guardedMove(current, decision, startedAt);
          auditEvents.push(toAuditEvent(decision, outcome, runId, requestId));

          if (outcome.status === 'skipped') {
            skipped.push({ fileId: current.id, reason: outcome.reason });
            return;
          }
          if (outcome.status === 'failed') {
            failures.push({
              fileId: current.id,
              errorKind: outcome.errorKind,
              message: outcome.message,
            });
            return;
          }

          moves.push(outcome.decision);
          movedFiles.add(current.id);

          if (outcome.decision.reason !== 'IDLE_COLD') {
            return;
          }
          current = outcome.record;
          const next = policy.demotion(current, startedAt);
          decision = next?.reason === 'IDLE_COLD' ? next : null;
        }
      }

      const records = catalog.listAll()[Symbol.asyncIterator]();

      async function worker(): Promise<void> {
        for (;;) {
          if (signal?.aborted === true || listingError !== null) {
            return;
          }

          let next: IteratorResult<FileRecord>;
          try {
            next = await records.next();
          } catch (error) {
            listingError ??= error;
            return;
          }
          if (next.done === true) {
            return;
          }

          filesEvaluated++;
          await processRecord(next.value);
        }
      }

      await Promise.all(Array.from({ length: concurrency }, () => worker()));
      if (listingError === null && records.return !== undefined) {
        await records.return();
      }

      if (auditService !== undefined) {
        const logged = await auditService.logBatch(auditEvents);
        if (!logged.success) {
          logger.warn(`[tiering] run ${runId}: ${logged.error.message}`);
        }
      }

      if (listingError === null) {
        const compacted = await tracker.compact(
          new Date(startedAt.getTime() - windowMs)
        );
        if (!compacted.success) {
          logger.warn(
            `[tiering] run ${runId}: access events not compacted: ${compacted.error.message}`
          );
        }
      }

      const result: TieringRunResult = {
        runId,
        startedAt,
        finishedAt: clock(),
        filesEvaluated,
        filesMoved: movedFiles.size,
        moves,
        skipped,
        failures,
        cancelled: signal?.aborted === true,
      };

      if (listingError !== null) {
        logger.error(
          `[tiering] run ${runId} aborted: cannot list catalog:`,
          errorMessage(listingError)
        );
        return failure(
          'STORAGE_UNAVAILABLE',
          `Cannot list catalog: ${errorMessage(listingError)}`,
          {
            runId,
            filesEvaluated,
            filesMoved: result.filesMoved,
          }
        );
      }

      logger.info(
        `[tiering] run ${runId}: evaluated=${filesEvaluated} moved=${result.filesMoved} skipped=${skipped.length} failed=${failures.length}${result.cancelled ? ' (cancelled)' : ''}`
      );

      return success(result);
    },

    async applyDecision(
      record: FileRecord,
      decision: TieringDecision,
      options?: { requestId?: string }
    ): Promise<MoveOutcome> {
      const outcome = await guardedMove(record, decision, clock());

      if (auditService !== undefined) {
        const logged = await auditService.log(
          toAuditEvent(decision, outcome, null, options?.requestId)
        );
        if (!logged.success) {
          logger.warn(`[tiering] ${decision.fileId}: ${logged.error.message}`);
        }
      }

      return outcome;
    },
  };
}
