/**
 * FileService Implementation
 *
 * SCOPE: Public file operations (upload, download, metadata, delete) and
 * the admin surface over tiering (promotion, runs, stats).
 * NOT IN SCOPE: Tier decisions (TieringPolicy) and moves (TieringScheduler)
 *
 * GUARDRAILS:
 * - Uploads outside the configured size bounds create nothing
 * - New content always lands in HOT, blob first, record second
 * - Delete removes record and blob together, or neither, then drops the
 *   file's access events
 * - Every download records a read through the AccessTracker
 * - Tier changes only happen through the scheduler's move transaction
 *
 * Dependencies: MetadataCatalog, TierStore, AccessTracker,
 * TieringScheduler, TieringRunService, AuditService
 */

import { nanoid } from 'nanoid';

import { computeChecksum } from '../lib/checksum.js';
import type {
  AuditEvent,
  DownloadedFile,
  FileRecord,
  FileSizeBounds,
  FileView,
  RequestOptions,
  Result,
  StorageStats,
  Tier,
  TieringRunHandle,
  TieringTrigger,
  UploadParams,
  UploadResult,
} from '../types/index.js';
import {
  success,
  failure,
  failureFromError,
  errorMessage,
  isTieringError,
  warmer,
} from '../types/index.js';

import type { AccessTracker } from './access-tracker.service.js';
import type { AuditService } from './audit.service.js';
import type { MetadataCatalog } from './catalog.js';
import { createFileRecord } from './catalog.js';
import { frequencyAt } from './frequency.js';
import type { TierStore } from './tier-store.js';
import type { TieringRunService } from './tiering-runs.service.js';
import type { TieringLogger, TieringScheduler } from './tiering.scheduler.js';

export const DEFAULT_CONTENT_TYPE = 'application/octet-stream';

/**
 * FileService interface
 */
export interface FileService {
  upload(bytes: Uint8Array, params?: UploadParams): Promise<Result<UploadResult>>;
  download(fileId: string): Promise<Result<DownloadedFile>>;
  getMetadata(fileId: string): Promise<Result<FileView>>;
  delete(fileId: string, options?: RequestOptions): Promise<Result<void>>;
  /** Moves the file one tier toward HOT */
  promote(fileId: string, options?: RequestOptions): Promise<Result<FileView>>;
  triggerTiering(
    options?: { async?: boolean } & RequestOptions
  ): Promise<Result<TieringTrigger>>;
  getTieringRun(runId: string): Promise<Result<TieringRunHandle>>;
  cancelTieringRun(runId: string): Promise<Result<TieringRunHandle>>;
  getStats(): Promise<Result<StorageStats>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function formatBytes(bytes: number): string {
  const mib = bytes / (1024 * 1024);
  return mib >= 1 ? `${mib.toFixed(2)} MiB` : `${bytes} bytes`;
}

function emptyStats(): StorageStats {
  return {
    totalFiles: 0,
    totalSize: 0,
    tiers: {
      HOT: { count: 0, totalSize: 0 },
      WARM: { count: 0, totalSize: 0 },
      COLD: { count: 0, totalSize: 0 },
    },
  };
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create FileService instance
 */
export function createFileService(deps: {
  catalog: MetadataCatalog;
  tierStore: TierStore;
  tracker: AccessTracker;
  scheduler: TieringScheduler;
  runs: TieringRunService;
  sizeBounds: FileSizeBounds;
  /** Mean lifetime of the access counter, used for the reported score */
  frequencyWindowMs: number;
  auditService?: Pick<AuditService, 'log'>;
  clock?: () => Date;
  logger?: TieringLogger;
}): FileService {
  const {
    catalog,
    tierStore,
    tracker,
    scheduler,
    runs,
    sizeBounds,
    frequencyWindowMs,
    auditService,
  } = deps;
  const clock = deps.clock ?? (() => new Date());
  const logger = deps.logger ?? console;

  function toView(record: FileRecord): FileView {
    return {
      fileId: record.id,
      filename: record.filename,
      contentType: record.contentType,
      sizeBytes: record.sizeBytes,
      tier: record.tier,
      etag: record.checksum,
      createdAt: record.createdAt,
      lastAccessedAt: record.lastAccessedAt,
      accessScore: frequencyAt(
        record.accessFrequency,
        clock(),
        frequencyWindowMs
      ),
    };
  }

  async function audit(event: AuditEvent): Promise<void> {
    if (auditService === undefined) {
      return;
    }
    const logged = await auditService.log(event);
    if (!logged.success) {
      logger.warn(`[files] ${event.action}: ${logged.error.message}`);
    }
  }

  /**
   * Fetch the blob for a record, following one tier move that committed
   * after the record was read.
   */
  async function readBlob(
    record: FileRecord
  ): Promise<Result<{ bytes: Uint8Array; tier: Tier }>> {
    const bytes = await tierStore.get(record.tier, record.id);
    if (bytes !== null) {
      return success({ bytes, tier: record.tier });
    }

    const moved = await catalog.get(record.id);
    if (moved === null) {
      return failure('NOT_FOUND', `File ${record.id} not found`);
    }
    const retried = await tierStore.get(moved.tier, record.id);
    if (retried === null) {
      return failure(
        'STORAGE_UNAVAILABLE',
        `Content of ${record.id} is missing from ${moved.tier}`
      );
    }
    return success({ bytes: retried, tier: moved.tier });
  }

  /**
   * Record a read against the version that was served. A move or another
   * reader may have bumped the version meanwhile; retry once on the fresh
   * record, then give up on the access without failing the download.
   */
  async function recordRead(record: FileRecord, at: Date): Promise<Result<void>> {
    const first = await tracker.record(record.id, 'read', at, {
      expectedVersion: record.version,
    });
    if (first.success) {
      return success(undefined);
    }
    if (first.error.code === 'NOT_FOUND') {
      logger.warn(`[files] ${record.id} was deleted while being downloaded`);
      return success(undefined);
    }
    if (first.error.code !== 'CONFLICT') {
      return first;
    }

    const fresh = await catalog.get(record.id);
    if (fresh === null) {
      return success(undefined);
    }
    const second = await tracker.record(record.id, 'read', at, {
      expectedVersion: fresh.version,
    });
    if (!second.success) {
      if (second.error.code !== 'CONFLICT' && second.error.code !== 'NOT_FOUND') {
        return second;
      }
      logger.warn(
        `[files] read of ${record.id} not recorded: ${second.error.message}`
      );
    }
    return success(undefined);
  }

  async function removeRecord(fileId: string): Promise<FileRecord | null> {
    const record = await catalog.get(fileId);
    if (record === null) {
      return null;
    }
    try {
      return await catalog.delete(fileId, { expectedVersion: record.version });
    } catch (error) {
      if (!isTieringError(error, 'CONFLICT')) {
        throw error;
      }
    }

    // one retry against the latest version
    const fresh = await catalog.get(fileId);
    if (fresh === null) {
      return null;
    }
    return catalog.delete(fileId, { expectedVersion: fresh.version });
  }

  return {
    /**
     * Store new content in HOT
     */
    async upload(
      bytes: Uint8Array,
      params: UploadParams = {}
    ): Promise<Result<UploadResult>> {
      const size = bytes.byteLength;
      if (params.sizeHint !== undefined && params.sizeHint !== size) {
        return failure(
          'VALIDATION_ERROR',
          `sizeHint ${params.sizeHint} does not match content length ${size}`
        );
      }
      if (size < sizeBounds.minBytes || size > sizeBounds.maxBytes) {
        return failure(
          'SIZE_OUT_OF_RANGE',
          `File size ${formatBytes(size)} is outside ${formatBytes(sizeBounds.minBytes)} - ${formatBytes(sizeBounds.maxBytes)}`,
          {
            sizeBytes: size,
            minBytes: sizeBounds.minBytes,
            maxBytes: sizeBounds.maxBytes,
          }
        );
      }

      const fileId = nanoid();
      const record = createFileRecord({
        id: fileId,
        filename:
          params.filename !== undefined && params.filename.trim() !== ''
            ? params.filename
            : fileId,
        contentType: params.contentType ?? DEFAULT_CONTENT_TYPE,
        sizeBytes: size,
        checksum: computeChecksum(bytes),
        now: clock(),
      });

      try {
        await tierStore.put('HOT', fileId, bytes);
      } catch (error) {
        return failureFromError(error);
      }

      try {
        await catalog.put(record);
      } catch (error) {
        try {
          await tierStore.delete('HOT', fileId);
        } catch (cleanupError) {
          logger.error(
            `[files] orphaned blob ${fileId} in HOT after failed upload:`,
            errorMessage(cleanupError)
          );
        }
        return failureFromError(error);
      }

      await audit({
        actorType: 'user',
        action: 'file:uploaded',
        resourceType: 'file',
        resourceId: fileId,
        details: {
          filename: record.filename,
          sizeBytes: size,
          tier: record.tier,
        },
        requestId: params.requestId,
      });

      return success({ fileId, tier: record.tier });
    },

    /**
     * Return the content and record a read
     */
    async download(fileId: string): Promise<Result<DownloadedFile>> {
      try {
        const record = await catalog.get(fileId);
        if (record === null) {
          return failure('NOT_FOUND', `File ${fileId} not found`);
        }

        const blob = await readBlob(record);
        if (!blob.success) {
          return blob;
        }

        const recorded = await recordRead(record, clock());
        if (!recorded.success) {
          return recorded;
        }

        return success({
          bytes: blob.data.bytes,
          filename: record.filename,
          contentType: record.contentType,
          etag: record.checksum,
          tier: blob.data.tier,
        });
      } catch (error) {
        return failureFromError(error);
      }
    },

    async getMetadata(fileId: string): Promise<Result<FileView>> {
      try {
        const record = await catalog.get(fileId);
        if (record === null) {
          return failure('NOT_FOUND', `File ${fileId} not found`);
        }
        return success(toView(record));
      } catch (error) {
        return failureFromError(error);
      }
    },

    /**
     * Remove the record, then the blob. The record is put back when the
     * blob cannot be deleted.
     */
    async delete(
      fileId: string,
      options: RequestOptions = {}
    ): Promise<Result<void>> {
      let removed: FileRecord | null;
      try {
        removed = await removeRecord(fileId);
      } catch (error) {
        return failureFromError(error);
      }
      if (removed === null) {
        return failure('NOT_FOUND', `File ${fileId} not found`);
      }

      try {
        await tierStore.delete(removed.tier, fileId);
      } catch (error) {
        try {
          await catalog.put(removed);
        } catch (restoreError) {
          logger.error(
            `[files] could not restore record ${fileId} after failed blob delete:`,
            errorMessage(restoreError)
          );
        }
        return failure(
          'STORAGE_UNAVAILABLE',
          `Failed to delete content of ${fileId}: ${errorMessage(error)}`
        );
      }

      await audit({
        actorType: 'user',
        action: 'file:deleted',
        resourceType: 'file',
        resourceId: fileId,
        details: { tier: removed.tier, sizeBytes: removed.sizeBytes },
        requestId: options.requestId,
      });

      const forgotten = await tracker.forget(fileId);
      if (!forgotten.success) {
        logger.warn(
          `[files] access events of deleted ${fileId} kept: ${forgotten.error.message}`
        );
      }

      return success(undefined);
    },

    async promote(
      fileId: string,
      options: RequestOptions = {}
    ): Promise<Result<FileView>> {
      let record: FileRecord | null;
      try {
        record = await catalog.get(fileId);
      } catch (error) {
        return failureFromError(error);
      }
      if (record === null) {
        return failure('NOT_FOUND', `File ${fileId} not found`);
      }

      const toTier = warmer(record.tier);
      if (toTier === null) {
        return failure('VALIDATION_ERROR', `File ${fileId} is already HOT`);
      }

      const outcome = await scheduler.applyDecision(
        record,
        {
          fileId,
          fromTier: record.tier,
          toTier,
          reason: 'MANUAL_PROMOTION',
        },
        { requestId: options.requestId }
      );

      switch (outcome.status) {
        case 'moved':
          return success(toView(outcome.record));
        case 'skipped':
          return outcome.reason === 'NOT_FOUND'
            ? failure('NOT_FOUND', `File ${fileId} not found`)
            : failure(
                'CONFLICT',
                `File ${fileId} changed during promotion, try again`
              );
        case 'failed':
          return failure(outcome.errorKind, outcome.message);
      }
    },

    async triggerTiering(
      options: { async?: boolean } & RequestOptions = {}
    ): Promise<Result<TieringTrigger>> {
      const { requestId } = options;
      if (options.async === true) {
        const started = await runs.start({ requestId });
        return started.success
          ? success({ mode: 'async', run: started.data })
          : started;
      }

      const finished = await runs.run({ requestId });
      return finished.success
        ? success({ mode: 'sync', result: finished.data })
        : finished;
    },

    getTieringRun(runId: string): Promise<Result<TieringRunHandle>> {
      return runs.get(runId);
    },

    cancelTieringRun(runId: string): Promise<Result<TieringRunHandle>> {
      return runs.cancel(runId);
    },

    /**
     * Aggregate counts and sizes per tier over the whole catalog
     */
    async getStats(): Promise<Result<StorageStats>> {
      const stats = emptyStats();
      try {
        for await (const record of catalog.listAll()) {
          stats.totalFiles++;
          stats.totalSize += record.sizeBytes;
          stats.tiers[record.tier].count++;
          stats.tiers[record.tier].totalSize += record.sizeBytes;
        }
      } catch (error) {
        return failureFromError(error);
      }
      return success(stats);
    },
  };
}
