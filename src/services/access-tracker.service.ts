/**
 * AccessTracker Implementation
 *
 * Purpose: record reads and writes and expose recency / frequency signals.
 * Owns: access_events
 * Dependencies: MetadataCatalog
 *
 * The record's lastAccessedAt and frequency counter change in a single
 * catalog write, so the policy never sees one without the other. The
 * event itself is appended to the log after that write; a failed append
 * is logged and the access still counts as recorded.
 */

import type {
  AccessEvent,
  AccessKind,
  FileRecord,
  Result,
} from '../types/index.js';
import {
  success,
  failure,
  failureFromError,
  errorMessage,
} from '../types/index.js';

import type { MetadataCatalog, VersionCheck } from './catalog.js';
import type { TieringLogger } from './tiering.scheduler.js';

/**
 * Event log abstraction interface
 */
export interface AccessEventLog {
  append: (event: AccessEvent) => Promise<void>;
  /** Number of events for fileId with from <= timestamp <= to */
  countBetween: (fileId: string, from: Date, to: Date) => Promise<number>;
  /** Drops events older than `before`; returns how many were removed */
  compact: (before: Date) => Promise<number>;
  /** Drops every event of one file; returns how many were removed */
  deleteFor: (fileId: string) => Promise<number>;
}

/**
 * AccessTracker interface
 */
export interface AccessTracker {
  record(
    fileId: string,
    kind: AccessKind,
    timestamp: Date,
    check?: VersionCheck
  ): Promise<Result<FileRecord>>;
  frequencySince(
    fileId: string,
    windowMs: number,
    now?: Date
  ): Promise<Result<number>>;
  /**
   * Accesses within `windowMs` before `now` made after the record entered
   * its current tier
   */
  recentAccesses(
    record: FileRecord,
    windowMs: number,
    now: Date
  ): Promise<Result<number>>;
  compact(before: Date): Promise<Result<number>>;
  forget(fileId: string): Promise<Result<number>>;
}

/**
 * Create AccessTracker instance
 */
export function createAccessTracker(deps: {
  catalog: MetadataCatalog;
  events: AccessEventLog;
  clock?: () => Date;
  logger?: TieringLogger;
}): AccessTracker {
  const { catalog, events } = deps;
  const clock = deps.clock ?? (() => new Date());
  const logger = deps.logger ?? console;

  return {
    async record(
      fileId: string,
      kind: AccessKind,
      timestamp: Date,
      check?: VersionCheck
    ): Promise<Result<FileRecord>> {
      let updated: FileRecord;
      try {
        updated = await catalog.updateAccess(fileId, { timestamp, kind }, check);
      } catch (error) {
        return failureFromError(error);
      }

      try {
        await events.append({ fileId, timestamp, kind });
      } catch (error) {
        logger.warn(
          `[access] ${kind} of ${fileId} missing from the event log:`,
          errorMessage(error)
        );
      }
      return success(updated);
    },

    async frequencySince(
      fileId: string,
      windowMs: number,
      now?: Date
    ): Promise<Result<number>> {
      if (windowMs < 0) {
        return failure('VALIDATION_ERROR', 'window must not be negative');
      }

      const to = now ?? clock();
      const from = new Date(to.getTime() - windowMs);
      try {
        return success(await events.countBetween(fileId, from, to));
      } catch (error) {
        return failureFromError(error);
      }
    },

    async recentAccesses(
      record: FileRecord,
      windowMs: number,
      now: Date
    ): Promise<Result<number>> {
      if (windowMs < 0) {
        return failure('VALIDATION_ERROR', 'window must not be negative');
      }

      // accesses at the instant of the tier change belong to the old tier
      const from = Math.max(
        now.getTime() - windowMs,
        record.tierChangedAt.getTime() + 1
      );
      if (from > now.getTime()) {
        return success(0);
      }
      try {
        return success(await events.countBetween(record.id, new Date(from), now));
      } catch (error) {
        return failureFromError(error);
      }
    },

    async compact(before: Date): Promise<Result<number>> {
      try {
        return success(await events.compact(before));
      } catch (error) {
        return failureFromError(error);
      }
    },

    async forget(fileId: string): Promise<Result<number>> {
      try {
        return success(await events.deleteFor(fileId));
      } catch (error) {
        return failureFromError(error);
      }
    },
  };
}
