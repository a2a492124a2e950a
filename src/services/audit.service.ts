/**
 * AuditService Implementation
 *
 * Purpose: Immutable audit trail of uploads, deletes and tier moves.
 * Tiering decisions are persisted here and nowhere else.
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 */

import type {
  AuditEvent,
  AuditLog,
  AuditQueryParams,
  Result,
} from '../types/index.js';
import { success, failure, errorMessage } from '../types/index.js';

export const MAX_AUDIT_QUERY_LIMIT = 500;

/**
 * Log entry as written to storage
 */
export interface AuditLogEntry {
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
  insertLogsBatch: (entries: AuditLogEntry[]) => Promise<{ count: number }>;
  queryLogs: (params: AuditQueryParams) => Promise<AuditLog[]>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(event: AuditEvent): Promise<Result<void>>;
  logBatch(events: AuditEvent[]): Promise<Result<void>>;
  queryLogs(params: AuditQueryParams): Promise<Result<AuditLog[]>>;
}

/**
 * Build log entry from event
 */
function buildLogEntry(event: AuditEvent): AuditLogEntry {
  return {
    actorType: event.actorType,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    requestId: event.requestId ?? null,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(event));
        return success(undefined);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to write audit log: ${errorMessage(error)}`
        );
      }
    },

    /**
     * Log multiple events atomically
     * Used for the moves of one tiering run
     */
    async logBatch(events: AuditEvent[]): Promise<Result<void>> {
      if (events.length === 0) {
        return success(undefined);
      }
      try {
        await db.insertLogsBatch(events.map(buildLogEntry));
        return success(undefined);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to write batch audit logs: ${errorMessage(error)}`
        );
      }
    },

    /**
     * Query audit logs, newest first
     */
    async queryLogs(params: AuditQueryParams): Promise<Result<AuditLog[]>> {
      if (params.limit <= 0) {
        return failure('VALIDATION_ERROR', 'limit must be positive');
      }

      try {
        const logs = await db.queryLogs({
          ...params,
          limit: Math.min(params.limit, MAX_AUDIT_QUERY_LIMIT),
        });
        return success(logs);
      } catch (error) {
        return failure(
          'INTERNAL_ERROR',
          `Failed to query audit logs: ${errorMessage(error)}`
        );
      }
    },
  };
}
