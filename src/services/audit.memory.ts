/**
 * In-memory AuditServiceDb
 */

import { nanoid } from 'nanoid';

import type {
  AuditActorType,
  AuditLog,
  AuditQueryParams,
} from '../types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

function toActorType(value: string): AuditActorType {
  return value === 'user' || value === 'admin' ? value : 'system';
}

export function createInMemoryAuditServiceDb(
  clock: () => Date = () => new Date()
): AuditServiceDb {
  const logs: AuditLog[] = [];

  function append(entry: AuditLogEntry): AuditLog {
    const log: AuditLog = {
      id: nanoid(),
      timestamp: clock(),
      actorType: toActorType(entry.actorType),
      action: entry.action,
      resourceType: entry.resourceType,
      resourceId: entry.resourceId,
      details: entry.details,
      requestId: entry.requestId,
    };
    logs.push(log);
    return log;
  }

  return {
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      return { id: append(entry).id };
    },

    async insertLogsBatch(
      entries: AuditLogEntry[]
    ): Promise<{ count: number }> {
      entries.forEach(append);
      return { count: entries.length };
    },

    async queryLogs(params: AuditQueryParams): Promise<AuditLog[]> {
      return logs
        .filter(
          (log) =>
            (params.action === undefined || log.action === params.action) &&
            (params.resourceType === undefined ||
              log.resourceType === params.resourceType) &&
            (params.resourceId === undefined ||
              log.resourceId === params.resourceId) &&
            (params.since === undefined ||
              log.timestamp.getTime() >= params.since.getTime())
        )
        .reverse()
        .slice(0, params.limit);
    },
  };
}
