/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type {
  AuditActorType,
  AuditLog,
  AuditQueryParams,
} from '../types/index.js';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

/**
 * Database row type
 */
interface AuditLogRow {
  id: string;
  timestamp: string;
  actor_type: string;
  action: string;
  resource_type: string;
  resource_id: string | null;
  details: Record<string, unknown>;
  request_id: string | null;
}

function toActorType(value: string): AuditActorType {
  return value === 'user' || value === 'admin' ? value : 'system';
}

/**
 * Map database row to AuditLog entity
 */
function mapRowToAuditLog(row: AuditLogRow): AuditLog {
  return {
    id: row.id,
    timestamp: new Date(row.timestamp),
    actorType: toActorType(row.actor_type),
    action: row.action,
    resourceType: row.resource_type,
    resourceId: row.resource_id,
    details: row.details,
    requestId: row.request_id,
  };
}

function mapEntryToRow(entry: AuditLogEntry): Omit<AuditLogRow, 'id' | 'timestamp'> {
  return {
    actor_type: entry.actorType,
    action: entry.action,
    resource_type: entry.resourceType,
    resource_id: entry.resourceId,
    details: entry.details,
    request_id: entry.requestId,
  };
}

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    /**
     * Insert a single audit log
     */
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert(mapEntryToRow(entry))
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      const row: Pick<AuditLogRow, 'id'> = data;
      return { id: row.id };
    },

    /**
     * Insert multiple audit logs atomically
     */
    async insertLogsBatch(
      entries: AuditLogEntry[]
    ): Promise<{ count: number }> {
      if (entries.length === 0) {
        return { count: 0 };
      }

      const { error, count } = await supabase
        .from('audit_logs')
        .insert(entries.map(mapEntryToRow), { count: 'exact' });

      if (error !== null) {
        throw new Error(`Failed to insert batch audit logs: ${error.message}`);
      }

      return { count: count ?? entries.length };
    },

    /**
     * Query audit logs with filters, newest first
     */
    async queryLogs(params: AuditQueryParams): Promise<AuditLog[]> {
      let query = supabase
        .from('audit_logs')
        .select('*')
        .order('timestamp', { ascending: false });

      if (params.action !== undefined) {
        query = query.eq('action', params.action);
      }
      if (params.resourceType !== undefined) {
        query = query.eq('resource_type', params.resourceType);
      }
      if (params.resourceId !== undefined) {
        query = query.eq('resource_id', params.resourceId);
      }
      if (params.since !== undefined) {
        query = query.gte('timestamp', params.since.toISOString());
      }

      const { data, error } = await query.limit(params.limit);

      if (error !== null) {
        throw new Error(`Failed to query audit logs: ${error.message}`);
      }

      const rows: AuditLogRow[] = data ?? [];
      return rows.map(mapRowToAuditLog);
    },
  };
}
