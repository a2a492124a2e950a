/**
 * Audit Types
 * Types for the AuditService
 */

/**
 * Who caused the audited action
 */
export type AuditActorType = 'user' | 'admin' | 'system';

/**
 * Event to be logged to the audit system
 * Used as input to AuditService.log()
 */
export interface AuditEvent {
  actorType: AuditActorType;
  action: string; // e.g., 'file:uploaded', 'tiering:moved'
  resourceType: string; // e.g., 'file', 'tiering_run'
  resourceId?: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

/**
 * Stored audit log record
 */
export interface AuditLog {
  id: string;
  timestamp: Date;
  actorType: AuditActorType;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  requestId: string | null;
}

/**
 * Parameters for querying audit logs
 */
export interface AuditQueryParams {
  action?: string;
  resourceType?: string;
  resourceId?: string;
  since?: Date;
  limit: number;
}
