/**
 * File Domain Types
 *
 * SCOPE: File identity, placement and access history as owned by the
 * metadata catalog.
 *
 * Size bounds are configured (MIN_FILE_SIZE_BYTES / MAX_FILE_SIZE_BYTES)
 * and checked once at upload. A record's size never changes afterwards.
 */

import type { Tier } from './tier.js';

/**
 * Kind of access recorded against a file
 */
export type AccessKind = 'read' | 'write';

/**
 * Decayed access counter
 * score is the weighted number of accesses as of updatedAt, counted since
 * the file entered its current tier
 */
export interface AccessFrequency {
  score: number;
  updatedAt: Date;
}

/**
 * File record (catalog entity)
 */
export interface FileRecord {
  id: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  tier: Tier;
  checksum: string; // SHA-256 hex of the content
  createdAt: Date;
  tierChangedAt: Date;
  lastAccessedAt: Date;
  accessFrequency: AccessFrequency;
  version: number; // bumped on every access or tier change
}

/**
 * Append-only access fact
 */
export interface AccessEvent {
  fileId: string;
  timestamp: Date;
  kind: AccessKind;
}

/**
 * Parameters for uploading a file
 */
export interface UploadParams {
  sizeHint?: number;
  filename?: string;
  contentType?: string;
  requestId?: string;
}

/**
 * Request context passed down to the audit trail
 */
export interface RequestOptions {
  requestId?: string;
}

/**
 * Result of an upload
 */
export interface UploadResult {
  fileId: string;
  tier: Tier;
}

/**
 * Downloaded content with the metadata needed to serve it
 */
export interface DownloadedFile {
  bytes: Uint8Array;
  filename: string;
  contentType: string;
  etag: string;
  tier: Tier;
}

/**
 * Public view of a file record
 */
export interface FileView {
  fileId: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  tier: Tier;
  etag: string;
  createdAt: Date;
  lastAccessedAt: Date;
  accessScore: number;
}

/**
 * Per-tier aggregate
 */
export interface TierUsage {
  count: number;
  totalSize: number;
}

/**
 * Storage statistics across all tiers
 */
export interface StorageStats {
  totalFiles: number;
  totalSize: number;
  tiers: Record<Tier, TierUsage>;
}

/**
 * Accepted upload sizes, both ends inclusive
 */
export interface FileSizeBounds {
  minBytes: number;
  maxBytes: number;
}
