/**
 * Metadata Catalog
 *
 * Authoritative record of every file: identity, size, tier and access
 * history. Every mutation checks and increments the record's version;
 * callers that pass an expectedVersion get TieringError('CONFLICT') when
 * someone else wrote in between. There is no catalog-wide lock.
 *
 * Owns: file_records
 * Dependencies: None (leaf)
 */

import type { AccessKind, FileRecord, Tier } from '../types/index.js';

import { bumpFrequency, emptyFrequency } from './frequency.js';

export const DEFAULT_LIST_PAGE_SIZE = 100;

export interface CatalogAccess {
  timestamp: Date;
  kind: AccessKind;
}

export interface VersionCheck {
  expectedVersion?: number;
}

export interface CatalogListOptions {
  /** Resume after this fileId (exclusive) */
  after?: string;
  pageSize?: number;
}

export interface CatalogOptions {
  /** Mean lifetime of the decayed access counter */
  frequencyWindowMs: number;
}

/**
 * Catalog abstraction interface
 */
export interface MetadataCatalog {
  get: (fileId: string) => Promise<FileRecord | null>;
  /** Creates a record; CONFLICT if the id is taken */
  put: (record: FileRecord) => Promise<FileRecord>;
  /** Sets lastAccessedAt and bumps the frequency counter in one write */
  updateAccess: (
    fileId: string,
    access: CatalogAccess,
    check?: VersionCheck
  ) => Promise<FileRecord>;
  /** Moves the record to `tier` and restarts its frequency counter */
  updateTier: (
    fileId: string,
    tier: Tier,
    expectedVersion: number,
    changedAt: Date
  ) => Promise<FileRecord>;
  /** Removes the record and returns it as it was */
  delete: (fileId: string, check?: VersionCheck) => Promise<FileRecord>;
  /** Pages through records in id order; restartable with `after` */
  listAll: (options?: CatalogListOptions) => AsyncIterable<FileRecord>;
}

/**
 * Build a fresh HOT record for newly uploaded content
 */
export function createFileRecord(params: {
  id: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  checksum: string;
  now: Date;
}): FileRecord {
  return {
    id: params.id,
    filename: params.filename,
    contentType: params.contentType,
    sizeBytes: params.sizeBytes,
    tier: 'HOT',
    checksum: params.checksum,
    createdAt: params.now,
    tierChangedAt: params.now,
    lastAccessedAt: params.now,
    accessFrequency: emptyFrequency(params.now),
    version: 1,
  };
}

/**
 * Record state after a tier change
 * The access counter restarts so one burst of reads buys one promotion.
 */
export function applyTierChange(
  record: FileRecord,
  tier: Tier,
  changedAt: Date
): FileRecord {
  return {
    ...record,
    tier,
    tierChangedAt: changedAt,
    accessFrequency: emptyFrequency(changedAt),
    version: record.version + 1,
  };
}

/**
 * Record state after one access
 * lastAccessedAt never moves backwards.
 */
export function applyAccess(
  record: FileRecord,
  access: CatalogAccess,
  windowMs: number
): FileRecord {
  const lastAccessedAt =
    access.timestamp.getTime() > record.lastAccessedAt.getTime()
      ? access.timestamp
      : record.lastAccessedAt;

  return {
    ...record,
    lastAccessedAt,
    accessFrequency: bumpFrequency(
      record.accessFrequency,
      access.timestamp,
      windowMs
    ),
    version: record.version + 1,
  };
}
