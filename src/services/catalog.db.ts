/**
 * Metadata Catalog Database Adapter
 * Implements MetadataCatalog using Supabase
 *
 * Optimistic concurrency is a compare-and-set on the version column:
 * every update filters on `version = expected` and an empty result means
 * someone else wrote first (or the row is gone).
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { FileRecord, Tier } from '../types/index.js';
import { TieringError, isTier } from '../types/index.js';

import type {
  CatalogAccess,
  CatalogListOptions,
  CatalogOptions,
  MetadataCatalog,
  VersionCheck,
} from './catalog.js';
import { DEFAULT_LIST_PAGE_SIZE, applyAccess } from './catalog.js';

const TABLE = 'file_records';
const UNIQUE_VIOLATION = '23505';
const MAX_ACCESS_ATTEMPTS = 5;

/**
 * Database row types
 */
interface FileRecordRow {
  id: string;
  filename: string;
  content_type: string;
  size_bytes: number;
  tier: string;
  checksum: string;
  created_at: string;
  tier_changed_at: string;
  last_accessed_at: string;
  access_score: number;
  access_updated_at: string;
  version: number;
}

/**
 * Map database row to FileRecord entity
 */
function mapRowToRecord(row: FileRecordRow): FileRecord {
  const tier = row.tier;
  if (!isTier(tier)) {
    throw new TieringError(
      'INTERNAL_ERROR',
      `File ${row.id} has unknown tier ${tier}`
    );
  }
  return {
    id: row.id,
    filename: row.filename,
    contentType: row.content_type,
    sizeBytes: row.size_bytes,
    tier,
    checksum: row.checksum,
    createdAt: new Date(row.created_at),
    tierChangedAt: new Date(row.tier_changed_at),
    lastAccessedAt: new Date(row.last_accessed_at),
    accessFrequency: {
      score: row.access_score,
      updatedAt: new Date(row.access_updated_at),
    },
    version: row.version,
  };
}

function mapRecordToRow(record: FileRecord): FileRecordRow {
  return {
    id: record.id,
    filename: record.filename,
    content_type: record.contentType,
    size_bytes: record.sizeBytes,
    tier: record.tier,
    checksum: record.checksum,
    created_at: record.createdAt.toISOString(),
    tier_changed_at: record.tierChangedAt.toISOString(),
    last_accessed_at: record.lastAccessedAt.toISOString(),
    access_score: record.accessFrequency.score,
    access_updated_at: record.accessFrequency.updatedAt.toISOString(),
    version: record.version,
  };
}

function unavailable(action: string, message: string): TieringError {
  return new TieringError(
    'STORAGE_UNAVAILABLE',
    `Failed to ${action}: ${message}`
  );
}

/**
 * Create MetadataCatalog implementation using Supabase
 */
export function createSupabaseCatalog(
  supabase: SupabaseClient,
  options: CatalogOptions
): MetadataCatalog {
  async function fetchRecord(fileId: string): Promise<FileRecord | null> {
    const { data, error } = await supabase
      .from(TABLE)
      .select('*')
      .eq('id', fileId)
      .maybeSingle();

    if (error !== null) {
      throw unavailable('get file record', error.message);
    }

    const row: FileRecordRow | null = data;
    return row === null ? null : mapRowToRecord(row);
  }

  /**
   * Explain why a compare-and-set matched no row
   */
  async function missedWrite(
    fileId: string,
    expectedVersion: number
  ): Promise<TieringError> {
    const record = await fetchRecord(fileId);
    if (record === null) {
      return new TieringError('NOT_FOUND', `File ${fileId} not found`);
    }
    return new TieringError(
      'CONFLICT',
      `File ${fileId} is at version ${record.version}, expected ${expectedVersion}`
    );
  }

  async function compareAndSet(
    fileId: string,
    expectedVersion: number,
    changes: Partial<FileRecordRow>
  ): Promise<FileRecord> {
    const { data, error } = await supabase
      .from(TABLE)
      .update(changes)
      .eq('id', fileId)
      .eq('version', expectedVersion)
      .select('*')
      .maybeSingle();

    if (error !== null) {
      throw unavailable('update file record', error.message);
    }

    const row: FileRecordRow | null = data;
    if (row === null) {
      throw await missedWrite(fileId, expectedVersion);
    }
    return mapRowToRecord(row);
  }

  async function requireRecord(
    fileId: string,
    check?: VersionCheck
  ): Promise<FileRecord> {
    const record = await fetchRecord(fileId);
    if (record === null) {
      throw new TieringError('NOT_FOUND', `File ${fileId} not found`);
    }
    if (
      check?.expectedVersion !== undefined &&
      record.version !== check.expectedVersion
    ) {
      throw new TieringError(
        'CONFLICT',
        `File ${fileId} is at version ${record.version}, expected ${check.expectedVersion}`
      );
    }
    return record;
  }

  return {
    get: fetchRecord,

    async put(record: FileRecord): Promise<FileRecord> {
      const { data, error } = await supabase
        .from(TABLE)
        .insert(mapRecordToRow(record))
        .select('*')
        .single();

      if (error !== null) {
        if (error.code === UNIQUE_VIOLATION) {
          throw new TieringError(
            'CONFLICT',
            `File ${record.id} already exists`
          );
        }
        throw unavailable('create file record', error.message);
      }

      const row: FileRecordRow = data;
      return mapRowToRecord(row);
    },

    async updateAccess(
      fileId: string,
      access: CatalogAccess,
      check?: VersionCheck
    ): Promise<FileRecord> {
      // Without an expected version, retry the read-modify-write until it
      // lands on an unchanged row.
      const attempts =
        check?.expectedVersion === undefined ? MAX_ACCESS_ATTEMPTS : 1;

      let lastError: TieringError | null = null;
      for (let attempt = 0; attempt < attempts; attempt++) {
        const record = await requireRecord(fileId, check);
        const next = applyAccess(record, access, options.frequencyWindowMs);
        try {
          return await compareAndSet(fileId, record.version, {
            last_accessed_at: next.lastAccessedAt.toISOString(),
            access_score: next.accessFrequency.score,
            access_updated_at: next.accessFrequency.updatedAt.toISOString(),
            version: next.version,
          });
        } catch (error) {
          if (!(error instanceof TieringError) || error.code !== 'CONFLICT') {
            throw error;
          }
          lastError = error;
        }
      }

      throw (
        lastError ??
        new TieringError('CONFLICT', `File ${fileId} changed during update`)
      );
    },

    async updateTier(
      fileId: string,
      tier: Tier,
      expectedVersion: number,
      changedAt: Date
    ): Promise<FileRecord> {
      return compareAndSet(fileId, expectedVersion, {
        tier,
        tier_changed_at: changedAt.toISOString(),
        access_score: 0,
        access_updated_at: changedAt.toISOString(),
        version: expectedVersion + 1,
      });
    },

    async delete(fileId: string, check?: VersionCheck): Promise<FileRecord> {
      const record = await requireRecord(fileId, check);

      const { data, error } = await supabase
        .from(TABLE)
        .delete()
        .eq('id', fileId)
        .eq('version', record.version)
        .select('*')
        .maybeSingle();

      if (error !== null) {
        throw unavailable('delete file record', error.message);
      }

      const row: FileRecordRow | null = data;
      if (row === null) {
        throw await missedWrite(fileId, record.version);
      }
      return mapRowToRecord(row);
    },

    async *listAll(
      listOptions?: CatalogListOptions
    ): AsyncIterable<FileRecord> {
      const pageSize = listOptions?.pageSize ?? DEFAULT_LIST_PAGE_SIZE;
      let cursor = listOptions?.after;

      for (;;) {
        let query = supabase
          .from(TABLE)
          .select('*')
          .order('id', { ascending: true })
          .limit(pageSize);

        if (cursor !== undefined) {
          query = query.gt('id', cursor);
        }

        const { data, error } = await query;

        if (error !== null) {
          throw unavailable('list file records', error.message);
        }

        const rows: FileRecordRow[] = data;
        for (const row of rows) {
          yield mapRowToRecord(row);
        }

        const last = rows[rows.length - 1];
        if (rows.length < pageSize || last === undefined) {
          return;
        }
        cursor = last.id;
      }
    },
  };
}
