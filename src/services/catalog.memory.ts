/**
 * In-memory Metadata Catalog
 *
 * Reads return copies, so a caller holding a record never sees later
 * writes and the catalog never sees the caller's edits. Ids are also kept
 * in a sorted array so each listing page is a binary search and a slice.
 */

import type { FileRecord, Tier } from '../types/index.js';
import { TieringError } from '../types/index.js';

import type {
  CatalogAccess,
  CatalogListOptions,
  CatalogOptions,
  MetadataCatalog,
  VersionCheck,
} from './catalog.js';
import {
  DEFAULT_LIST_PAGE_SIZE,
  applyAccess,
  applyTierChange,
} from './catalog.js';

function copy(record: FileRecord): FileRecord {
  return structuredClone(record);
}

/**
 * Index of the first id greater than `after`
 */
function firstAfter(ids: string[], after: string): number {
  let low = 0;
  let high = ids.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    const id = ids[mid];
    if (id !== undefined && id <= after) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return low;
}

export function createInMemoryCatalog(options: CatalogOptions): MetadataCatalog {
  const records = new Map<string, FileRecord>();
  const sortedIds: string[] = [];

  function current(fileId: string, check?: VersionCheck): FileRecord {
    const record = records.get(fileId);
    if (record === undefined) {
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
    async get(fileId: string): Promise<FileRecord | null> {
      const record = records.get(fileId);
      return record === undefined ? null : copy(record);
    },

    async put(record: FileRecord): Promise<FileRecord> {
      if (records.has(record.id)) {
        throw new TieringError('CONFLICT', `File ${record.id} already exists`);
      }
      records.set(record.id, copy(record));
      sortedIds.splice(firstAfter(sortedIds, record.id), 0, record.id);
      return copy(record);
    },

    async updateAccess(
      fileId: string,
      access: CatalogAccess,
      check?: VersionCheck
    ): Promise<FileRecord> {
      const next = applyAccess(
        current(fileId, check),
        access,
        options.frequencyWindowMs
      );
      records.set(fileId, next);
      return copy(next);
    },

    async updateTier(
      fileId: string,
      tier: Tier,
      expectedVersion: number,
      changedAt: Date
    ): Promise<FileRecord> {
      const next = applyTierChange(
        current(fileId, { expectedVersion }),
        tier,
        changedAt
      );
      records.set(fileId, next);
      return copy(next);
    },

    async delete(fileId: string, check?: VersionCheck): Promise<FileRecord> {
      const record = current(fileId, check);
      records.delete(fileId);
      // the id is present, so it sits just before its upper bound
      sortedIds.splice(firstAfter(sortedIds, fileId) - 1, 1);
      return copy(record);
    },

    async *listAll(
      listOptions?: CatalogListOptions
    ): AsyncIterable<FileRecord> {
      const pageSize = listOptions?.pageSize ?? DEFAULT_LIST_PAGE_SIZE;
      let cursor = listOptions?.after;

      for (;;) {
        const start = cursor === undefined ? 0 : firstAfter(sortedIds, cursor);
        const page = sortedIds.slice(start, start + pageSize);

        for (const id of page) {
          const record = records.get(id);
          // deleted since the page was taken
          if (record !== undefined) {
            yield copy(record);
          }
        }

        const last = page[page.length - 1];
        if (page.length < pageSize || last === undefined) {
          return;
        }
        cursor = last;
      }
    },
  };
}
