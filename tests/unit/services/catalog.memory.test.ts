/**
 * In-memory MetadataCatalog Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { MetadataCatalog } from '@/services/catalog.js';
import { createInMemoryCatalog } from '@/services/catalog.memory.js';
import type { FileRecord } from '@/types/index.js';
import { DAY_MS, TieringError } from '@/types/index.js';

import { T0, createTestRecord, daysAfter } from '../../helpers/test-utils.js';

const WINDOW = 7 * DAY_MS;

async function collect(iterable: AsyncIterable<FileRecord>): Promise<string[]> {
  const ids: string[] = [];
  for await (const record of iterable) {
    ids.push(record.id);
  }
  return ids;
}

describe('InMemoryCatalog', () => {
  let catalog: MetadataCatalog;

  beforeEach(() => {
    catalog = createInMemoryCatalog({ frequencyWindowMs: WINDOW });
  });

  describe('put / get', () => {
    it('should store and return a copy of the record', async () => {
      const record = createTestRecord({ id: 'a' });
      await catalog.put(record);

      const loaded = await catalog.get('a');
      expect(loaded).toEqual(record);
      expect(loaded).not.toBe(record);
    });

    it('should return null for unknown ids', async () => {
      expect(await catalog.get('missing')).toBeNull();
    });

    it('should reject a second put with the same id', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));

      await expect(catalog.put(createTestRecord({ id: 'a' }))).rejects.toMatchObject({
        code: 'CONFLICT',
      });
    });

    it('should not see edits made to a returned record', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));
      const loaded = await catalog.get('a');
      if (loaded === null) {
        throw new Error('expected record');
      }
      loaded.tier = 'COLD';

      expect((await catalog.get('a'))?.tier).toBe('HOT');
    });
  });

  describe('updateAccess', () => {
    it('should set lastAccessedAt, bump the counter and the version', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));
      const at = daysAfter(T0, 1);

      const updated = await catalog.updateAccess('a', {
        timestamp: at,
        kind: 'read',
      });

      expect(updated.lastAccessedAt).toEqual(at);
      expect(updated.accessFrequency).toEqual({ score: 1, updatedAt: at });
      expect(updated.version).toBe(2);
    });

    it('should never move lastAccessedAt backwards', async () => {
      await catalog.put(createTestRecord({ id: 'a', lastAccessedAt: daysAfter(T0, 5) }));

      const updated = await catalog.updateAccess('a', {
        timestamp: daysAfter(T0, 2),
        kind: 'read',
      });

      expect(updated.lastAccessedAt).toEqual(daysAfter(T0, 5));
      expect(updated.version).toBe(2);
    });

    it('should fail with CONFLICT on a stale expectedVersion', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));

      await expect(
        catalog.updateAccess('a', { timestamp: T0, kind: 'read' }, { expectedVersion: 7 })
      ).rejects.toMatchObject({ code: 'CONFLICT' });
      expect((await catalog.get('a'))?.version).toBe(1);
    });

    it('should fail with NOT_FOUND for unknown ids', async () => {
      await expect(
        catalog.updateAccess('nope', { timestamp: T0, kind: 'write' })
      ).rejects.toBeInstanceOf(TieringError);
    });
  });

  describe('updateTier', () => {
    it('should change the tier and restart the counter', async () => {
      await catalog.put(
        createTestRecord({
          id: 'a',
          tier: 'COLD',
          accessFrequency: { score: 9, updatedAt: T0 },
        })
      );
      const changedAt = daysAfter(T0, 3);

      const updated = await catalog.updateTier('a', 'WARM', 1, changedAt);

      expect(updated).toMatchObject({
        tier: 'WARM',
        tierChangedAt: changedAt,
        accessFrequency: { score: 0, updatedAt: changedAt },
        version: 2,
        lastAccessedAt: T0,
      });
    });

    it('should reject a stale version and keep the old tier', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));
      await catalog.updateAccess('a', { timestamp: T0, kind: 'read' });

      await expect(catalog.updateTier('a', 'WARM', 1, T0)).rejects.toMatchObject({
        code: 'CONFLICT',
      });
      expect((await catalog.get('a'))?.tier).toBe('HOT');
    });

    it('should report NOT_FOUND for a deleted record', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));
      await catalog.delete('a');

      await expect(catalog.updateTier('a', 'WARM', 1, T0)).rejects.toMatchObject({
        code: 'NOT_FOUND',
      });
    });
  });

  describe('delete', () => {
    it('should return the removed record', async () => {
      const record = await catalog.put(createTestRecord({ id: 'a' }));

      expect(await catalog.delete('a')).toEqual(record);
      expect(await catalog.get('a')).toBeNull();
    });

    it('should honour expectedVersion', async () => {
      await catalog.put(createTestRecord({ id: 'a' }));

      await expect(catalog.delete('a', { expectedVersion: 2 })).rejects.toMatchObject({
        code: 'CONFLICT',
      });
      expect(await catalog.get('a')).not.toBeNull();
    });
  });

  describe('listAll', () => {
    beforeEach(async () => {
      for (const id of ['c', 'a', 'e', 'b', 'd']) {
        await catalog.put(createTestRecord({ id }));
      }
    });

    it('should yield every record in id order across pages', async () => {
      expect(await collect(catalog.listAll({ pageSize: 2 }))).toEqual([
        'a',
        'b',
        'c',
        'd',
        'e',
      ]);
    });

    it('should resume after a cursor', async () => {
      expect(await collect(catalog.listAll({ after: 'b', pageSize: 2 }))).toEqual([
        'c',
        'd',
        'e',
      ]);
    });

    it('should skip records deleted while listing', async () => {
      const seen: string[] = [];
      for await (const record of catalog.listAll({ pageSize: 10 })) {
        seen.push(record.id);
        if (record.id === 'a') {
          await catalog.delete('c');
        }
      }

      expect(seen).toEqual(['a', 'b', 'd', 'e']);
    });

    it('should keep id order after inserts and deletes between pages', async () => {
      await catalog.delete('b');
      await catalog.put(createTestRecord({ id: 'bb' }));
      await catalog.put(createTestRecord({ id: 'aa' }));
      await catalog.delete('e');
      await catalog.put(createTestRecord({ id: 'f' }));

      expect(await collect(catalog.listAll({ pageSize: 2 }))).toEqual([
        'a',
        'aa',
        'bb',
        'c',
        'd',
        'f',
      ]);
      expect(await collect(catalog.listAll({ after: 'ab', pageSize: 2 }))).toEqual([
        'bb',
        'c',
        'd',
        'f',
      ]);
    });

    it('should not index an id twice when a put conflicts', async () => {
      await expect(catalog.put(createTestRecord({ id: 'c' }))).rejects.toMatchObject({
        code: 'CONFLICT',
      });

      expect(await collect(catalog.listAll())).toEqual(['a', 'b', 'c', 'd', 'e']);
    });

    it('should return each record as last committed', async () => {
      await catalog.updateTier('b', 'WARM', 1, T0);

      const tiers: string[] = [];
      for await (const record of catalog.listAll()) {
        tiers.push(`${record.id}:${record.tier}`);
      }

      expect(tiers).toEqual(['a:HOT', 'b:WARM', 'c:HOT', 'd:HOT', 'e:HOT']);
    });
  });
});
