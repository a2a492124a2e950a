/**
 * In-memory TierStore Unit Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { TierStore } from '@/services/tier-store.js';
import { createInMemoryTierStore } from '@/services/tier-store.memory.js';

describe('InMemoryTierStore', () => {
  let store: TierStore;

  beforeEach(() => {
    store = createInMemoryTierStore();
  });

  it('should keep each tier as its own namespace', async () => {
    await store.put('HOT', 'f1', new Uint8Array([1, 2, 3]));
    await store.put('WARM', 'f1', new Uint8Array([4, 5]));

    expect(await store.get('HOT', 'f1')).toEqual(new Uint8Array([1, 2, 3]));
    expect(await store.get('WARM', 'f1')).toEqual(new Uint8Array([4, 5]));
    expect(await store.get('COLD', 'f1')).toBeNull();
    expect(await store.has('COLD', 'f1')).toBe(false);
  });

  it('should overwrite an existing blob', async () => {
    await store.put('HOT', 'f1', new Uint8Array([1]));
    await store.put('HOT', 'f1', new Uint8Array([2]));

    expect(await store.get('HOT', 'f1')).toEqual(new Uint8Array([2]));
  });

  it('should not share buffers with callers', async () => {
    const bytes = new Uint8Array([1, 2, 3]);
    await store.put('HOT', 'f1', bytes);
    bytes[0] = 9;

    const read = await store.get('HOT', 'f1');
    if (read !== null) {
      read[1] = 9;
    }

    expect(await store.get('HOT', 'f1')).toEqual(new Uint8Array([1, 2, 3]));
  });

  it('should treat deleting a missing blob as success', async () => {
    await expect(store.delete('COLD', 'nothing')).resolves.toBeUndefined();
  });

  it('should delete only the given tier', async () => {
    await store.put('HOT', 'f1', new Uint8Array([1]));
    await store.put('WARM', 'f1', new Uint8Array([1]));

    await store.delete('HOT', 'f1');

    expect(await store.has('HOT', 'f1')).toBe(false);
    expect(await store.has('WARM', 'f1')).toBe(true);
  });
});
