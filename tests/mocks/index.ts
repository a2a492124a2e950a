/**
 * Test Mocks
 * Fakes for storage backends and clients
 */

import { vi } from 'vitest';

import type { TierStore } from '@/services/tier-store.js';
import type { RunStoreRedis } from '@/services/tiering-runs.redis.js';
import type { Tier } from '@/types/index.js';
import { TieringError } from '@/types/index.js';

/**
 * Faults a FaultyTierStore injects; flip them during a test
 */
export interface TierStoreFaults {
  failPut: Set<Tier>;
  failGet: Set<Tier>;
  failDelete: Set<Tier>;
  /** Writes to these tiers store altered bytes */
  corruptPut: Set<Tier>;
}

export function createTierStoreFaults(): TierStoreFaults {
  return {
    failPut: new Set(),
    failGet: new Set(),
    failDelete: new Set(),
    corruptPut: new Set(),
  };
}

function unavailable(operation: string, tier: Tier): TieringError {
  return new TieringError(
    'STORAGE_UNAVAILABLE',
    `${operation} on ${tier} unavailable`
  );
}

/**
 * Tier store wrapper that fails or corrupts on demand
 */
export function createFaultyTierStore(
  inner: TierStore,
  faults: TierStoreFaults
): TierStore {
  return {
    async put(tier, fileId, bytes) {
      if (faults.failPut.has(tier)) {
        throw unavailable('put', tier);
      }
      if (faults.corruptPut.has(tier)) {
        const altered = new Uint8Array(bytes);
        altered[0] = ((altered[0] ?? 0) + 1) % 256;
        return inner.put(tier, fileId, altered);
      }
      return inner.put(tier, fileId, bytes);
    },
    async get(tier, fileId) {
      if (faults.failGet.has(tier)) {
        throw unavailable('get', tier);
      }
      return inner.get(tier, fileId);
    },
    async delete(tier, fileId) {
      if (faults.failDelete.has(tier)) {
        throw unavailable('delete', tier);
      }
      return inner.delete(tier, fileId);
    },
    has(tier, fileId) {
      return inner.has(tier, fileId);
    },
  };
}

/**
 * Mock Redis client backed by a Map
 * Values are JSON-encoded on set and decoded on get, as the Upstash
 * client does
 */
export function createMockRedis(): RunStoreRedis & {
  values: Map<string, string>;
  ttls: Map<string, number>;
} {
  const values = new Map<string, string>();
  const ttls = new Map<string, number>();

  return {
    values,
    ttls,
    get: vi.fn(async (key: string): Promise<unknown> => {
      const value = values.get(key);
      return value === undefined ? null : JSON.parse(value);
    }),
    set: vi.fn(
      async (
        key: string,
        value: string,
        options: { ex: number }
      ): Promise<unknown> => {
        values.set(key, JSON.stringify(value));
        ttls.set(key, options.ex);
        return 'OK';
      }
    ),
  };
}

/**
 * Promise a test opens by hand
 */
export interface Gate {
  opened: Promise<void>;
  open: () => void;
}

export function createGate(): Gate {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

/**
 * Tier store whose reads wait until the gate opens
 */
export function createGatedTierStore(inner: TierStore, gate: Gate): TierStore {
  return {
    ...inner,
    async get(tier, fileId) {
      await gate.opened;
      return inner.get(tier, fileId);
    },
  };
}
