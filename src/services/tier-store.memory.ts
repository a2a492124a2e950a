/**
 * In-memory Tier Store
 * One Map per tier. Blobs are copied on the way in and out so callers
 * never share buffers with the store.
 */

import type { Tier } from '../types/index.js';
import { TIER_ORDER } from '../types/index.js';

import type { TierStore } from './tier-store.js';

export function createInMemoryTierStore(): TierStore {
  const tiers = new Map<Tier, Map<string, Uint8Array>>(
    TIER_ORDER.map((tier) => [tier, new Map<string, Uint8Array>()])
  );

  function namespace(tier: Tier): Map<string, Uint8Array> {
    let blobs = tiers.get(tier);
    if (blobs === undefined) {
      blobs = new Map();
      tiers.set(tier, blobs);
    }
    return blobs;
  }

  return {
    async put(tier: Tier, fileId: string, bytes: Uint8Array): Promise<void> {
      namespace(tier).set(fileId, new Uint8Array(bytes));
    },

    async get(tier: Tier, fileId: string): Promise<Uint8Array | null> {
      const blob = namespace(tier).get(fileId);
      return blob === undefined ? null : new Uint8Array(blob);
    },

    async delete(tier: Tier, fileId: string): Promise<void> {
      namespace(tier).delete(fileId);
    },

    async has(tier: Tier, fileId: string): Promise<boolean> {
      return namespace(tier).has(fileId);
    },
  };
}
