/**
 * Supabase Storage Adapter
 * Implementation of the TierStore interface for Supabase Storage
 *
 * One bucket per tier (tier-hot, tier-warm, tier-cold); objects are
 * stored at the bucket root under their fileId.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Tier } from '../types/index.js';
import { TieringError } from '../types/index.js';

import type { TierStore } from './tier-store.js';

/**
 * Bucket name for a tier
 */
export function bucketForTier(tier: Tier): string {
  return `tier-${tier.toLowerCase()}`;
}

function isMissingObject(error: Error): boolean {
  if ('statusCode' in error && error.statusCode === '404') {
    return true;
  }
  if ('status' in error && error.status === 404) {
    return true;
  }
  return /not found/i.test(error.message);
}

/**
 * Create Supabase Storage adapter
 */
export function createSupabaseTierStore(supabase: SupabaseClient): TierStore {
  return {
    async put(tier: Tier, fileId: string, bytes: Uint8Array): Promise<void> {
      const { error } = await supabase.storage
        .from(bucketForTier(tier))
        .upload(fileId, bytes, {
          contentType: 'application/octet-stream',
          upsert: true,
        });

      if (error) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to write ${fileId} to ${tier}: ${error.message}`
        );
      }
    },

    async get(tier: Tier, fileId: string): Promise<Uint8Array | null> {
      const { data, error } = await supabase.storage
        .from(bucketForTier(tier))
        .download(fileId);

      if (error) {
        if (isMissingObject(error)) {
          return null;
        }
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to read ${fileId} from ${tier}: ${error.message}`
        );
      }

      if (data === null) {
        return null;
      }

      return new Uint8Array(await data.arrayBuffer());
    },

    async delete(tier: Tier, fileId: string): Promise<void> {
      const { error } = await supabase.storage
        .from(bucketForTier(tier))
        .remove([fileId]);

      if (error) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to delete ${fileId} from ${tier}: ${error.message}`
        );
      }
    },

    async has(tier: Tier, fileId: string): Promise<boolean> {
      const { data, error } = await supabase.storage
        .from(bucketForTier(tier))
        .list('', { search: fileId, limit: 10 });

      if (error) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to look up ${fileId} in ${tier}: ${error.message}`
        );
      }

      return data.some((object) => object.name === fileId);
    },
  };
}
