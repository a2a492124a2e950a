/**
 * Tier Store
 *
 * Blob storage addressed by (tier, fileId). Each tier is its own
 * namespace, so the same fileId may briefly exist in two tiers while a
 * move is between its copy and delete-source steps.
 *
 * Backend failures are thrown as TieringError('STORAGE_UNAVAILABLE').
 */

import type { Tier } from '../types/index.js';

/**
 * Storage abstraction interface (in-memory, Supabase Storage, etc.)
 */
export interface TierStore {
  put: (tier: Tier, fileId: string, bytes: Uint8Array) => Promise<void>;
  /** Returns null when no blob exists at the location */
  get: (tier: Tier, fileId: string) => Promise<Uint8Array | null>;
  /** Idempotent: deleting a missing blob succeeds */
  delete: (tier: Tier, fileId: string) => Promise<void>;
  has: (tier: Tier, fileId: string) => Promise<boolean>;
}
