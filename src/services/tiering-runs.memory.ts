/**
 * In-memory TieringRunStore
 */

import type { TieringRunHandle } from '../types/index.js';

import type { TieringRunStore } from './tiering-runs.service.js';

export function createInMemoryTieringRunStore(): TieringRunStore {
  const handles = new Map<string, TieringRunHandle>();

  return {
    async save(handle: TieringRunHandle): Promise<void> {
      handles.set(handle.runId, structuredClone(handle));
    },

    async get(runId: string): Promise<TieringRunHandle | null> {
      const handle = handles.get(runId);
      return handle === undefined ? null : structuredClone(handle);
    },
  };
}
