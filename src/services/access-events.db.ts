/**
 * Access Event Log Database Adapter
 * Append-only access_events table in Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { AccessEvent } from '../types/index.js';
import { TieringError } from '../types/index.js';

import type { AccessEventLog } from './access-tracker.service.js';

const TABLE = 'access_events';

export function createSupabaseAccessEventLog(
  supabase: SupabaseClient
): AccessEventLog {
  return {
    async append(event: AccessEvent): Promise<void> {
      const { error } = await supabase.from(TABLE).insert({
        file_id: event.fileId,
        occurred_at: event.timestamp.toISOString(),
        kind: event.kind,
      });

      if (error !== null) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to append access event: ${error.message}`
        );
      }
    },

    async countBetween(fileId: string, from: Date, to: Date): Promise<number> {
      const { count, error } = await supabase
        .from(TABLE)
        .select('file_id', { count: 'exact', head: true })
        .eq('file_id', fileId)
        .gte('occurred_at', from.toISOString())
        .lte('occurred_at', to.toISOString());

      if (error !== null) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to count access events: ${error.message}`
        );
      }

      return count ?? 0;
    },

    async compact(before: Date): Promise<number> {
      const { count, error } = await supabase
        .from(TABLE)
        .delete({ count: 'exact' })
        .lt('occurred_at', before.toISOString());

      if (error !== null) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to compact access events: ${error.message}`
        );
      }

      return count ?? 0;
    },

    async deleteFor(fileId: string): Promise<number> {
      const { count, error } = await supabase
        .from(TABLE)
        .delete({ count: 'exact' })
        .eq('file_id', fileId);

      if (error !== null) {
        throw new TieringError(
          'STORAGE_UNAVAILABLE',
          `Failed to delete access events of ${fileId}: ${error.message}`
        );
      }

      return count ?? 0;
    },
  };
}
