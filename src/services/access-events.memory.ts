/**
 * In-memory Access Event Log
 * Events are kept per file in arrival order.
 */

import type { AccessEvent } from '../types/index.js';

import type { AccessEventLog } from './access-tracker.service.js';

export function createInMemoryAccessEventLog(): AccessEventLog {
  const events = new Map<string, AccessEvent[]>();

  return {
    async append(event: AccessEvent): Promise<void> {
      const list = events.get(event.fileId) ?? [];
      list.push({ ...event });
      events.set(event.fileId, list);
    },

    async countBetween(fileId: string, from: Date, to: Date): Promise<number> {
      const list = events.get(fileId) ?? [];
      return list.filter(
        (event) =>
          event.timestamp.getTime() >= from.getTime() &&
          event.timestamp.getTime() <= to.getTime()
      ).length;
    },

    async compact(before: Date): Promise<number> {
      let removed = 0;
      for (const [fileId, list] of events) {
        const kept = list.filter(
          (event) => event.timestamp.getTime() >= before.getTime()
        );
        removed += list.length - kept.length;
        if (kept.length === 0) {
          events.delete(fileId);
        } else {
          events.set(fileId, kept);
        }
      }
      return removed;
    },

    async deleteFor(fileId: string): Promise<number> {
      const removed = events.get(fileId)?.length ?? 0;
      events.delete(fileId);
      return removed;
    },
  };
}
