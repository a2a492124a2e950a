/**
 * Tiering Policy Engine
 *
 * Pure decision function: no state, no I/O. Rules in precedence order:
 *
 * 1. idle >= warmToColdIdleMs and tier != COLD  -> one step toward COLD
 * 2. idle >= hotToWarmIdleMs and tier == HOT    -> WARM
 * 3. accesses within promotionWindowMs since the
 *    last tier change >= promotionThreshold
 *    and tier != HOT                            -> one step toward HOT
 * 4. otherwise no action
 *
 * Demotion wins over promotion: a file idle past the cold threshold is
 * demoted whatever its recent count. Boundaries are inclusive. Every
 * decision is a single adjacent step; a HOT file past the cold threshold
 * is decided HOT -> WARM with reason IDLE_COLD and the scheduler takes the
 * second step in the same run.
 *
 * The access count comes from the caller (the scheduler reads it from the
 * access event log) so the policy stays pure.
 */

import type {
  FileRecord,
  TieringDecision,
  TieringPolicyConfig,
} from '../types/index.js';
import { DEFAULT_TIERING_POLICY, colder, warmer } from '../types/index.js';

/**
 * TieringPolicy interface
 */
export interface TieringPolicy {
  readonly config: TieringPolicyConfig;
  /** Rules 1 and 2 only */
  demotion(record: FileRecord, now: Date): TieringDecision | null;
  decide(
    record: FileRecord,
    now: Date,
    recentAccesses: number
  ): TieringDecision | null;
}

/**
 * Create TieringPolicy instance
 */
export function createTieringPolicy(
  config: TieringPolicyConfig = DEFAULT_TIERING_POLICY
): TieringPolicy {
  function demotion(record: FileRecord, now: Date): TieringDecision | null {
    const idleMs = now.getTime() - record.lastAccessedAt.getTime();

    if (idleMs >= config.warmToColdIdleMs) {
      const toTier = colder(record.tier);
      if (toTier !== null) {
        return {
          fileId: record.id,
          fromTier: record.tier,
          toTier,
          reason: 'IDLE_COLD',
        };
      }
    }

    if (idleMs >= config.hotToWarmIdleMs && record.tier === 'HOT') {
      return {
        fileId: record.id,
        fromTier: 'HOT',
        toTier: 'WARM',
        reason: 'IDLE_WARM',
      };
    }

    return null;
  }

  return {
    config,
    demotion,

    decide(
      record: FileRecord,
      now: Date,
      recentAccesses: number
    ): TieringDecision | null {
      const demoted = demotion(record, now);
      if (demoted !== null) {
        return demoted;
      }

      if (recentAccesses >= config.promotionThreshold) {
        const toTier = warmer(record.tier);
        if (toTier !== null) {
          return {
            fileId: record.id,
            fromTier: record.tier,
            toTier,
            reason: 'FREQUENT_ACCESS',
          };
        }
      }

      return null;
    },
  };
}
