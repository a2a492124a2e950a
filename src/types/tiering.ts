/**
 * Tiering Types
 * Policy configuration, decisions and run reports
 */

import type { FileRecord } from './file.js';
import type { Tier } from './tier.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Policy configuration
 * All durations are in milliseconds
 */
export interface TieringPolicyConfig {
  hotToWarmIdleMs: number;
  warmToColdIdleMs: number;
  promotionThreshold: number;
  promotionWindowMs: number;
}

export const DEFAULT_TIERING_POLICY: TieringPolicyConfig = {
  hotToWarmIdleMs: 30 * DAY_MS,
  warmToColdIdleMs: 90 * DAY_MS,
  promotionThreshold: 5,
  promotionWindowMs: 7 * DAY_MS,
};

/**
 * Why a move was decided
 * IDLE_COLD is kept across both steps of a HOT -> WARM -> COLD demotion
 */
export type TieringReason =
  | 'IDLE_COLD'
  | 'IDLE_WARM'
  | 'FREQUENT_ACCESS'
  | 'MANUAL_PROMOTION';

/**
 * One adjacent tier move
 */
export interface TieringDecision {
  fileId: string;
  fromTier: Tier;
  toTier: Tier;
  reason: TieringReason;
}

/**
 * Error kinds reported per file in a run
 */
export type TieringFailureKind =
  | 'STORAGE_UNAVAILABLE'
  | 'VERIFICATION_FAILED'
  | 'INTERNAL_ERROR';

export interface TieringFailure {
  fileId: string;
  errorKind: TieringFailureKind;
  message: string;
}

export type TieringSkipReason = 'CONFLICT' | 'NOT_FOUND';

export interface TieringSkip {
  fileId: string;
  reason: TieringSkipReason;
}

/**
 * Report of one tiering run
 */
export interface TieringRunResult {
  runId: string;
  startedAt: Date;
  finishedAt: Date;
  filesEvaluated: number;
  filesMoved: number;
  moves: TieringDecision[];
  skipped: TieringSkip[];
  failures: TieringFailure[];
  cancelled: boolean;
}

/**
 * Outcome of a single move transaction
 */
export type MoveOutcome =
  | { status: 'moved'; decision: TieringDecision; record: FileRecord }
  | { status: 'skipped'; reason: TieringSkipReason }
  | { status: 'failed'; errorKind: TieringFailureKind; message: string };

/**
 * Status of an asynchronously started run
 */
export type TieringRunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface TieringRunHandle {
  runId: string;
  status: TieringRunStatus;
  startedAt: Date;
  result?: TieringRunResult;
  error?: string;
}

/**
 * What triggerTiering hands back: the finished report, or a handle to poll
 */
export type TieringTrigger =
  | { mode: 'sync'; result: TieringRunResult }
  | { mode: 'async'; run: TieringRunHandle };
