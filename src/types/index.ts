/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  failureFromError,
  isSuccess,
  isFailure,
} from './result.js';
export type { ErrorCode } from './errors.js';
export { TieringError, isTieringError, errorMessage } from './errors.js';
export type { Tier } from './tier.js';
export {
  TIER_ORDER,
  tierIndex,
  warmer,
  colder,
  isAdjacent,
  isTier,
} from './tier.js';
export type {
  AccessKind,
  AccessFrequency,
  FileRecord,
  AccessEvent,
  UploadParams,
  UploadResult,
  RequestOptions,
  DownloadedFile,
  FileView,
  TierUsage,
  StorageStats,
  FileSizeBounds,
} from './file.js';
export type {
  TieringPolicyConfig,
  TieringReason,
  TieringDecision,
  TieringFailureKind,
  TieringFailure,
  TieringSkipReason,
  TieringSkip,
  TieringRunResult,
  MoveOutcome,
  TieringRunStatus,
  TieringRunHandle,
  TieringTrigger,
} from './tiering.js';
export { DAY_MS, DEFAULT_TIERING_POLICY } from './tiering.js';
export type {
  AuditActorType,
  AuditEvent,
  AuditLog,
  AuditQueryParams,
} from './audit.js';
