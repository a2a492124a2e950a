/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the catalog and the tier stores.
 * Adapters (*.memory.ts, *.db.ts, *.storage.ts, *.redis.ts) implement the
 * narrow storage interfaces each service depends on.
 */

// TierStore
export type { TierStore } from './tier-store.js';
export { createInMemoryTierStore } from './tier-store.memory.js';
export { createSupabaseTierStore, bucketForTier } from './tier-store.storage.js';

// MetadataCatalog
export type {
  MetadataCatalog,
  CatalogAccess,
  CatalogListOptions,
  CatalogOptions,
  VersionCheck,
} from './catalog.js';
export {
  DEFAULT_LIST_PAGE_SIZE,
  createFileRecord,
  applyAccess,
  applyTierChange,
} from './catalog.js';
export { createInMemoryCatalog } from './catalog.memory.js';
export { createSupabaseCatalog } from './catalog.db.js';

// AccessTracker
export type { AccessTracker, AccessEventLog } from './access-tracker.service.js';
export { createAccessTracker } from './access-tracker.service.js';
export { createInMemoryAccessEventLog } from './access-events.memory.js';
export { createSupabaseAccessEventLog } from './access-events.db.js';
export { emptyFrequency, frequencyAt, bumpFrequency } from './frequency.js';

// TieringPolicy
export type { TieringPolicy } from './tiering.policy.js';
export { createTieringPolicy } from './tiering.policy.js';

// TieringScheduler
export type {
  TieringScheduler,
  TieringLogger,
  RunOptions,
} from './tiering.scheduler.js';
export {
  createTieringScheduler,
  DEFAULT_TIERING_CONCURRENCY,
} from './tiering.scheduler.js';

// TieringRunService
export type {
  TieringRunService,
  TieringRunStore,
} from './tiering-runs.service.js';
export { createTieringRunService } from './tiering-runs.service.js';
export { createInMemoryTieringRunStore } from './tiering-runs.memory.js';
export {
  createRedisTieringRunStore,
  RUN_KEY_PREFIX,
  RUN_TTL_SECONDS,
} from './tiering-runs.redis.js';

// AuditService
export type { AuditService, AuditServiceDb } from './audit.service.js';
export { createAuditService } from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';
export { createInMemoryAuditServiceDb } from './audit.memory.js';

// FileService
export type { FileService } from './file.service.js';
export { createFileService, DEFAULT_CONTENT_TYPE } from './file.service.js';
