/**
 * Service wiring
 * Chooses adapters from the configuration and connects the services.
 */

import type { ApiServices } from './api/types.js';
import type { AppConfig } from './lib/config.js';
import { getRedis } from './lib/redis.js';
import { createSupabaseAdmin } from './lib/supabase.js';
import type {
  AccessEventLog,
  AuditServiceDb,
  MetadataCatalog,
  TierStore,
  TieringLogger,
  TieringRunService,
  TieringRunStore,
} from './services/index.js';
import {
  createAccessTracker,
  createAuditService,
  createAuditServiceDb,
  createFileService,
  createInMemoryAccessEventLog,
  createInMemoryAuditServiceDb,
  createInMemoryCatalog,
  createInMemoryTierStore,
  createInMemoryTieringRunStore,
  createRedisTieringRunStore,
  createSupabaseAccessEventLog,
  createSupabaseCatalog,
  createSupabaseTierStore,
  createTieringPolicy,
  createTieringRunService,
  createTieringScheduler,
} from './services/index.js';
import type { TieringWorker } from './workers/index.js';
import { createTieringWorker } from './workers/index.js';

export interface AppServices extends ApiServices {
  runs: TieringRunService;
  worker: TieringWorker;
}

interface StorageAdapters {
  catalog: MetadataCatalog;
  tierStore: TierStore;
  events: AccessEventLog;
  auditDb: AuditServiceDb;
}

function createStorageAdapters(
  config: AppConfig,
  clock: () => Date
): StorageAdapters {
  const catalogOptions = { frequencyWindowMs: config.policy.promotionWindowMs };

  if (config.storage.backend === 'supabase') {
    const supabase = createSupabaseAdmin(config.storage);
    return {
      catalog: createSupabaseCatalog(supabase, catalogOptions),
      tierStore: createSupabaseTierStore(supabase),
      events: createSupabaseAccessEventLog(supabase),
      auditDb: createAuditServiceDb(supabase),
    };
  }

  return {
    catalog: createInMemoryCatalog(catalogOptions),
    tierStore: createInMemoryTierStore(),
    events: createInMemoryAccessEventLog(),
    auditDb: createInMemoryAuditServiceDb(clock),
  };
}

function createRunStore(config: AppConfig): TieringRunStore {
  if (config.runStore.backend === 'redis') {
    return createRedisTieringRunStore(getRedis(config.runStore));
  }
  return createInMemoryTieringRunStore();
}

/**
 * Wire every service for the given configuration
 */
export function createServices(
  config: AppConfig,
  options: { clock?: () => Date; logger?: TieringLogger } = {}
): AppServices {
  const clock = options.clock ?? (() => new Date());
  const logger = options.logger ?? console;

  const { catalog, tierStore, events, auditDb } = createStorageAdapters(
    config,
    clock
  );

  const auditService = createAuditService({ db: auditDb });
  const tracker = createAccessTracker({ catalog, events, clock, logger });
  const scheduler = createTieringScheduler({
    catalog,
    tierStore,
    policy: createTieringPolicy(config.policy),
    tracker,
    auditService,
    clock,
    concurrency: config.tiering.concurrency,
    logger,
  });
  const runs = createTieringRunService({
    scheduler,
    store: createRunStore(config),
    clock,
    logger,
  });

  const fileService = createFileService({
    catalog,
    tierStore,
    tracker,
    scheduler,
    runs,
    sizeBounds: config.fileSize,
    frequencyWindowMs: config.policy.promotionWindowMs,
    auditService,
    clock,
    logger,
  });

  const worker = createTieringWorker({
    runs,
    intervalMs: config.tiering.intervalMs,
    logger,
  });

  return { fileService, auditService, runs, worker };
}
