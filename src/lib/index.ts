/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export { getRedis } from './redis.js';
export { computeChecksum } from './checksum.js';
export type { AppConfig } from './config.js';
export { loadConfig, ConfigError } from './config.js';
