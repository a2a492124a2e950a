/**
 * Background Workers Exports
 *
 * Workers drive periodic jobs in-process. They never overlap with
 * themselves and log instead of throwing.
 */

export type { TieringWorker } from './tiering.worker.js';
export { createTieringWorker } from './tiering.worker.js';
