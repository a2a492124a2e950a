/**
 * Content digests
 */

import { createHash } from 'node:crypto';

/**
 * SHA-256 of the content as lowercase hex
 */
export function computeChecksum(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}
