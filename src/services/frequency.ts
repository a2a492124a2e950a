/**
 * Decayed access frequency
 *
 * A counter whose weight decays exponentially with mean lifetime
 * `windowMs`: an access made `windowMs` ago counts e^-1 of a fresh one.
 * Reads see the value decayed to their own instant, so the counter can be
 * stored without a background sweep.
 */

import type { AccessFrequency } from '../types/index.js';

export function emptyFrequency(at: Date): AccessFrequency {
  return { score: 0, updatedAt: at };
}

function decayFactor(elapsedMs: number, windowMs: number): number {
  if (windowMs <= 0) {
    return elapsedMs === 0 ? 1 : 0;
  }
  return Math.exp(-elapsedMs / windowMs);
}

/**
 * Value of the counter at `at`
 * An instant before updatedAt reads the stored score unchanged.
 */
export function frequencyAt(
  frequency: AccessFrequency,
  at: Date,
  windowMs: number
): number {
  const elapsed = at.getTime() - frequency.updatedAt.getTime();
  if (elapsed <= 0) {
    return frequency.score;
  }
  return frequency.score * decayFactor(elapsed, windowMs);
}

/**
 * Counter after one access at `timestamp`
 * Late accesses (before updatedAt) are added with their own decay weight.
 */
export function bumpFrequency(
  frequency: AccessFrequency,
  timestamp: Date,
  windowMs: number
): AccessFrequency {
  const elapsed = timestamp.getTime() - frequency.updatedAt.getTime();
  if (elapsed >= 0) {
    return {
      score: frequency.score * decayFactor(elapsed, windowMs) + 1,
      updatedAt: timestamp,
    };
  }
  return {
    score: frequency.score + decayFactor(-elapsed, windowMs),
    updatedAt: frequency.updatedAt,
  };
}
