/**
 * Storage Tier Types
 *
 * Tiers form a closed, ordered set: HOT (index 0) is the fastest and most
 * expensive class, COLD (index 2) the cheapest. Promotion and demotion
 * are single index steps through TIER_ORDER.
 */

export const TIER_ORDER = ['HOT', 'WARM', 'COLD'] as const;

export type Tier = (typeof TIER_ORDER)[number];

/**
 * Position of a tier in TIER_ORDER
 */
export function tierIndex(tier: Tier): number {
  return TIER_ORDER.indexOf(tier);
}

/**
 * The next tier toward HOT, or null when already HOT
 */
export function warmer(tier: Tier): Tier | null {
  return TIER_ORDER[tierIndex(tier) - 1] ?? null;
}

/**
 * The next tier toward COLD, or null when already COLD
 */
export function colder(tier: Tier): Tier | null {
  return TIER_ORDER[tierIndex(tier) + 1] ?? null;
}

/**
 * True when two tiers are exactly one step apart
 */
export function isAdjacent(a: Tier, b: Tier): boolean {
  return Math.abs(tierIndex(a) - tierIndex(b)) === 1;
}

export function isTier(value: unknown): value is Tier {
  return TIER_ORDER.some((tier) => tier === value);
}
