import { MedalBreakdown, MedalCycle, MedalTier } from '../../data/budget/types';

// Tier sizes, largest first
const TIER_SIZES: readonly [MedalTier, number][] = [
  ['perfect', 100],
  ['gold', 50],
  ['silver', 5],
  ['bronze', 1],
];

/**
 * Splits a completion total into the largest possible multiples of 100, 50, 5 and 1, in that order.
 *
 * @example breakdown(99) // { perfect: 0, gold: 1, silver: 9, bronze: 4 }
 */
export function breakdown(total: number): MedalBreakdown {
  let remaining = Math.max(0, Math.trunc(total));
  const result: MedalBreakdown = { bronze: 0, silver: 0, gold: 0, perfect: 0 };
  for (const [tier, size] of TIER_SIZES) {
    result[tier] = Math.floor(remaining / size);
    remaining %= size;
  }
  return result;
}

/**
 * Highest tier whose threshold the cycle progress has reached
 */
export function currentMedal(progress: number): MedalTier | null {
  for (const [tier, size] of TIER_SIZES) {
    if (progress >= size) {
      return tier;
    }
  }
  return null;
}

export function medalCycle(total: number, cycleStart: number): MedalCycle {
  const progress = Math.max(0, total - cycleStart);
  return { cycleStart, progress, currentMedal: currentMedal(progress) };
}
