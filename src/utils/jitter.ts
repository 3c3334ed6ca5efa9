/**
 * Jitter for scatter plots.
 * Offsets are cosmetic: they only separate points that share a rank, the
 * underlying records are never touched.
 */

import { DEFAULT_JITTER_AMOUNT } from '../constants';
import { ReportConfigError } from './errorUtils';

// Uniform draw in [0, 1)
export type RandomSource = () => number;

export function assertJitterAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount < 0) {
    throw new ReportConfigError(`Jitter amount must be a finite number >= 0, got ${amount}`);
  }
}

/**
 * Offset every value by an independent draw in [-amount/2, +amount/2].
 * Call once per axis so x and y offsets are uncorrelated.
 */
export function addJitter(
  values: readonly number[],
  amount: number = DEFAULT_JITTER_AMOUNT,
  random: RandomSource = Math.random
): number[] {
  assertJitterAmount(amount);
  if (amount === 0) {
    return [...values];
  }
  return values.map(value => value + (random() - 0.5) * amount);
}

/**
 * Deterministic random source (mulberry32) for tests and the
 * REPORT_RANDOM_SEED override. Not for anything that needs real randomness.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
