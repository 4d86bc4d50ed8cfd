/**
 * Character RNG Utilities.
 *
 * Purpose: Seedable random source shared by every dice and selection step.
 * Context: Passed explicitly into the engine so tests can seed or script it.
 * Dependencies: None (Mulberry32).
 */

/** A source of floats in [0, 1). */
export type RngState = () => number;

/** Seeded random number generator (Mulberry32). */
export function createRng(seed: number): RngState {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Create an RNG from an optional seed.
 * Falls back to a clock-derived seed when none is configured.
 */
export function makeSeededRng(seed?: number): RngState {
  return createRng(seed ?? Date.now());
}

/** Get next random number between 0 and 1. */
export function nextRandom(rng: RngState): number {
  return rng();
}

/** Random integer in range [min, max]. */
export function nextInt(rng: RngState, min: number, max: number): number {
  return Math.floor(nextRandom(rng) * (max - min + 1)) + min;
}

/**
 * Pick a random item from a non-empty array, uniformly.
 * @returns The item, or `null` when there is nothing to pick.
 */
export function pickRandom<T>(rng: RngState, items: readonly T[]): T | null {
  if (items.length === 0) return null;
  const index = nextInt(rng, 0, items.length - 1);
  return items[index] ?? null;
}
