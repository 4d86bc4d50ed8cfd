/**
 * Derived Stats Calculator.
 *
 * Purpose: Pure functions deriving HP, movement and carrying slots from attributes.
 * Context: Run at inception and once after every aging batch.
 *
 * Invariants:
 * - All functions are pure (no side effects, deterministic).
 * - Recomputation is a full heal: hitPoints === maxHitPoints.
 * - Damage is not carried over; use `snapshotDamage`/`reapplyDamage` to keep it.
 */

import type { AttributeSet, DerivedStats } from "../types";

/**
 * Recompute all derived stats from attributes.
 *
 * - maxHitPoints = floor((vigor + finesse + smarts) / 3)
 * - movement = floor((vigor + finesse) / 2)
 * - baseInventorySlots = vigor
 */
export function recomputeDerivedStats(attributes: AttributeSet): DerivedStats {
  const { vigor, finesse, smarts } = attributes;
  const maxHitPoints = Math.floor((vigor + finesse + smarts) / 3);
  return {
    hitPoints: maxHitPoints,
    maxHitPoints,
    movement: Math.floor((vigor + finesse) / 2),
    baseInventorySlots: vigor,
  };
}

/** Clamp HP to [0, maxHp]. */
export function clampHitPoints(hitPoints: number, maxHitPoints: number): number {
  return Math.max(0, Math.min(maxHitPoints, Math.floor(hitPoints)));
}

/** Apply damage (negative heals), returning new stats. */
export function applyDamage(stats: DerivedStats, amount: number): DerivedStats {
  return {
    ...stats,
    hitPoints: clampHitPoints(stats.hitPoints - amount, stats.maxHitPoints),
  };
}

/** Damage taken so far. */
export function snapshotDamage(stats: DerivedStats): number {
  return stats.maxHitPoints - stats.hitPoints;
}

/** Re-apply a damage snapshot after a recomputation healed the character. */
export function reapplyDamage(stats: DerivedStats, damage: number): DerivedStats {
  return applyDamage(stats, damage);
}
