/**
 * Attribute access by key.
 *
 * Purpose: Explicit get/set/clamp over the three core attributes.
 * Context: Boosts and vigor-test losses pick "one of three, excluding maxed/minned members".
 *
 * Invariants:
 * - Every write goes through `clampAttribute`, so values stay in [3, 18].
 * - Candidate lists keep `ATTRIBUTE_KEYS` order so seeded picks are reproducible.
 */

import { ATTRIBUTE_CONFIG, ATTRIBUTE_KEYS } from "../config";
import type { AttributeKey, AttributeSet } from "../types";

export function clampAttribute(value: number): number {
  return Math.max(ATTRIBUTE_CONFIG.min, Math.min(ATTRIBUTE_CONFIG.max, Math.floor(value)));
}

export function getAttribute(attributes: AttributeSet, key: AttributeKey): number {
  return attributes[key];
}

/** Write a clamped value and return what was stored. */
export function setAttribute(
  attributes: AttributeSet,
  key: AttributeKey,
  value: number,
): number {
  const clamped = clampAttribute(value);
  attributes[key] = clamped;
  return clamped;
}

/** Attributes that can still take a +1. */
export function boostableAttributes(attributes: AttributeSet): AttributeKey[] {
  return ATTRIBUTE_KEYS.filter((key) => attributes[key] < ATTRIBUTE_CONFIG.max);
}

/** Attributes that can still take a -1. */
export function reducibleAttributes(attributes: AttributeSet): AttributeKey[] {
  return ATTRIBUTE_KEYS.filter((key) => attributes[key] > ATTRIBUTE_CONFIG.min);
}

/** D20-style modifier: floor((score - 10) / 2). */
export function attributeModifier(score: number): number {
  return Math.floor((score - ATTRIBUTE_CONFIG.modifierBaseline) / 2);
}

export function isValidAttributeScore(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value >= ATTRIBUTE_CONFIG.min &&
    value <= ATTRIBUTE_CONFIG.max
  );
}

export function copyAttributes(attributes: AttributeSet): AttributeSet {
  return { vigor: attributes.vigor, finesse: attributes.finesse, smarts: attributes.smarts };
}
