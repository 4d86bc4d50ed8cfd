/**
 * Attribute Generator.
 *
 * Purpose: Roll the three core attributes and starting funds.
 * Context: Character inception; manual entry is validated against the same bounds.
 * Dependencies: Dice engine.
 */

import { ErrResult, OkResult, type Result } from "@/utils/result";
import { ATTRIBUTE_CONFIG, ATTRIBUTE_KEYS, MONEY_CONFIG } from "../config";
import { rollDice } from "../dice/engine";
import type { RngState } from "../rng";
import { CharacterError, type AttributeSet } from "../types";
import { isValidAttributeScore } from "./attributes";

/** 4d6 drop lowest, always in [3, 18]. */
export function rollAttribute(rng: RngState): number {
  return rollDice(rng, ATTRIBUTE_CONFIG.roll).result;
}

/** Three independent attribute rolls. */
export function rollAttributeSet(rng: RngState): AttributeSet {
  const vigor = rollAttribute(rng);
  const finesse = rollAttribute(rng);
  const smarts = rollAttribute(rng);
  return { vigor, finesse, smarts };
}

/** 3d6 x 10: a multiple of 10 in [30, 180]. */
export function rollStartingMoney(rng: RngState): number {
  return rollDice(rng, MONEY_CONFIG.roll).result * MONEY_CONFIG.multiplier;
}

/**
 * Validate manually entered attributes.
 * Every attribute must be present, an integer, and inside the attribute bounds.
 */
export function setManualAttributes(
  input: Partial<Record<keyof AttributeSet, number>>,
): Result<AttributeSet, CharacterError> {
  const problems: string[] = [];
  for (const key of ATTRIBUTE_KEYS) {
    const value = input[key];
    if (value === undefined || !isValidAttributeScore(value)) {
      problems.push(
        `${key} must be an integer between ${ATTRIBUTE_CONFIG.min} and ${ATTRIBUTE_CONFIG.max} (got ${String(value)})`,
      );
    }
  }

  const { vigor, finesse, smarts } = input;
  if (problems.length > 0 || vigor === undefined || finesse === undefined || smarts === undefined) {
    return ErrResult(new CharacterError("INVALID_ATTRIBUTE", problems.join("; ")));
  }

  return OkResult({ vigor, finesse, smarts });
}
