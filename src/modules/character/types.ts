/**
 * Core Character Types.
 *
 * Purpose: Shared type definitions for the character engine.
 * Context: Used across attributes, aging, skills, inventory and profile modules.
 */

import type { AttributeKey } from "./config";

export type { AttributeKey };

/** Core attributes, each in [3, 18]. */
export type AttributeSet = {
  [K in AttributeKey]: number;
};

/** Stats derived from attributes; always recomputed wholesale. */
export interface DerivedStats {
  /** Current HP (equals max right after recomputation). */
  hitPoints: number;
  /** Maximum HP. */
  maxHitPoints: number;
  /** Movement per turn. */
  movement: number;
  /** Carrying slots before container bonuses. */
  baseInventorySlots: number;
}

/** Sparse skill map: absent keys are level 0, zeros are never stored. */
export type SkillLedger = Record<string, number>;

export type CharacterErrorCode =
  | "INVALID_CONFIGURATION"
  | "OUT_OF_RANGE_AGE"
  | "SKILL_AT_CAP"
  | "NO_BUDGET"
  | "BUDGET_NOT_EXHAUSTED"
  | "UNKNOWN_SKILL"
  | "INVALID_ATTRIBUTE"
  | "INVALID_NAME"
  | "INVALID_SNAPSHOT";

/** Error class for character engine operations. */
export class CharacterError extends Error {
  constructor(
    public readonly code: CharacterErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "CharacterError";
  }
}
