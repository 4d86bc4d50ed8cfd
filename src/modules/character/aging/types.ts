/**
 * Aging Types.
 *
 * Purpose: Progression table entries and the per-step report of an aging batch.
 */

import type { AttributeKey, AttributeSet, DerivedStats } from "../types";

/** Progression granted to a character whose age falls in [minAge, maxAge]. */
export interface AgeProgressionEntry {
  readonly minAge: number;
  readonly maxAge: number;
  readonly skillPoints: number;
  readonly attributeBoosts: number;
  readonly vigorTests: number;
  readonly category: string;
}

/** A +1 or -1 that landed on an attribute. */
export interface AttributeChange {
  attribute: AttributeKey;
  from: number;
  to: number;
}

export interface BoostOutcome {
  /** 1-indexed position in the batch. */
  index: number;
  /** `null` when every attribute was already at the ceiling. */
  change: AttributeChange | null;
}

export interface VigorTestOutcome {
  /** 1-indexed position in the batch. */
  index: number;
  /** Vigor when the test was rolled. */
  vigor: number;
  modifier: number;
  dice: number[];
  passed: boolean;
  /** Attribute lost on failure; `null` on a pass or when the loss was absorbed. */
  loss: AttributeChange | null;
}

/** State the aging engine reads and mutates. */
export interface AgingSubject {
  attributes: AttributeSet;
  derived: DerivedStats;
  skillPoints: number;
}

export interface AgeEffectsReport {
  age: number;
  entry: AgeProgressionEntry;
  skillPointsGranted: number;
  boosts: BoostOutcome[];
  vigorTests: VigorTestOutcome[];
  attributesBefore: AttributeSet;
  attributesAfter: AttributeSet;
  derived: DerivedStats;
}
