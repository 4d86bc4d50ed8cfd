/**
 * Aging Progression Engine.
 *
 * Purpose: Apply life-experience effects for a character's starting age.
 * Context: Runs once after attributes are rolled; mutates the subject in place.
 * Dependencies: Dice engine, attribute helpers, derived stats calculator.
 *
 * Invariants:
 * - Out-of-range ages fail before anything is touched.
 * - Boosts never exceed 18; losses never go below 3 (both absorbed silently).
 * - Vigor tests run in order and each reads the vigor left by the previous one,
 *   so an early vigor loss shrinks the dice pool of the tests after it.
 * - Derived stats are recomputed once, after all boosts and tests.
 */

import { ErrResult, OkResult, type Result } from "@/utils/result";
import { CHARACTER_CONFIG, VIGOR_TEST_CONFIG } from "../config";
import { rollDice } from "../dice/engine";
import { pickRandom, type RngState } from "../rng";
import { recomputeDerivedStats } from "../stats/calculator";
import { CharacterError, type AttributeSet } from "../types";
import {
  attributeModifier,
  boostableAttributes,
  copyAttributes,
  getAttribute,
  reducibleAttributes,
  setAttribute,
} from "../attributes/attributes";
import { AGE_PROGRESSION_TABLE, findAgeProgressionEntry } from "./table";
import type {
  AgeEffectsReport,
  AgeProgressionEntry,
  AgingSubject,
  AttributeChange,
  BoostOutcome,
  VigorTestOutcome,
} from "./types";

/** +1 to a random attribute below the ceiling; `null` if the boost is wasted. */
export function applyAttributeBoost(
  attributes: AttributeSet,
  rng: RngState,
): AttributeChange | null {
  const attribute = pickRandom(rng, boostableAttributes(attributes));
  if (!attribute) return null;

  const from = getAttribute(attributes, attribute);
  const to = setAttribute(attributes, attribute, from + 1);
  return { attribute, from, to };
}

/** -1 to a random attribute above the floor; `null` if the loss is absorbed. */
export function applyAttributeLoss(
  attributes: AttributeSet,
  rng: RngState,
): AttributeChange | null {
  const attribute = pickRandom(rng, reducibleAttributes(attributes));
  if (!attribute) return null;

  const from = getAttribute(attributes, attribute);
  const to = setAttribute(attributes, attribute, from - 1);
  return { attribute, from, to };
}

/** Dice rolled for a vigor test at the given vigor. */
export function vigorTestDicePool(vigor: number): number {
  return Math.max(VIGOR_TEST_CONFIG.minDice, attributeModifier(vigor) + 1);
}

/**
 * Roll one vigor test against the current vigor.
 * Passes on any die showing 5 or 6; a failure costs one attribute point.
 */
export function makeVigorTest(
  attributes: AttributeSet,
  rng: RngState,
  index = 1,
): VigorTestOutcome {
  const vigor = attributes.vigor;
  const modifier = attributeModifier(vigor);
  const { rolls } = rollDice(rng, {
    numDice: vigorTestDicePool(vigor),
    sides: VIGOR_TEST_CONFIG.sides,
  });

  const passed = rolls.some((roll) => roll >= VIGOR_TEST_CONFIG.successFace);
  const loss = passed ? null : applyAttributeLoss(attributes, rng);

  return { index, vigor, modifier, dice: rolls, passed, loss };
}

/**
 * Apply the progression entry for `age` to a subject.
 *
 * @returns The full report, or OUT_OF_RANGE_AGE with the subject untouched.
 */
export function applyAgeEffects(
  subject: AgingSubject,
  age: number,
  rng: RngState,
  table: readonly AgeProgressionEntry[] = AGE_PROGRESSION_TABLE,
): Result<AgeEffectsReport, CharacterError> {
  const entry = findAgeProgressionEntry(age, table);
  if (!entry) {
    return ErrResult(
      new CharacterError(
        "OUT_OF_RANGE_AGE",
        `Age ${age} is outside ${CHARACTER_CONFIG.minAge}-${CHARACTER_CONFIG.maxAge}`,
      ),
    );
  }

  const attributesBefore = copyAttributes(subject.attributes);

  subject.skillPoints += entry.skillPoints;

  const boosts: BoostOutcome[] = [];
  for (let i = 0; i < entry.attributeBoosts; i++) {
    boosts.push({ index: i + 1, change: applyAttributeBoost(subject.attributes, rng) });
  }

  const vigorTests: VigorTestOutcome[] = [];
  for (let i = 0; i < entry.vigorTests; i++) {
    vigorTests.push(makeVigorTest(subject.attributes, rng, i + 1));
  }

  subject.derived = recomputeDerivedStats(subject.attributes);

  return OkResult({
    age,
    entry,
    skillPointsGranted: entry.skillPoints,
    boosts,
    vigorTests,
    attributesBefore,
    attributesAfter: copyAttributes(subject.attributes),
    derived: subject.derived,
  });
}
