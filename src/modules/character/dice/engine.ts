/**
 * Dice Engine.
 *
 * Purpose: Generic dice rolling with keep/drop, reroll, exploding and modifier semantics.
 * Context: Every random roll in character generation and aging goes through here.
 * Dependencies: Character RNG.
 *
 * Invariants:
 * - keptRolls.length === numDice - dropLowest - dropHighest.
 * - Each die resolves independently before sorting.
 * - Bad recipes throw INVALID_CONFIGURATION before any entropy is consumed.
 */

import { CharacterError } from "../types";
import { nextInt, type RngState } from "../rng";
import type { DiceRollResult, DiceRollSpec } from "./types";

const isCount = (value: number): boolean => Number.isInteger(value) && value >= 0;

function invalid(message: string): CharacterError {
  return new CharacterError("INVALID_CONFIGURATION", message);
}

/** Validate a recipe; throws on caller error. */
export function assertValidDiceSpec(spec: DiceRollSpec): void {
  const { numDice, sides, dropLowest = 0, dropHighest = 0, rerollBelow, exploding = false } = spec;

  if (!Number.isInteger(numDice) || numDice <= 0) {
    throw invalid(`numDice must be a positive integer (got ${numDice})`);
  }
  if (!Number.isInteger(sides) || sides <= 0) {
    throw invalid(`sides must be a positive integer (got ${sides})`);
  }
  if (!isCount(dropLowest) || !isCount(dropHighest)) {
    throw invalid("drop counts must be non-negative integers");
  }
  if (dropLowest + dropHighest >= numDice) {
    throw invalid(
      `Cannot drop ${dropLowest + dropHighest} of ${numDice} dice`,
    );
  }
  if (rerollBelow !== undefined && rerollBelow >= sides) {
    throw invalid(`rerollBelow ${rerollBelow} leaves no face on a d${sides}`);
  }
  if (exploding && sides === 1) {
    throw invalid("Exploding d1 never stops rolling");
  }
}

/** Roll one die, applying reroll to the first face and explosions after it. */
function rollSingleDie(
  rng: RngState,
  sides: number,
  rerollBelow: number | undefined,
  exploding: boolean,
): number {
  let face = nextInt(rng, 1, sides);
  if (rerollBelow !== undefined) {
    while (face <= rerollBelow) {
      face = nextInt(rng, 1, sides);
    }
  }

  let total = face;
  if (exploding) {
    while (face === sides) {
      face = nextInt(rng, 1, sides);
      total += face;
    }
  }
  return total;
}

/** Roll dice according to a recipe. */
export function rollDice(rng: RngState, spec: DiceRollSpec): DiceRollResult {
  assertValidDiceSpec(spec);

  const {
    numDice,
    sides,
    dropLowest = 0,
    dropHighest = 0,
    rerollBelow,
    exploding = false,
    modifier = 0,
  } = spec;

  const rolls: number[] = [];
  for (let i = 0; i < numDice; i++) {
    rolls.push(rollSingleDie(rng, sides, rerollBelow, exploding));
  }

  const sorted = [...rolls].sort((a, b) => b - a);
  const keptRolls = sorted.slice(dropHighest, sorted.length - dropLowest);
  const droppedRolls = [
    ...sorted.slice(0, dropHighest),
    ...sorted.slice(sorted.length - dropLowest),
  ];

  const result = keptRolls.reduce((sum, roll) => sum + roll, 0) + modifier;

  return { result, rolls, keptRolls, droppedRolls, modifier };
}
