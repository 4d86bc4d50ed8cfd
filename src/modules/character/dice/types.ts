/**
 * Dice Types.
 *
 * Purpose: Type definitions for the dice rolling primitive.
 */

/** Dice roll recipe. */
export interface DiceRollSpec {
  /** Number of dice rolled. */
  numDice: number;
  /** Faces per die. */
  sides: number;
  /** Lowest totals removed before summing. */
  dropLowest?: number;
  /** Highest totals removed before summing. */
  dropHighest?: number;
  /** Faces at or below this value are re-rolled. */
  rerollBelow?: number;
  /** A max face adds another die to the same total, repeatedly. */
  exploding?: boolean;
  /** Flat amount added to the kept sum. */
  modifier?: number;
}

/** Outcome of a dice roll. */
export interface DiceRollResult {
  /** Sum of kept totals plus modifier. */
  result: number;
  /** Every die total, in roll order. */
  rolls: number[];
  /** Totals that counted, highest first. */
  keptRolls: number[];
  /** Dropped highest totals followed by dropped lowest totals. */
  droppedRolls: number[];
  /** Modifier applied. */
  modifier: number;
}
