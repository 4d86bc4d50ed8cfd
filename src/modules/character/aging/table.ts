/**
 * Age progression table.
 *
 * Older characters arrive with more training but must pass more vigor tests.
 * The table covers every integer age from 14 to 57 exactly once:
 * - 14-30: skill points plus attribute boosts, no tests
 * - 31-34: the first vigor test appears
 * - 35+: no boosts, tests climb by two per bracket
 */

import { CHARACTER_CONFIG } from "../config";
import { CharacterError } from "../types";
import type { AgeProgressionEntry } from "./types";

export const AGE_PROGRESSION_TABLE: readonly AgeProgressionEntry[] = Object.freeze([
  { minAge: 14, maxAge: 22, skillPoints: 5, attributeBoosts: 2, vigorTests: 0, category: "Young" },
  { minAge: 23, maxAge: 26, skillPoints: 5, attributeBoosts: 3, vigorTests: 0, category: "Prime (Early)" },
  { minAge: 27, maxAge: 30, skillPoints: 6, attributeBoosts: 2, vigorTests: 0, category: "Prime" },
  { minAge: 31, maxAge: 34, skillPoints: 7, attributeBoosts: 1, vigorTests: 1, category: "Prime (Late)" },
  { minAge: 35, maxAge: 48, skillPoints: 9, attributeBoosts: 0, vigorTests: 3, category: "Experienced" },
  { minAge: 49, maxAge: 52, skillPoints: 11, attributeBoosts: 0, vigorTests: 5, category: "Experienced (Elder)" },
  { minAge: 53, maxAge: 56, skillPoints: 13, attributeBoosts: 0, vigorTests: 7, category: "Elder" },
  { minAge: 57, maxAge: 57, skillPoints: 15, attributeBoosts: 0, vigorTests: 9, category: "Ancient" },
]);

/** Find the entry for an age, or `null` outside the table. */
export function findAgeProgressionEntry(
  age: number,
  table: readonly AgeProgressionEntry[] = AGE_PROGRESSION_TABLE,
): AgeProgressionEntry | null {
  if (!Number.isInteger(age)) return null;
  return table.find((entry) => age >= entry.minAge && age <= entry.maxAge) ?? null;
}

/**
 * Check that a table covers [minAge, maxAge] with no gaps or overlaps.
 * @throws CharacterError INVALID_CONFIGURATION listing every problem found.
 */
export function assertAgeTableCoverage(
  table: readonly AgeProgressionEntry[],
  minAge: number = CHARACTER_CONFIG.minAge,
  maxAge: number = CHARACTER_CONFIG.maxAge,
): void {
  const problems: string[] = [];

  for (const entry of table) {
    if (entry.minAge > entry.maxAge) {
      problems.push(`Inverted range ${entry.minAge}-${entry.maxAge} (${entry.category})`);
    }
  }

  for (let age = minAge; age <= maxAge; age++) {
    const matches = table.filter((entry) => age >= entry.minAge && age <= entry.maxAge);
    if (matches.length === 0) {
      problems.push(`Age ${age} has no entry`);
    } else if (matches.length > 1) {
      problems.push(
        `Age ${age} is covered by ${matches.map((entry) => entry.category).join(", ")}`,
      );
    }
  }

  for (const entry of table) {
    if (entry.minAge < minAge || entry.maxAge > maxAge) {
      problems.push(`Range ${entry.minAge}-${entry.maxAge} leaves ${minAge}-${maxAge}`);
    }
  }

  if (problems.length > 0) {
    throw new CharacterError("INVALID_CONFIGURATION", problems.join("; "));
  }
}
