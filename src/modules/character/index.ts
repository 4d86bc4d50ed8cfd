/**
 * Character Engine Module.
 *
 * Purpose: Public API exports for attribute generation and progression.
 * Context: Dice, attributes, aging, skills, derived stats and the profile facade.
 */

// Core types
export type { AttributeKey, AttributeSet, DerivedStats, SkillLedger, CharacterErrorCode } from "./types";
export { CharacterError } from "./types";

// RNG
export { createRng, makeSeededRng, nextRandom, nextInt, pickRandom } from "./rng";
export type { RngState } from "./rng";

// Dice
export { rollDice, assertValidDiceSpec } from "./dice/engine";
export type { DiceRollSpec, DiceRollResult } from "./dice/types";

// Attributes
export {
  rollAttribute,
  rollAttributeSet,
  rollStartingMoney,
  setManualAttributes,
} from "./attributes/generator";
export {
  attributeModifier,
  clampAttribute,
  getAttribute,
  setAttribute,
  boostableAttributes,
  reducibleAttributes,
} from "./attributes/attributes";

// Derived stats
export {
  recomputeDerivedStats,
  applyDamage,
  clampHitPoints,
  snapshotDamage,
  reapplyDamage,
} from "./stats/calculator";

// Aging
export {
  applyAgeEffects,
  applyAttributeBoost,
  applyAttributeLoss,
  makeVigorTest,
  vigorTestDicePool,
} from "./aging/engine";
export { AGE_PROGRESSION_TABLE, findAgeProgressionEntry, assertAgeTableCoverage } from "./aging/table";
export type {
  AgeProgressionEntry,
  AgeEffectsReport,
  BoostOutcome,
  VigorTestOutcome,
  AttributeChange,
  AgingSubject,
} from "./aging/types";

// Skills
export { SkillAllocationEngine } from "./skills/allocation";
export type { SkillAllocationOptions } from "./skills/allocation";
export { createSkillCatalog } from "./skills/catalog";
export type { SkillCatalog, SkillDefinition } from "./skills/catalog";

// Profile
export { createCharacterProfileService, validateCharacterName } from "./profile/service";
export type { CharacterProfileService, CharacterProfileServiceDeps } from "./profile/service";
export { CharacterSnapshotSchema, toCharacterSnapshot, parseCharacterSnapshot } from "./profile/schema";
export type { CharacterSnapshot } from "./profile/schema";
export type { Character, CreateCharacterInput } from "./profile/types";

// Config
export {
  ATTRIBUTE_KEYS,
  ATTRIBUTE_CONFIG,
  MONEY_CONFIG,
  VIGOR_TEST_CONFIG,
  SKILL_CONFIG,
  INVENTORY_CONFIG,
  CHARACTER_CONFIG,
} from "./config";
export type { ItemCategory } from "./config";
