/**
 * Character Configuration.
 *
 * Purpose: Centralized constants and balance parameters for character generation.
 * Context: Used across attribute, aging, skill and inventory modules for consistent balancing.
 */

/** Core attribute keys, in display order. */
export const ATTRIBUTE_KEYS = ["vigor", "finesse", "smarts"] as const;

export type AttributeKey = (typeof ATTRIBUTE_KEYS)[number];

/** Attribute generation and bounds. */
export const ATTRIBUTE_CONFIG = {
  /** Hard floor for any attribute (losses stop here). */
  min: 3,

  /** Hard ceiling for any attribute (boosts stop here). */
  max: 18,

  /** Attribute roll: 4d6, drop the lowest. */
  roll: { numDice: 4, sides: 6, dropLowest: 1 },

  /** Score with a modifier of 0. */
  modifierBaseline: 10,
} as const;

/** Starting money: 3d6 times the multiplier. */
export const MONEY_CONFIG = {
  roll: { numDice: 3, sides: 6 },
  multiplier: 10,
} as const;

/** Vigor test parameters. */
export const VIGOR_TEST_CONFIG = {
  sides: 6,
  /** Lowest face that counts as a success. */
  successFace: 5,
  /** Dice pool never drops below this. */
  minDice: 1,
} as const;

/** Skill allocation configuration. */
export const SKILL_CONFIG = {
  /** Highest level reachable while allocating creation points. */
  creationCap: 3,
  /** Highest level reachable through later play. */
  absoluteCap: 5,
} as const;

/** Item categories that drive slot cost. */
export const ITEM_CATEGORIES = [
  "heavy_firearm",
  "sidearm",
  "armor",
  "container",
  "gear",
] as const;

export type ItemCategory = (typeof ITEM_CATEGORIES)[number];

/** Inventory slot accounting. */
export const INVENTORY_CONFIG = {
  /** Slots used per unit, by category. */
  slotCost: {
    heavy_firearm: 3,
    sidearm: 2,
    armor: 2,
    container: 0,
    gear: 1,
  } satisfies Record<ItemCategory, number>,

  /** Cost for items missing from the catalog. */
  defaultSlotCost: 1,
} as const;

/** Character inception defaults. */
export const CHARACTER_CONFIG = {
  level: 1,
  experience: 0,
  location: "Whiskey Hollow",
  startingGear: ["Worn Boots", "Tattered Hat", "Old Knife"],
  weapon: "Old Knife",
  armor: "Worn Clothes",
  /** Longest accepted character name, after trimming. */
  nameMaxLength: 20,
  /** Characters a name may not contain. */
  nameForbiddenChars: ["/", "\\", ":", "*", "?", '"', "<", ">", "|"],
  /** Age range the progression table must cover. */
  minAge: 14,
  maxAge: 57,
} as const;
