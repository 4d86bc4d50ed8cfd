/**
 * Character Profile Types.
 *
 * Purpose: The character aggregate and the inputs used to create it.
 */

import type { InventoryState } from "@/modules/inventory/definitions";
import type { AttributeSet, DerivedStats, SkillLedger } from "../types";

/** Complete character record owned by one player. */
export interface Character {
  name: string;
  /** `null` until life-experience effects have been applied. */
  age: number | null;
  level: number;
  experience: number;
  dollars: number;
  location: string;
  weapon: string;
  armor: string;
  attributes: AttributeSet;
  derived: DerivedStats;
  /** Sparse skill map. */
  skills: SkillLedger;
  /** Unspent skill points. */
  skillPoints: number;
  inventory: InventoryState;
}

/** Input for creating a character. */
export interface CreateCharacterInput {
  name: string;
  /** Manually entered attributes; rolled when omitted. */
  attributes?: Partial<AttributeSet>;
}
