/**
 * Character Profile Service.
 *
 * Purpose: Assemble a character at inception and route it through aging, skill
 * allocation and inventory.
 * Context: Facade between a presentation/workflow layer and the engine modules.
 * Dependencies:
 * - Skill catalog and item catalog (injected, read-only)
 * - RNG passed per call
 *
 * Invariants:
 * - Public methods that can fail for policy reasons return Result (no exceptions).
 * - Each operation is applied fully or not at all.
 * - Inventory base slots follow derived stats after aging.
 */

import { ErrResult, OkResult, type Result } from "@/utils/result";
import { InventoryCapacityModel } from "@/modules/inventory/capacity";
import type { ItemCatalog } from "@/modules/inventory/definitions";
import { CHARACTER_CONFIG } from "../config";
import {
  rollAttributeSet,
  rollStartingMoney,
  setManualAttributes,
} from "../attributes/generator";
import { applyAgeEffects } from "../aging/engine";
import type { AgeEffectsReport } from "../aging/types";
import type { RngState } from "../rng";
import { SkillAllocationEngine } from "../skills/allocation";
import type { SkillCatalog } from "../skills/catalog";
import { recomputeDerivedStats } from "../stats/calculator";
import { CharacterError, type AttributeSet, type SkillLedger } from "../types";
import type { Character, CreateCharacterInput } from "./types";

export interface CharacterProfileServiceDeps {
  readonly skills: SkillCatalog;
  readonly items: ItemCatalog;
}

export interface CharacterProfileService {
  /** Roll (or validate) attributes, roll money, and hand out starting gear. */
  create(input: CreateCharacterInput, rng: RngState): Result<Character, CharacterError>;

  /** Apply life-experience effects for an age and record it on the character. */
  applyAge(
    character: Character,
    age: number,
    rng: RngState,
  ): Result<AgeEffectsReport, CharacterError>;

  /**
   * Start an allocation session over a copy of the character's skills and points.
   * Nothing is written back until `commitAllocation` succeeds.
   */
  startAllocation(character: Character): SkillAllocationEngine;

  /**
   * Write a finished allocation back; refused while the session has points left.
   * Only the points the session spent are taken from the character's budget.
   */
  commitAllocation(
    character: Character,
    session: SkillAllocationEngine,
  ): Result<SkillLedger, CharacterError>;

  /** Capacity model bound to the character's inventory (mutates it in place). */
  inventory(character: Character): InventoryCapacityModel;
}

/** Trim and check a character name; returns the trimmed name. */
export function validateCharacterName(raw: string): Result<string, CharacterError> {
  const name = raw.trim();
  if (!name) {
    return ErrResult(new CharacterError("INVALID_NAME", "Character name cannot be empty"));
  }
  if (name.length > CHARACTER_CONFIG.nameMaxLength) {
    return ErrResult(
      new CharacterError(
        "INVALID_NAME",
        `Name must be ${CHARACTER_CONFIG.nameMaxLength} characters or less`,
      ),
    );
  }
  const forbidden = CHARACTER_CONFIG.nameForbiddenChars.find((char) => name.includes(char));
  if (forbidden !== undefined) {
    return ErrResult(new CharacterError("INVALID_NAME", `Name cannot contain '${forbidden}'`));
  }
  return OkResult(name);
}

class CharacterProfileServiceImpl implements CharacterProfileService {
  constructor(private readonly deps: CharacterProfileServiceDeps) {}

  create(input: CreateCharacterInput, rng: RngState): Result<Character, CharacterError> {
    const validName = validateCharacterName(input.name);
    if (validName.isErr()) return ErrResult(validName.error);
    const name = validName.value;

    let attributes: AttributeSet;
    if (input.attributes) {
      const manual = setManualAttributes(input.attributes);
      if (manual.isErr()) return ErrResult(manual.error);
      attributes = manual.value;
    } else {
      attributes = rollAttributeSet(rng);
    }

    const dollars = rollStartingMoney(rng);
    const derived = recomputeDerivedStats(attributes);

    const character: Character = {
      name,
      age: null,
      level: CHARACTER_CONFIG.level,
      experience: CHARACTER_CONFIG.experience,
      dollars,
      location: CHARACTER_CONFIG.location,
      weapon: CHARACTER_CONFIG.weapon,
      armor: CHARACTER_CONFIG.armor,
      attributes,
      derived,
      skills: {},
      skillPoints: 0,
      inventory: { items: {}, baseSlots: derived.baseInventorySlots, bonusSlots: 0 },
    };

    // Starting gear is handed out regardless of capacity.
    for (const item of CHARACTER_CONFIG.startingGear) {
      character.inventory.items[item] = (character.inventory.items[item] ?? 0) + 1;
    }

    return OkResult(character);
  }

  applyAge(
    character: Character,
    age: number,
    rng: RngState,
  ): Result<AgeEffectsReport, CharacterError> {
    const result = applyAgeEffects(character, age, rng);
    if (result.isErr()) return result;

    character.age = age;
    this.inventory(character).setBaseSlots(character.derived.baseInventorySlots);
    return result;
  }

  startAllocation(character: Character): SkillAllocationEngine {
    return new SkillAllocationEngine(this.deps.skills, {
      ledger: character.skills,
      budget: character.skillPoints,
    });
  }

  commitAllocation(
    character: Character,
    session: SkillAllocationEngine,
  ): Result<SkillLedger, CharacterError> {
    const finished = session.finish();
    if (finished.isErr()) return finished;

    // Deduct only what this session spent; points granted since it started are kept.
    character.skills = finished.value;
    character.skillPoints = Math.max(0, character.skillPoints - session.settle());
    return OkResult({ ...finished.value });
  }

  inventory(character: Character): InventoryCapacityModel {
    return new InventoryCapacityModel(character.inventory, this.deps.items);
  }
}

export function createCharacterProfileService(
  deps: CharacterProfileServiceDeps,
): CharacterProfileService {
  return new CharacterProfileServiceImpl(deps);
}
