/**
 * Character Snapshot Schema.
 *
 * Purpose: Zod schema for handing characters to and from the persistence collaborator.
 * Context: The engine never writes files; callers serialize the snapshot however they like.
 *
 * Invariants:
 * - Attributes are integers in [3, 18].
 * - The skill map is sparse: zero levels are dropped on the way in and out.
 */

import { z } from "zod";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { ATTRIBUTE_CONFIG, SKILL_CONFIG } from "../config";
import { CharacterError, type SkillLedger } from "../types";
import type { Character } from "./types";

const AttributeScoreSchema = z
  .number()
  .int()
  .min(ATTRIBUTE_CONFIG.min)
  .max(ATTRIBUTE_CONFIG.max);

const CountSchema = z.number().int().min(0);

/** Schema for a stored character. */
export const CharacterSnapshotSchema = z
  .object({
    name: z.string().min(1),
    age: z.number().int().nullable(),
    level: z.number().int().min(1),
    experience: CountSchema,
    dollars: CountSchema,
    location: z.string(),
    weapon: z.string(),
    armor: z.string(),
    attributes: z.object({
      vigor: AttributeScoreSchema,
      finesse: AttributeScoreSchema,
      smarts: AttributeScoreSchema,
    }),
    derived: z.object({
      hitPoints: CountSchema,
      maxHitPoints: CountSchema,
      movement: CountSchema,
      baseInventorySlots: CountSchema,
    }),
    skills: z.record(z.number().int().min(0).max(SKILL_CONFIG.absoluteCap)),
    skillPoints: CountSchema,
    inventory: z.object({
      items: z.record(z.number().int().min(1)),
      baseSlots: CountSchema,
      bonusSlots: CountSchema,
    }),
  })
  .refine((data) => data.derived.hitPoints <= data.derived.maxHitPoints, {
    message: "hitPoints cannot exceed maxHitPoints",
    path: ["derived", "hitPoints"],
  });

/** Type for stored character data. */
export type CharacterSnapshot = z.infer<typeof CharacterSnapshotSchema>;

function sparseSkills(skills: SkillLedger): SkillLedger {
  const out: SkillLedger = {};
  for (const [key, level] of Object.entries(skills)) {
    if (level > 0) out[key] = level;
  }
  return out;
}

/** Plain-data copy of a character for persistence. */
export function toCharacterSnapshot(character: Character): CharacterSnapshot {
  return {
    name: character.name,
    age: character.age,
    level: character.level,
    experience: character.experience,
    dollars: character.dollars,
    location: character.location,
    weapon: character.weapon,
    armor: character.armor,
    attributes: { ...character.attributes },
    derived: { ...character.derived },
    skills: sparseSkills(character.skills),
    skillPoints: character.skillPoints,
    inventory: {
      items: { ...character.inventory.items },
      baseSlots: character.inventory.baseSlots,
      bonusSlots: character.inventory.bonusSlots,
    },
  };
}

/** Rebuild a character from stored data, field for field. */
export function parseCharacterSnapshot(raw: unknown): Result<Character, CharacterError> {
  const parsed = CharacterSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "$"}: ${issue.message}`)
      .join("; ");
    return ErrResult(new CharacterError("INVALID_SNAPSHOT", details));
  }

  const data = parsed.data;
  return OkResult({ ...data, skills: sparseSkills(data.skills) });
}
