import { z } from "zod";
import { ATTRIBUTE_KEYS, ITEM_CATEGORIES } from "@/modules/character/config";

export const CONTENT_SCHEMA_VERSION = 1 as const;

/** Canonical content IDs (skills, items). */
export const CONTENT_ID_REGEX = /^[a-z0-9_]+$/;

export const ContentIdSchema = z
  .string()
  .regex(
    CONTENT_ID_REGEX,
    "Invalid id. Expected pattern ^[a-z0-9_]+$",
  );

export const AttributeKeySchema = z.enum(ATTRIBUTE_KEYS);

export const ItemCategorySchema = z.enum(ITEM_CATEGORIES);

export const SkillDefSchema = z
  .object({
    id: ContentIdSchema,
    name: z.string().min(1),
    attributes: z.array(AttributeKeySchema).min(1).max(2),
    description: z.string().default(""),
  })
  .strict();

export const ItemDefSchema = z
  .object({
    id: ContentIdSchema,
    name: z.string().min(1),
    category: ItemCategorySchema,
    description: z.string().optional(),
    bonusSlots: z.number().int().min(1).optional(),
  })
  .strict()
  .refine((item) => item.bonusSlots === undefined || item.category === "container", {
    message: "bonusSlots is only valid on container items",
    path: ["bonusSlots"],
  });

export const SkillPackSchema = z
  .object({
    schemaVersion: z.literal(CONTENT_SCHEMA_VERSION),
    skills: z.array(SkillDefSchema),
  })
  .strict();

export const ItemPackSchema = z
  .object({
    schemaVersion: z.literal(CONTENT_SCHEMA_VERSION),
    items: z.array(ItemDefSchema),
  })
  .strict();

export type SkillDef = z.infer<typeof SkillDefSchema>;
export type ItemDef = z.infer<typeof ItemDefSchema>;
