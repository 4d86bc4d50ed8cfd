/**
 * Skill Catalog.
 *
 * Purpose: Read-only registry of trainable skills and their governing attributes.
 * Context: Supplied to the allocation engine; usually built from the skills content pack.
 */

import type { AttributeKey } from "../types";

/** A trainable skill. `attributes` lists one key, or two for mixed skills. */
export interface SkillDefinition {
  readonly key: string;
  readonly name: string;
  readonly attributes: readonly AttributeKey[];
  readonly description: string;
}

export interface SkillCatalog {
  has(key: string): boolean;
  get(key: string): SkillDefinition | null;
  /** All skills sorted by display name. */
  list(): readonly SkillDefinition[];
  /** Skills governed (fully or partly) by an attribute. */
  forAttribute(attribute: AttributeKey): readonly SkillDefinition[];
}

/**
 * Build a catalog from definitions.
 * @throws Error on duplicate keys.
 */
export function createSkillCatalog(definitions: readonly SkillDefinition[]): SkillCatalog {
  const byKey = new Map<string, SkillDefinition>();
  for (const definition of definitions) {
    if (byKey.has(definition.key)) {
      throw new Error(`Duplicate skill key '${definition.key}'`);
    }
    byKey.set(definition.key, Object.freeze({ ...definition }));
  }

  const sorted = Object.freeze(
    [...byKey.values()].sort((a, b) => a.name.localeCompare(b.name)),
  );

  return {
    has: (key) => byKey.has(key),
    get: (key) => byKey.get(key) ?? null,
    list: () => sorted,
    forAttribute: (attribute) =>
      sorted.filter((skill) => skill.attributes.includes(attribute)),
  };
}
