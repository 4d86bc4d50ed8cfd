import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import JSON5 from "json5";
import type { z } from "zod";
import { createSkillCatalog, type SkillCatalog } from "@/modules/character/skills/catalog";
import { createItemCatalog, type ItemCatalog } from "@/modules/inventory/definitions";
import { ItemPackSchema, SkillPackSchema } from "./schemas";

const PACK_FILE_BASENAMES = {
  skills: "character.skills",
  items: "character.items",
} as const;

export const DEFAULT_CONTENT_PACKS_DIR = path.resolve(
  process.cwd(),
  "content",
  "packs",
);

type PackKey = keyof typeof PACK_FILE_BASENAMES;

export interface LoadedContentPacks {
  readonly packDir: string;
  readonly skills: SkillCatalog;
  readonly items: ItemCatalog;
}

export class ContentLoadError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "ContentLoadError";
  }
}

export function formatZodIssues(issues: readonly z.ZodIssue[], file: string): string[] {
  return issues.map((issue) => {
    const jsonPath = issue.path.length
      ? `$.${issue.path
          .map((part) => (typeof part === "number" ? `[${part}]` : String(part)))
          .join(".")
          .replace(/\.\[/g, "[")}`
      : "$";
    return `${file} ${jsonPath}: ${issue.message}`;
  });
}

/** Parse raw pack content according to its file extension. */
export function parseContentFile(rawContent: string, filePath: string): unknown {
  if (filePath.endsWith(".json")) {
    return JSON.parse(rawContent);
  }

  if (filePath.endsWith(".json5")) {
    return JSON5.parse(rawContent);
  }

  throw new ContentLoadError(`Unsupported content file extension: ${filePath}`);
}

function resolvePackFilePath(packDir: string, packKey: PackKey): string {
  const baseName = PACK_FILE_BASENAMES[packKey];
  const json5Path = path.join(packDir, `${baseName}.json5`);
  if (existsSync(json5Path)) {
    return json5Path;
  }

  const jsonPath = path.join(packDir, `${baseName}.json`);
  if (existsSync(jsonPath)) {
    return jsonPath;
  }

  throw new ContentLoadError(
    `Missing required content pack: ${baseName}.json or ${baseName}.json5`,
    [path.join(packDir, baseName)],
  );
}

async function readPack(filePath: string): Promise<unknown> {
  const rawContent = await readFile(filePath, "utf8");
  try {
    return parseContentFile(rawContent, filePath);
  } catch (error) {
    if (error instanceof ContentLoadError) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new ContentLoadError(`Failed to parse content file ${filePath}`, [
      `${filePath}: ${reason}`,
    ]);
  }
}

function findDuplicates(values: readonly string[], label: string, file: string): string[] {
  const seen = new Set<string>();
  const issues: string[] = [];
  for (const value of values) {
    if (seen.has(value)) {
      issues.push(`${file}: duplicate ${label} '${value}'`);
    }
    seen.add(value);
  }
  return issues;
}

export async function loadContentPacks(
  packDir: string = DEFAULT_CONTENT_PACKS_DIR,
): Promise<LoadedContentPacks> {
  const files = {
    skills: resolvePackFilePath(packDir, "skills"),
    items: resolvePackFilePath(packDir, "items"),
  } as const;

  const [skillsRaw, itemsRaw] = await Promise.all([
    readPack(files.skills),
    readPack(files.items),
  ]);

  const skillsParsed = SkillPackSchema.safeParse(skillsRaw);
  if (!skillsParsed.success) {
    throw new ContentLoadError(
      "Invalid skills content pack",
      formatZodIssues(skillsParsed.error.issues, files.skills),
    );
  }

  const itemsParsed = ItemPackSchema.safeParse(itemsRaw);
  if (!itemsParsed.success) {
    throw new ContentLoadError(
      "Invalid items content pack",
      formatZodIssues(itemsParsed.error.issues, files.items),
    );
  }

  const { skills } = skillsParsed.data;
  const { items } = itemsParsed.data;

  const duplicates = [
    ...findDuplicates(skills.map((skill) => skill.id), "skill id", files.skills),
    ...findDuplicates(items.map((item) => item.id), "item id", files.items),
    ...findDuplicates(items.map((item) => item.name), "item name", files.items),
  ];
  if (duplicates.length > 0) {
    throw new ContentLoadError("Duplicate content entries", duplicates);
  }

  console.info(
    `[Content] Loaded ${skills.length} skills and ${items.length} items from ${packDir}`,
  );

  return {
    packDir,
    skills: createSkillCatalog(
      skills.map((skill) => ({
        key: skill.id,
        name: skill.name,
        attributes: skill.attributes,
        description: skill.description,
      })),
    ),
    items: createItemCatalog(items),
  };
}
