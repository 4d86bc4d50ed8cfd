/**
 * Content Pack Loader Unit Tests.
 *
 * Purpose: Load the shipped packs and reject malformed ones with located issues.
 */
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
  ContentLoadError,
  loadContentPacks,
  parseContentFile,
} from "@/modules/content/loader";

const PACKS_DIR = fileURLToPath(new URL("../../content/packs", import.meta.url));

const VALID_SKILLS = `{
  schemaVersion: 1,
  skills: [{ id: "bows", name: "Bows", attributes: ["finesse"] }],
}`;

const VALID_ITEMS = `{
  schemaVersion: 1,
  items: [{ id: "canteen", name: "Canteen", category: "gear" }],
}`;

async function rejection(promise: Promise<unknown>): Promise<ContentLoadError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ContentLoadError) return error;
    throw error;
  }
  throw new Error("Expected content loading to fail");
}

describe("loadContentPacks", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), "character-packs-"));
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("should load the shipped packs", async () => {
    const packs = await loadContentPacks(PACKS_DIR);

    expect(packs.skills.list()).toHaveLength(14);
    expect(packs.items.list()).toHaveLength(16);
    expect(packs.skills.get("athletics")?.attributes).toEqual(["vigor", "finesse"]);
    expect(packs.items.get("Backpack")).toMatchObject({ category: "container", bonusSlots: 6 });
    expect(packs.items.get("Old Knife")?.category).toBe("gear");
    expect(console.info).toHaveBeenCalledWith(
      `[Content] Loaded 14 skills and 16 items from ${PACKS_DIR}`,
    );
  });

  it("should fall back to .json files", async () => {
    await writeFile(
      path.join(tempDir, "character.skills.json"),
      JSON.stringify({ schemaVersion: 1, skills: [{ id: "bows", name: "Bows", attributes: ["finesse"] }] }),
    );
    await writeFile(path.join(tempDir, "character.items.json5"), VALID_ITEMS);

    const packs = await loadContentPacks(tempDir);

    expect(packs.skills.get("bows")?.description).toBe("");
    expect(packs.items.get("Canteen")?.id).toBe("canteen");
  });

  it("should fail on a missing pack", async () => {
    await writeFile(path.join(tempDir, "character.skills.json5"), VALID_SKILLS);

    const error = await rejection(loadContentPacks(tempDir));
    expect(error.message).toBe(
      "Missing required content pack: character.items.json or character.items.json5",
    );
  });

  it("should locate schema issues", async () => {
    const skillsFile = path.join(tempDir, "character.skills.json5");
    await writeFile(
      skillsFile,
      `{ schemaVersion: 1, skills: [{ id: "luck", name: "Luck", attributes: ["luck"] }] }`,
    );
    await writeFile(path.join(tempDir, "character.items.json5"), VALID_ITEMS);

    const error = await rejection(loadContentPacks(tempDir));
    expect(error.message).toBe("Invalid skills content pack");
    expect(error.details).toHaveLength(1);
    expect(error.details[0]?.startsWith(`${skillsFile} $.skills[0].attributes[0]: `)).toBe(true);
  });

  it("should reject bonus slots on non-containers", async () => {
    const itemsFile = path.join(tempDir, "character.items.json5");
    await writeFile(path.join(tempDir, "character.skills.json5"), VALID_SKILLS);
    await writeFile(
      itemsFile,
      `{ schemaVersion: 1, items: [{ id: "canteen", name: "Canteen", category: "gear", bonusSlots: 2 }] }`,
    );

    const error = await rejection(loadContentPacks(tempDir));
    expect(error.message).toBe("Invalid items content pack");
    expect(error.details).toEqual([
      `${itemsFile} $.items[0].bonusSlots: bonusSlots is only valid on container items`,
    ]);
  });

  it("should reject duplicate item names", async () => {
    const itemsFile = path.join(tempDir, "character.items.json5");
    await writeFile(path.join(tempDir, "character.skills.json5"), VALID_SKILLS);
    await writeFile(
      itemsFile,
      `{
        schemaVersion: 1,
        items: [
          { id: "canteen", name: "Canteen", category: "gear" },
          { id: "tin_canteen", name: "Canteen", category: "gear" },
        ],
      }`,
    );

    const error = await rejection(loadContentPacks(tempDir));
    expect(error.message).toBe("Duplicate content entries");
    expect(error.details).toEqual([`${itemsFile}: duplicate item name 'Canteen'`]);
  });

  it("should wrap parse failures", async () => {
    const skillsFile = path.join(tempDir, "character.skills.json5");
    await writeFile(skillsFile, "{ schemaVersion: 1, skills: [");
    await writeFile(path.join(tempDir, "character.items.json5"), VALID_ITEMS);

    const error = await rejection(loadContentPacks(tempDir));
    expect(error.message).toBe(`Failed to parse content file ${skillsFile}`);
  });
});

describe("parseContentFile", () => {
  it("should parse JSON5 comments and trailing commas", () => {
    expect(parseContentFile("// note\n{ a: 1, }", "pack.json5")).toEqual({ a: 1 });
  });

  it("should reject unknown extensions", () => {
    expect(() => parseContentFile("a: 1", "pack.yaml")).toThrow(
      "Unsupported content file extension: pack.yaml",
    );
  });
});
