/**
 * Environment configuration.
 *
 * Purpose: Read `.env` and process variables into a validated config object.
 * Context: Used by scripts and hosts to seed the RNG and locate content packs.
 */

import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

const EnvSchema = z.object({
  CHARACTER_RNG_SEED: z.coerce.number().int().min(0).max(0xffffffff).optional(),
  CHARACTER_CONTENT_DIR: z.string().min(1).optional(),
});

export interface EnvConfig {
  /** Fixed RNG seed; `undefined` means seed from the clock. */
  readonly rngSeed: number | undefined;
  /** Absolute path to the content packs directory. */
  readonly contentDir: string;
}

export class EnvConfigError extends Error {
  constructor(
    message: string,
    public readonly details: readonly string[] = [],
  ) {
    super(message);
    this.name = "EnvConfigError";
  }
}

const emptyToUndefined = (value: string | undefined): string | undefined =>
  value === undefined || value.trim() === "" ? undefined : value;

/**
 * Load configuration.
 * @param env Variables to read; `.env` is merged into `process.env` first when this is omitted.
 */
export function loadEnvConfig(env?: NodeJS.ProcessEnv): EnvConfig {
  if (!env) {
    dotenv.config();
  }
  const source = env ?? process.env;

  const parsed = EnvSchema.safeParse({
    CHARACTER_RNG_SEED: emptyToUndefined(source.CHARACTER_RNG_SEED),
    CHARACTER_CONTENT_DIR: emptyToUndefined(source.CHARACTER_CONTENT_DIR),
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    console.error("[Config] Invalid environment:", details.join("; "));
    throw new EnvConfigError("Invalid environment configuration", details);
  }

  return {
    rngSeed: parsed.data.CHARACTER_RNG_SEED,
    contentDir: path.resolve(
      process.cwd(),
      parsed.data.CHARACTER_CONTENT_DIR ?? path.join("content", "packs"),
    ),
  };
}
