/**
 * Environment Configuration Unit Tests.
 */
import path from "node:path";
import { afterEach, describe, it, expect, vi } from "vitest";
import { EnvConfigError, loadEnvConfig } from "@/configuration/env";

describe("loadEnvConfig", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should default to a clock seed and the shipped packs", () => {
    expect(loadEnvConfig({})).toEqual({
      rngSeed: undefined,
      contentDir: path.resolve(process.cwd(), "content", "packs"),
    });
  });

  it("should read the seed and content directory", () => {
    const config = loadEnvConfig({ CHARACTER_RNG_SEED: "42", CHARACTER_CONTENT_DIR: "/srv/packs" });

    expect(config).toEqual({ rngSeed: 42, contentDir: "/srv/packs" });
  });

  it("should treat empty values as unset", () => {
    expect(loadEnvConfig({ CHARACTER_RNG_SEED: "  " }).rngSeed).toBeUndefined();
  });

  it.each(["abc", "-1", "1.5"])("should reject seed %s", (seed) => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    expect(() => loadEnvConfig({ CHARACTER_RNG_SEED: seed })).toThrow(EnvConfigError);
    expect(errorSpy).toHaveBeenCalledTimes(1);
  });
});
