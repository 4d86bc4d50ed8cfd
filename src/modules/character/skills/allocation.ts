/**
 * Skill Allocation Engine.
 *
 * Purpose: Spend a skill-point budget on a capped per-skill ladder.
 * Context: Driven by the creation workflow until the budget reaches zero.
 * Dependencies: Skill catalog (read-only).
 *
 * Invariants:
 * - Levels stay in [0, cap]; the ledger never stores zeros.
 * - Each accepted increment costs exactly one point.
 * - Failed calls change nothing.
 * - `finish()` only succeeds at a budget of exactly zero.
 */

import { ErrResult, OkResult, type Result } from "@/utils/result";
import { SKILL_CONFIG } from "../config";
import { CharacterError, type SkillLedger } from "../types";
import type { SkillCatalog } from "./catalog";

export interface SkillAllocationOptions {
  /** Starting ledger (copied). */
  ledger?: SkillLedger;
  /** Points available to spend. */
  budget?: number;
  /** Level ceiling; creation-time allocation uses 3. */
  cap?: number;
}

export class SkillAllocationEngine {
  private readonly ledger: SkillLedger;
  private budget: number;
  private spent = 0;
  readonly cap: number;

  constructor(
    private readonly catalog: SkillCatalog,
    options: SkillAllocationOptions = {},
  ) {
    this.ledger = {};
    for (const [key, level] of Object.entries(options.ledger ?? {})) {
      if (level > 0) this.ledger[key] = level;
    }
    this.budget = Math.max(0, Math.floor(options.budget ?? 0));
    this.cap = options.cap ?? SKILL_CONFIG.creationCap;
  }

  get remainingPoints(): number {
    return this.budget;
  }

  /** Points spent since the session started or was last settled. */
  get spentPoints(): number {
    return this.spent;
  }

  levelOf(key: string): number {
    return this.ledger[key] ?? 0;
  }

  /** Add points to the budget (e.g. from aging). */
  grant(points: number): number {
    if (Number.isInteger(points) && points > 0) {
      this.budget += points;
    }
    return this.budget;
  }

  /** Raise a skill by one level. */
  increment(key: string): Result<number, CharacterError> {
    if (!this.catalog.has(key)) {
      return ErrResult(new CharacterError("UNKNOWN_SKILL", `Unknown skill '${key}'`));
    }

    const current = this.levelOf(key);
    if (current >= this.cap) {
      const name = this.catalog.get(key)?.name ?? key;
      return ErrResult(
        new CharacterError("SKILL_AT_CAP", `${name} is already at maximum level (${this.cap})`),
      );
    }

    if (this.budget <= 0) {
      return ErrResult(new CharacterError("NO_BUDGET", "No skill points left to spend"));
    }

    const next = current + 1;
    this.ledger[key] = next;
    this.budget -= 1;
    this.spent += 1;
    return OkResult(next);
  }

  /** Close out allocation; refused while points remain. */
  finish(): Result<SkillLedger, CharacterError> {
    if (this.budget > 0) {
      return ErrResult(
        new CharacterError(
          "BUDGET_NOT_EXHAUSTED",
          `You must spend all ${this.budget} skill points before continuing`,
        ),
      );
    }
    return OkResult(this.snapshot());
  }

  /** Hand over the points spent so far and reset the count. */
  settle(): number {
    const spent = this.spent;
    this.spent = 0;
    return spent;
  }

  /** Copy of the sparse ledger. */
  snapshot(): SkillLedger {
    return { ...this.ledger };
  }
}
