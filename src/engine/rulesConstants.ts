// src/engine/rulesConstants.ts

import type { ActionCode } from "../types";

export type RulesConfig = {
  targetScore: number;

  // Get-on-board minimum: a player's first bank of the game must reach this.
  minFirstBank: number;

  diceCount: number;
  scoreBucketWidth: number;
  scoreBucketCount: number;
};

export const TARGET_SCORE = 10000;
export const MIN_FIRST_BANK = 1000;
export const DICE_COUNT = 6;
export const SCORE_BUCKET_WIDTH = 2000;
export const SCORE_BUCKET_COUNT = 5;

export const DEFAULT_RULES: Readonly<RulesConfig> = Object.freeze({
  targetScore: TARGET_SCORE,
  minFirstBank: MIN_FIRST_BANK,
  diceCount: DICE_COUNT,
  scoreBucketWidth: SCORE_BUCKET_WIDTH,
  scoreBucketCount: SCORE_BUCKET_COUNT,
});

// Step rewards for the decision surface.
export const WIN_BONUS = 1000;
export const BUST_PENALTY = -10;
export const ILLEGAL_MOVE_PENALTY = -1;

export const ACTION_BANK = 0 as const;
export const ACTION_TAKE_FIVE = 7 as const;
export const ACTION_TAKE_ONE = 8 as const;
export const ACTION_ROLL = 9 as const;
export const ACTION_COUNT = 10;

export function isActionCode(x: unknown): x is ActionCode {
  return typeof x === "number" && Number.isInteger(x) && x >= 0 && x < ACTION_COUNT;
}

function requirePositiveInt(name: keyof RulesConfig, v: number): void {
  if (!Number.isInteger(v) || v <= 0) {
    throw new RangeError(`Invalid rules.${name}: ${String(v)}`);
  }
}

/**
 * Merge overrides onto DEFAULT_RULES and validate the result.
 * diceCount is fixed at 6: every encoding and trained model assumes it.
 */
export function resolveRules(overrides: Partial<RulesConfig> = {}): RulesConfig {
  const rules: RulesConfig = { ...DEFAULT_RULES, ...overrides };

  requirePositiveInt("targetScore", rules.targetScore);
  requirePositiveInt("minFirstBank", rules.minFirstBank);
  requirePositiveInt("scoreBucketWidth", rules.scoreBucketWidth);
  requirePositiveInt("scoreBucketCount", rules.scoreBucketCount);

  if (rules.diceCount !== DICE_COUNT) {
    throw new RangeError(`Invalid rules.diceCount: ${String(rules.diceCount)} (only 6 is supported)`);
  }

  return rules;
}

export function envFlag(name: string, defaultValue = false): boolean {
  const v = process.env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(name: string, defaultValue: number): number {
  const v = process.env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

/**
 * Rules overrides read from the environment (drivers only; the engine never reads env).
 * - BLEWIT_TARGET_SCORE
 * - BLEWIT_MIN_FIRST_BANK
 */
export function rulesFromEnv(): RulesConfig {
  return resolveRules({
    targetScore: envInt("BLEWIT_TARGET_SCORE", TARGET_SCORE),
    minFirstBank: envInt("BLEWIT_MIN_FIRST_BANK", MIN_FIRST_BANK),
  });
}
