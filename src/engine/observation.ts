// src/engine/observation.ts
//
// Fixed-shape numeric projections of engine state. Both layouts are frozen: trained
// models depend on them bit for bit, quirks included.

import type { ActionCode } from "../types";
import { ACTION_ROLL } from "./rulesConstants";
import type { RulesConfig } from "./rulesConstants";

export type ObservationEncoding = "compact" | "extended";

export const COMPACT_SIZE = 15;
export const EXTENDED_SIZE = 25;

export type ObservationInput = {
  // Untaken dice showing on the table (0 before the first roll and after hot dice).
  diceOnTable: number;
  legalActions: readonly ActionCode[];
  bankedScore: number;
  opponentScore: number;
};

function onlyRoll(legal: readonly ActionCode[]): boolean {
  return legal.length === 1 && legal[0] === ACTION_ROLL;
}

export function scoreBucket(score: number, rules: Pick<RulesConfig, "scoreBucketWidth" | "scoreBucketCount">): number {
  return Math.min(Math.floor(score / rules.scoreBucketWidth), rules.scoreBucketCount - 1);
}

/**
 * 15 slots.
 * - slot diceOnTable-1 set; with no dice on the table the index wraps to slot 14
 * - slot action+5 for each legal action; six dice showing shares slot 5 with bank
 * - slot 14 is the must-roll flag: 1 when roll is the only legal action, else cleared
 */
export function encodeCompact(input: ObservationInput): number[] {
  const obs = new Array<number>(COMPACT_SIZE).fill(0);

  const d = input.diceOnTable;
  obs[d > 0 ? d - 1 : COMPACT_SIZE - 1] = 1;

  if (onlyRoll(input.legalActions)) {
    obs[14] = 1;
    return obs;
  }

  for (const a of input.legalActions) obs[a + 5] = 1;
  obs[14] = 0;
  return obs;
}

/**
 * 25 slots.
 * - 0..5: dice on table one-hot (all zero when none)
 * - 6..14: legal actions 0..8 at action+6; slot 14 is then overwritten by the must-roll flag
 * - 15..19: acting player's banked-score bucket
 * - 20..24: opponent's banked-score bucket
 */
export function encodeExtended(
  input: ObservationInput,
  rules: Pick<RulesConfig, "scoreBucketWidth" | "scoreBucketCount">
): number[] {
  const obs = new Array<number>(EXTENDED_SIZE).fill(0);

  const d = input.diceOnTable;
  if (d > 0) obs[d - 1] = 1;

  if (onlyRoll(input.legalActions)) {
    obs[14] = 1;
  } else {
    for (const a of input.legalActions) {
      if (a <= 8) obs[a + 6] = 1;
    }
    obs[14] = 0;
  }

  obs[15 + scoreBucket(input.bankedScore, rules)] = 1;
  obs[20 + scoreBucket(input.opponentScore, rules)] = 1;

  return obs;
}

export function encodeObservation(
  encoding: ObservationEncoding,
  input: ObservationInput,
  rules: Pick<RulesConfig, "scoreBucketWidth" | "scoreBucketCount">
): number[] {
  return encoding === "compact" ? encodeCompact(input) : encodeExtended(input, rules);
}
