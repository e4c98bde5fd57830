// src/engine/legalActions.ts

import type { ActionCode, Roll } from "../types";
import { actionForGroup } from "./actions";
import { evaluate } from "./scorer";
import { ACTION_BANK, ACTION_ROLL } from "./rulesConstants";

export type LegalityInput = {
  dice: Roll;
  mustRoll: boolean;
  justRolled: boolean;
  unbankedScore: number;
  bankedScore: number;
  minFirstBank: number;
};

export function canBank(bankedScore: number, unbankedScore: number, minFirstBank: number): boolean {
  return unbankedScore > 0 && (bankedScore > 0 || unbankedScore >= minFirstBank);
}

/**
 * Exact set of actions valid right now, ascending by code.
 * - must roll (turn start, hot dice): roll only
 * - bank: something unbanked and the get-on-board minimum met
 * - take: every group present in the active dice
 * - roll: unless the previous action was a roll
 */
export function legalActions(input: LegalityInput): ActionCode[] {
  if (input.mustRoll) return [ACTION_ROLL];

  const out: ActionCode[] = [];

  if (canBank(input.bankedScore, input.unbankedScore, input.minFirstBank)) {
    out.push(ACTION_BANK);
  }

  for (const g of evaluate(input.dice)) out.push(actionForGroup(g));

  if (!input.justRolled) out.push(ACTION_ROLL);

  return out.sort((a, b) => a - b);
}

export function actionMask(legal: readonly ActionCode[]): boolean[] {
  const mask = Array.from({ length: 10 }, () => false);
  for (const a of legal) mask[a] = true;
  return mask;
}
