// src/engine/actions.ts
//
// Stable action encoding shared by every consumer of the decision surface:
// 0 = bank, 1..6 = take Triple(face), 7 = take one five, 8 = take one one, 9 = roll.

import type { ActionCode, ScoreGroup } from "../types";
import { triple, SINGLE_FIVE, SINGLE_ONE } from "./scorer";
import { ACTION_BANK, ACTION_ROLL, ACTION_TAKE_FIVE, ACTION_TAKE_ONE } from "./rulesConstants";

export function actionForGroup(group: ScoreGroup): ActionCode {
  switch (group.kind) {
    case "triple":
      return group.face;
    case "singleFive":
      return ACTION_TAKE_FIVE;
    case "singleOne":
      return ACTION_TAKE_ONE;
  }
}

/** The group a take action consumes, or undefined for bank / roll. */
export function groupForAction(action: ActionCode): ScoreGroup | undefined {
  switch (action) {
    case ACTION_BANK:
    case ACTION_ROLL:
      return undefined;
    case ACTION_TAKE_FIVE:
      return SINGLE_FIVE;
    case ACTION_TAKE_ONE:
      return SINGLE_ONE;
    default:
      return triple(action);
  }
}

export function isTakeAction(action: ActionCode): boolean {
  return action !== ACTION_BANK && action !== ACTION_ROLL;
}

export function describeAction(action: ActionCode): string {
  switch (action) {
    case ACTION_BANK:
      return "bank";
    case ACTION_ROLL:
      return "roll";
    case ACTION_TAKE_FIVE:
      return "take a 5 (+50)";
    case ACTION_TAKE_ONE:
      return "take a 1 (+100)";
    default:
      return `take three ${action}s (+${action === 1 ? 1000 : action * 100})`;
  }
}
