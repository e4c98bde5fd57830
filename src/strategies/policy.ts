// src/strategies/policy.ts
//
// Delegates every decision to an externally trained model that consumes the extended
// observation and an action mask (the same surface the training harness sees).

import type { ActionCode, Face, Roll, ScoreGroup } from "../types";
import { groupForAction, isTakeAction } from "../engine/actions";
import { actionMask, canBank, legalActions } from "../engine/legalActions";
import { encodeExtended } from "../engine/observation";
import { DEFAULT_RULES, ACTION_ROLL, type RulesConfig } from "../engine/rulesConstants";
import { take } from "../engine/scorer";
import { StrategyContractError } from "../engine/errors";
import type { Strategy, StrategyContext } from "./types";

export interface DecisionModel {
  predict(observation: readonly number[], mask: readonly boolean[]): ActionCode;
}

export type PolicyStrategyOptions = {
  name?: string;
  rules?: Pick<RulesConfig, "scoreBucketWidth" | "scoreBucketCount">;
};

export function createPolicyStrategy(model: DecisionModel, opts: PolicyStrategyOptions = {}): Strategy {
  const name = opts.name ?? "policy";
  const rules = opts.rules ?? DEFAULT_RULES;

  const ask = (ctx: StrategyContext, diceOnTable: number, legal: readonly ActionCode[]): ActionCode => {
    const observation = encodeExtended(
      {
        diceOnTable,
        legalActions: legal,
        bankedScore: ctx.bankedScore,
        opponentScore: ctx.opponentScores.length > 0 ? Math.max(...ctx.opponentScores) : 0,
      },
      rules
    );
    const action = model.predict(observation, actionMask(legal));
    if (!legal.includes(action)) {
      throw new StrategyContractError(name, `model chose masked action ${action}`);
    }
    return action;
  };

  return {
    name,

    shouldRoll(ctx: StrategyContext): boolean {
      const legal: ActionCode[] = canBank(ctx.bankedScore, ctx.unbankedScore, ctx.minFirstBank)
        ? [0, ACTION_ROLL]
        : [ACTION_ROLL];
      return ask(ctx, ctx.diceInPlay, legal) === ACTION_ROLL;
    },

    chooseActions(roll: Roll, ctx: StrategyContext): ScoreGroup[] {
      const out: ScoreGroup[] = [];
      let rest: Face[] = [...roll];
      let unbanked = ctx.unbankedScore;

      while (rest.length > 0) {
        const takes = legalActions({
          dice: rest,
          mustRoll: false,
          justRolled: out.length === 0,
          unbankedScore: unbanked,
          bankedScore: ctx.bankedScore,
          minFirstBank: ctx.minFirstBank,
        }).filter((a) => out.length > 0 || isTakeAction(a));

        if (!takes.some(isTakeAction)) break;

        const action = ask({ ...ctx, unbankedScore: unbanked }, rest.length, takes);
        const group = groupForAction(action);
        if (!group) break; // bank or roll: done taking from this roll

        const r = take(rest, group);
        rest = r.remaining;
        unbanked += r.points;
        out.push(group);
      }

      return out;
    },
  };
}
