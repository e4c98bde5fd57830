// src/engine/turn.ts
//
// Single-turn state machine: AwaitingRoll -> JustRolled -> (AwaitingRoll | Busted | Banked).
//
// The transition functions (startTurn / applyRoll / applyTake / decideRoll) are shared by
// autonomous self-play (playTurn) and the step-wise decision surface (env.ts).

import type { Face, Roll, ScoreGroup, TurnEvent, TurnResult, TurnState } from "../types";
import type { Strategy, StrategyContext } from "../strategies/types";
import { StrategyContractError } from "./errors";
import { rollDice, type Rng } from "./rng";
import { DICE_COUNT, type RulesConfig } from "./rulesConstants";
import { isBlown, rawScore, take } from "./scorer";
import { validateTurnState } from "./validateState";

export function startTurn(): TurnState {
  return {
    unbankedScore: 0,
    diceInPlay: DICE_COUNT,
    mustRoll: true,
    justRolled: false,
    busted: false,
    dice: [],
  };
}

/**
 * Put freshly rolled dice on the table. A blown roll busts the turn and forfeits the
 * unbanked score.
 */
export function applyRoll(turn: TurnState, faces: Roll): TurnState {
  if (faces.length !== turn.diceInPlay) {
    throw new Error(`applyRoll: rolled ${faces.length} dice with ${turn.diceInPlay} in play`);
  }

  const busted = isBlown(faces);
  const next: TurnState = {
    ...turn,
    dice: [...faces],
    mustRoll: false,
    justRolled: true,
    busted,
    unbankedScore: busted ? 0 : turn.unbankedScore,
  };

  validateTurnState(next, "applyRoll");
  return next;
}

export type TakeOutcome = {
  turn: TurnState;
  points: number;
  hotDice: boolean;
};

/**
 * Remove one scoring group from the table. Throws InvalidTakeError if it is not there.
 * Taking the last die is hot dice: six fresh dice and a mandatory roll, score kept.
 */
export function applyTake(turn: TurnState, group: ScoreGroup): TakeOutcome {
  const { points, remaining } = take(turn.dice, group);
  const unbankedScore = turn.unbankedScore + points;
  const hotDice = remaining.length === 0;

  const next: TurnState = hotDice
    ? { ...turn, unbankedScore, dice: [], diceInPlay: DICE_COUNT, mustRoll: true, justRolled: false }
    : { ...turn, unbankedScore, dice: remaining, diceInPlay: remaining.length, justRolled: false };

  validateTurnState(next, "applyTake");
  return { turn: next, points, hotDice };
}

export type RollReason = "getOnBoard" | "target" | "hotDice" | "strategy";

export type RollDecision = { roll: boolean; reason: RollReason };

/**
 * Resolve roll-or-bank after a take, in fixed priority:
 * 1. not on the board yet and below the minimum: roll
 * 2. banked + unbanked reaches the target: bank
 * 3. hot dice: roll
 * 4. otherwise the strategy decides (only called when nothing above applies)
 */
export function decideRoll(
  turn: TurnState,
  bankedScore: number,
  rules: Pick<RulesConfig, "targetScore" | "minFirstBank">,
  strategySays: () => boolean
): RollDecision {
  if (bankedScore === 0 && turn.unbankedScore < rules.minFirstBank) {
    return { roll: true, reason: "getOnBoard" };
  }
  if (bankedScore + turn.unbankedScore >= rules.targetScore) {
    return { roll: false, reason: "target" };
  }
  if (turn.mustRoll) {
    return { roll: true, reason: "hotDice" };
  }
  return { roll: strategySays(), reason: "strategy" };
}

export type TurnContext = {
  turnNumber: number;
  bankedScore: number;
  opponentScores: readonly number[];
};

export type PlayTurnOptions = {
  rng: Rng;
  rules: RulesConfig;

  // On bank, score the leftover dice greedily; using all of them continues the turn.
  sweepOnBank?: boolean;
};

/**
 * Play one full turn for `strategy`. An impossible take from the strategy throws
 * (InvalidTakeError / StrategyContractError): it is a defect, not a game event.
 */
export function playTurn(strategy: Strategy, ctx: TurnContext, opts: PlayTurnOptions): TurnResult {
  const { rng, rules } = opts;
  const events: TurnEvent[] = [];
  let turn = startTurn();

  const strategyContext = (t: TurnState): StrategyContext => ({
    turnNumber: ctx.turnNumber,
    bankedScore: ctx.bankedScore,
    diceInPlay: t.diceInPlay,
    unbankedScore: t.unbankedScore,
    targetScore: rules.targetScore,
    minFirstBank: rules.minFirstBank,
    opponentScores: ctx.opponentScores,
  });

  for (;;) {
    const faces: Face[] = rollDice(rng, turn.diceInPlay);
    const forfeited = turn.unbankedScore;
    turn = applyRoll(turn, faces);
    events.push({ kind: "rolled", dice: faces });

    if (turn.busted) {
      events.push({ kind: "busted", dice: faces, forfeited });
      return { kind: "busted", turnScore: 0, events };
    }

    const selections = strategy.chooseActions(faces, strategyContext(turn));
    if (selections.length === 0) {
      throw new StrategyContractError(strategy.name, `selected nothing from a scoring roll [${faces.join(",")}]`);
    }

    for (const group of selections) {
      const r = applyTake(turn, group);
      turn = r.turn;
      events.push({ kind: "took", group, points: r.points, unbankedScore: turn.unbankedScore });
      if (r.hotDice) events.push({ kind: "hotDice", unbankedScore: turn.unbankedScore });
    }

    const decision = decideRoll(turn, ctx.bankedScore, rules, () =>
      strategy.shouldRoll(strategyContext(turn))
    );
    if (decision.roll) continue;

    if (opts.sweepOnBank && turn.dice.length > 0) {
      const sweep = rawScore(turn.dice);
      if (sweep.totalScore > 0) {
        turn = { ...turn, unbankedScore: turn.unbankedScore + sweep.totalScore };
        events.push({ kind: "swept", points: sweep.totalScore, unbankedScore: turn.unbankedScore });

        if (sweep.remainingDice === 0 && ctx.bankedScore + turn.unbankedScore < rules.targetScore) {
          turn = { ...turn, dice: [], diceInPlay: DICE_COUNT, mustRoll: true, justRolled: false };
          events.push({ kind: "hotDice", unbankedScore: turn.unbankedScore });
          continue;
        }
      }
    }

    events.push({ kind: "banked", amount: turn.unbankedScore });
    return { kind: "banked", turnScore: turn.unbankedScore, events };
  }
}
