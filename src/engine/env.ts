// src/engine/env.ts
//
// Decision surface: one discrete action per step (bank / take-a-group / roll) for an
// external actor, on top of the same turn transitions self-play uses.
//
// TURN MODEL:
// - The agent always sits in seat 0.
// - With opponents, each opponent plays a full strategy-driven turn as soon as the
//   agent's turn ends (bank or bust); the step that ended it reports their turns.
// - Rewards: bank = amount banked (+ WIN_BONUS on a win), busting roll = BUST_PENALTY,
//   illegal action = ILLEGAL_MOVE_PENALTY and the episode resets, everything else 0.

import type { ActionCode, GameState, TurnState } from "../types";
import type { Strategy } from "../strategies/types";
import { groupForAction } from "./actions";
import type { IllegalMoveReason, OpponentTurn, StepErr, StepInfo, StepResponse } from "./envEnvelope";
import { applyTurnResult, opponentScores, roundNumber } from "./game";
import { canBank, legalActions } from "./legalActions";
import { makeGameState } from "./makeState";
import { encodeObservation, type ObservationEncoding } from "./observation";
import { makeSeededRng, randomSeed, rollDice, type Rng } from "./rng";
import {
  ACTION_BANK,
  ACTION_ROLL,
  BUST_PENALTY,
  ILLEGAL_MOVE_PENALTY,
  WIN_BONUS,
  isActionCode,
  resolveRules,
  type RulesConfig,
} from "./rulesConstants";
import { isAvailable } from "./scorer";
import { applyRoll, applyTake, playTurn, startTurn } from "./turn";

export type EnvOptions = {
  rules?: Partial<RulesConfig>;
  opponents?: readonly Strategy[];
  encoding?: ObservationEncoding;

  // Either a seed for a fresh stream, or a stream to share with nothing else.
  seed?: number | string;
  rng?: Rng;

  agentName?: string;
};

export type EnvSession = {
  readonly rules: RulesConfig;
  readonly encoding: ObservationEncoding;
  readonly opponents: readonly Strategy[];
  readonly rng: Rng;
  readonly agentName: string;

  game: GameState;
  turn: TurnState;
  done: boolean;
};

export const AGENT_SEAT = 0;

function freshGame(rules: RulesConfig, agentName: string, opponents: readonly Strategy[]): GameState {
  return makeGameState({
    playerNames: [agentName, ...opponents.map((o) => o.name)],
    rules,
  });
}

export function createEnv(opts: EnvOptions = {}): EnvSession {
  const rules = resolveRules(opts.rules);
  const opponents = opts.opponents ?? [];
  const agentName = opts.agentName ?? "agent";

  return {
    rules,
    encoding: opts.encoding ?? "extended",
    opponents,
    rng: opts.rng ?? makeSeededRng(opts.seed ?? randomSeed()),
    agentName,
    game: freshGame(rules, agentName, opponents),
    turn: startTurn(),
    done: false,
  };
}

/** New episode with the same configuration. The random stream carries on. */
export function resetEnv(session: EnvSession): EnvSession {
  return {
    ...session,
    game: freshGame(session.rules, session.agentName, session.opponents),
    turn: startTurn(),
    done: false,
  };
}

export function agentScore(session: EnvSession): number {
  return session.game.players[AGENT_SEAT].bankedScore;
}

export function envLegalActions(session: EnvSession): ActionCode[] {
  if (session.done) return [];
  return legalActions({
    dice: session.turn.dice,
    mustRoll: session.turn.mustRoll,
    justRolled: session.turn.justRolled,
    unbankedScore: session.turn.unbankedScore,
    bankedScore: agentScore(session),
    minFirstBank: session.rules.minFirstBank,
  });
}

export function observe(session: EnvSession): number[] {
  const others = opponentScores(session.game, AGENT_SEAT);
  return encodeObservation(
    session.encoding,
    {
      diceOnTable: session.turn.dice.length,
      legalActions: envLegalActions(session),
      bankedScore: agentScore(session),
      opponentScore: others.length > 0 ? Math.max(...others) : 0,
    },
    session.rules
  );
}

function illegal(session: EnvSession, reason: IllegalMoveReason): StepErr {
  const reset = resetEnv(session);
  return {
    ok: false,
    error: { code: "ILLEGAL_MOVE", message: reason },
    session: reset,
    observation: observe(reset),
    reward: ILLEGAL_MOVE_PENALTY,
    done: true,
  };
}

/**
 * Close the agent's turn with `turnScore`, let every opponent play, and open the agent's
 * next turn. Returns the ended/continuing session and what the opponents did.
 */
function endAgentTurn(
  session: EnvSession,
  turnScore: number
): { session: EnvSession; opponentTurns: OpponentTurn[] } {
  let game = applyTurnResult(session.game, turnScore);
  const opponentTurns: OpponentTurn[] = [];

  while (game.phase === "active" && game.currentPlayerIndex !== AGENT_SEAT) {
    const seat = game.currentPlayerIndex;
    const result = playTurn(
      session.opponents[seat - 1],
      {
        turnNumber: roundNumber(game),
        bankedScore: game.players[seat].bankedScore,
        opponentScores: opponentScores(game, seat),
      },
      { rng: session.rng, rules: session.rules }
    );
    game = applyTurnResult(game, result.turnScore);
    opponentTurns.push({ seat, result, bankedAfter: game.players[seat].bankedScore });
  }

  return {
    session: { ...session, game, turn: startTurn(), done: game.phase === "ended" },
    opponentTurns,
  };
}

function ok(session: EnvSession, reward: number, info: StepInfo): StepResponse {
  return { ok: true, session, observation: observe(session), reward, done: session.done, info };
}

/**
 * Apply one external action. Illegal actions never throw and are never coerced: they
 * come back as ILLEGAL_MOVE with the penalty and a reset session.
 */
export function stepEnv(session: EnvSession, action: unknown): StepResponse {
  if (session.done) {
    return {
      ok: false,
      error: { code: "EPISODE_ENDED", message: "episode is over; reset before stepping" },
      session,
      observation: observe(session),
      reward: 0,
      done: true,
    };
  }

  if (!isActionCode(action)) return illegal(session, "no such action");

  const turn = session.turn;

  if (action === ACTION_ROLL) {
    if (turn.justRolled) return illegal(session, "rolled twice in a row without busting");

    const rolled = applyRoll(turn, rollDice(session.rng, turn.diceInPlay));
    if (!rolled.busted) {
      return ok({ ...session, turn: rolled }, 0, { action });
    }

    const ended = endAgentTurn(session, 0);
    return ok(ended.session, BUST_PENALTY, {
      action,
      busted: true,
      opponentTurns: ended.opponentTurns,
      ...(ended.session.done ? { result: "loss" as const } : {}),
    });
  }

  if (turn.mustRoll) return illegal(session, "in must-roll state");

  if (action === ACTION_BANK) {
    const banked = agentScore(session);
    if (!canBank(banked, turn.unbankedScore, session.rules.minFirstBank)) {
      return illegal(session, turn.unbankedScore === 0 ? "nothing to bank" : "below the get-on-board minimum");
    }

    const amount = turn.unbankedScore;
    const ended = endAgentTurn(session, amount);
    const outcome = ended.session.game.outcome;

    if (outcome?.winnerIndex === AGENT_SEAT) {
      return ok(ended.session, amount + WIN_BONUS, { action, points: amount, result: "win" });
    }
    return ok(ended.session, amount, {
      action,
      points: amount,
      opponentTurns: ended.opponentTurns,
      ...(outcome ? { result: "loss" as const } : {}),
    });
  }

  const group = groupForAction(action);
  if (!group || !isAvailable(turn.dice, group)) {
    return illegal(
      session,
      group?.kind === "triple" ? "tried to take a combo that was not there" : "tried to take a die that was not there"
    );
  }

  const taken = applyTake(turn, group);
  return ok({ ...session, turn: taken.turn }, 0, {
    action,
    points: taken.points,
    ...(taken.hotDice ? { hotDice: true } : {}),
  });
}
