// src/engine/game.ts
//
// Multi-player game state machine. Strict rotation; the first bank to reach the target
// wins on the spot (no final round for the others).

import type { GameState, PlayerState, TurnResult } from "../types";
import type { Strategy } from "../strategies/types";
import { makeGameState } from "./makeState";
import type { Rng } from "./rng";
import type { RulesConfig } from "./rulesConstants";
import { playTurn } from "./turn";
import { validateGameState } from "./validateState";

export function currentPlayer(game: GameState): PlayerState {
  return game.players[game.currentPlayerIndex];
}

export function opponentScores(game: GameState, seat: number): number[] {
  return game.players.filter((p) => p.seat !== seat).map((p) => p.bankedScore);
}

/** Round number of the acting player (0 for everyone's first turn). */
export function roundNumber(game: GameState): number {
  return Math.floor(game.turnsPlayed / game.players.length);
}

/**
 * Credit the acting player with `turnScore` (0 on a bust), then either end the game or
 * pass the turn. Pure: returns a new state.
 */
export function applyTurnResult(game: GameState, turnScore: number): GameState {
  if (game.phase === "ended") {
    throw new Error("applyTurnResult: game already ended");
  }
  if (!Number.isInteger(turnScore) || turnScore < 0) {
    throw new RangeError(`applyTurnResult: invalid turn score ${String(turnScore)}`);
  }

  const seat = game.currentPlayerIndex;
  const actor = game.players[seat];
  const bankedScore = actor.bankedScore + turnScore;

  const players = game.players.map((p) => (p.seat === seat ? { ...p, bankedScore } : p));
  const turnsPlayed = game.turnsPlayed + 1;

  const next: GameState =
    bankedScore >= game.targetScore
      ? {
          ...game,
          players,
          turnsPlayed,
          phase: "ended",
          outcome: { kind: "won", winnerIndex: seat, winnerPlayerId: actor.playerId },
        }
      : {
          ...game,
          players,
          turnsPlayed,
          currentPlayerIndex: (seat + 1) % game.players.length,
        };

  validateGameState(next, "applyTurnResult");
  return next;
}

export type PlayGameOptions = {
  rng: Rng;
  rules: RulesConfig;

  // Runaway guard for strategies that never bank. No cap when omitted.
  maxTurns?: number;

  sweepOnBank?: boolean;
  playerNames?: readonly string[];
};

export type TurnRecord = {
  seat: number;
  result: TurnResult;
  bankedAfter: number;
};

export type GameResult = {
  outcome: "won" | "turnLimit";
  winnerIndex?: number;
  scores: number[];
  turns: number;
  history: TurnRecord[];
  finalState: GameState;
};

/** Autonomous self-play of a whole game, one strategy per seat. */
export function playGame(strategies: readonly Strategy[], opts: PlayGameOptions): GameResult {
  let game = makeGameState({
    playerNames: opts.playerNames ?? strategies.map((s) => s.name),
    rules: opts.rules,
  });
  const history: TurnRecord[] = [];

  while (game.phase === "active") {
    if (opts.maxTurns !== undefined && game.turnsPlayed >= opts.maxTurns) {
      return {
        outcome: "turnLimit",
        scores: game.players.map((p) => p.bankedScore),
        turns: game.turnsPlayed,
        history,
        finalState: game,
      };
    }

    const seat = game.currentPlayerIndex;
    const result = playTurn(
      strategies[seat],
      {
        turnNumber: roundNumber(game),
        bankedScore: game.players[seat].bankedScore,
        opponentScores: opponentScores(game, seat),
      },
      { rng: opts.rng, rules: opts.rules, sweepOnBank: opts.sweepOnBank }
    );

    game = applyTurnResult(game, result.turnScore);
    history.push({ seat, result, bankedAfter: game.players[seat].bankedScore });
  }

  return {
    outcome: "won",
    winnerIndex: game.outcome?.winnerIndex,
    scores: game.players.map((p) => p.bankedScore),
    turns: game.turnsPlayed,
    history,
    finalState: game,
  };
}
