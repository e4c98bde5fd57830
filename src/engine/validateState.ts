import type { GameState, TurnState } from "../types";
import { StateInvariantError } from "./errors";
import { DICE_COUNT } from "./rulesConstants";

const VALIDATE = process.env.BLEWIT_VALIDATE_STATE !== "0";

/**
 * validateTurnState / validateGameState (shape + invariants only)
 *
 * Safe to run at every internal checkpoint (after a roll, after a take, after a bank).
 * No rule duplication: this never decides legality, only that the state is well-formed.
 * Disable with BLEWIT_VALIDATE_STATE=0 for long simulation batches.
 */
export function validateTurnState(turn: TurnState, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(turn, "turn missing", where);
  assertScore(turn.unbankedScore, "turn.unbankedScore", where);

  assert(Number.isInteger(turn.diceInPlay), "turn.diceInPlay not integer", where);
  assert(turn.diceInPlay >= 0 && turn.diceInPlay <= DICE_COUNT, "turn.diceInPlay out of range", where);

  assert(Array.isArray(turn.dice), "turn.dice missing", where);
  assert(turn.dice.length <= DICE_COUNT, "turn.dice has more than 6 dice", where);
  for (const d of turn.dice) {
    assert(Number.isInteger(d) && d >= 1 && d <= 6, `turn.dice has invalid face ${String(d)}`, where);
  }

  if (!turn.mustRoll) {
    assert(
      turn.dice.length === turn.diceInPlay,
      `turn.dice (${turn.dice.length}) disagrees with diceInPlay (${turn.diceInPlay})`,
      where
    );
  } else {
    assert(turn.dice.length === 0, "turn.mustRoll with dice still on the table", where);
  }

  if (turn.busted) {
    assert(turn.unbankedScore === 0, "busted turn kept unbanked score", where);
  }
}

export function validateGameState(game: GameState, where = "unknown"): void {
  if (!VALIDATE) return;

  assert(game, "game missing", where);
  assert(game.phase === "active" || game.phase === "ended", "phase invalid", where);

  assert(Array.isArray(game.players), "players missing", where);
  assert(game.players.length > 0, "no players", where);

  game.players.forEach((p, i) => {
    assert(p.seat === i, `player.seat mismatch at index ${i}`, where);
    assert(typeof p.playerId === "string" && p.playerId.length > 0, `player.playerId invalid at ${i}`, where);
    assert(typeof p.displayName === "string", `player.displayName invalid at ${i}`, where);
    assertScore(p.bankedScore, `players[${i}].bankedScore`, where);
  });

  assert(
    Number.isInteger(game.currentPlayerIndex) &&
      game.currentPlayerIndex >= 0 &&
      game.currentPlayerIndex < game.players.length,
    "currentPlayerIndex out of range",
    where
  );

  assertScore(game.turnsPlayed, "turnsPlayed", where);
  assert(game.targetScore > 0, "targetScore must be positive", where);
  assert(game.minFirstBank > 0, "minFirstBank must be positive", where);

  if (game.phase === "ended") {
    assert(game.outcome, "ended game has no outcome", where);
  }

  if (game.outcome) {
    const w = game.players[game.outcome.winnerIndex];
    assert(w, "outcome.winnerIndex out of range", where);
    assert(w.bankedScore >= game.targetScore, "winner below targetScore", where);
    assert(w.playerId === game.outcome.winnerPlayerId, "outcome.winnerPlayerId mismatch", where);
  }
}

function assertScore(v: number, name: string, where: string): void {
  assert(Number.isInteger(v), `${name} not integer`, where);
  assert(v >= 0, `${name} negative`, where);
}

function assert(cond: unknown, msg: string, where: string): asserts cond {
  if (!cond) throw new StateInvariantError(msg, where);
}
