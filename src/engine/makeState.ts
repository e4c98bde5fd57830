import type { GameState, PlayerId, PlayerState } from "../types";
import { DEFAULT_RULES, type RulesConfig } from "./rulesConstants";
import { validateGameState } from "./validateState";

function asPlayerId(s: string): PlayerId {
  return s as PlayerId;
}

function makePlayerState(playerId: PlayerId, seat: number, displayName: string): PlayerState {
  return {
    playerId,
    displayName,
    seat,
    bankedScore: 0,
  };
}

export type MakeGameStateOptions = {
  /** Display names, in seat order. Defaults to "Player 0".."Player n-1". */
  playerNames?: readonly string[];
  playerCount?: number;

  rules?: Pick<RulesConfig, "targetScore" | "minFirstBank">;

  /** Seat that takes the first turn. */
  firstSeat?: number;
};

export function makeGameState(opts: MakeGameStateOptions = {}): GameState {
  const rules = opts.rules ?? DEFAULT_RULES;
  const names =
    opts.playerNames ?? Array.from({ length: opts.playerCount ?? 2 }, (_, seat) => `Player ${seat}`);

  if (names.length < 1) {
    throw new RangeError("makeGameState: at least one player is required");
  }

  const firstSeat = opts.firstSeat ?? 0;
  if (!Number.isInteger(firstSeat) || firstSeat < 0 || firstSeat >= names.length) {
    throw new RangeError(`makeGameState: firstSeat ${String(firstSeat)} out of range`);
  }

  const game: GameState = {
    phase: "active",
    players: names.map((name, seat) => makePlayerState(asPlayerId(`p${seat}`), seat, name)),
    currentPlayerIndex: firstSeat,
    turnsPlayed: 0,
    targetScore: rules.targetScore,
    minFirstBank: rules.minFirstBank,
  };

  validateGameState(game, "makeGameState");
  return game;
}
