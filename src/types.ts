// src/types.ts

export type PlayerId = string & { readonly __brand: "PlayerId" };

export type Face = 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Active dice on the table. Order is not meaningful; dice already taken this
 * roll-sequence are removed rather than zeroed.
 */
export type Roll = readonly Face[];

export type ScoreGroup =
  | { kind: "triple"; face: Face }
  | { kind: "singleOne" }
  | { kind: "singleFive" };

/**
 * Discrete external actions.
 * 0 = bank, 1..6 = take Triple(face), 7 = take one five, 8 = take one one, 9 = roll.
 */
export type ActionCode = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface TurnState {
  unbankedScore: number;

  // Dice the next roll will use (6 at turn start and after hot dice).
  diceInPlay: number;

  mustRoll: boolean;
  justRolled: boolean;
  busted: boolean;

  // Untaken dice from the latest roll. Empty before the first roll and after hot dice.
  dice: Roll;
}

export interface PlayerState {
  playerId: PlayerId;
  displayName: string;
  seat: number;
  bankedScore: number;
}

export type GameOutcome = {
  kind: "won";
  winnerIndex: number;
  winnerPlayerId: PlayerId;
};

export interface GameState {
  phase: "active" | "ended";
  players: readonly PlayerState[];
  currentPlayerIndex: number;

  // Completed turns across all players.
  turnsPlayed: number;

  targetScore: number;
  minFirstBank: number;

  outcome?: GameOutcome;
}

export type TurnEvent =
  | { kind: "rolled"; dice: Roll }
  | { kind: "took"; group: ScoreGroup; points: number; unbankedScore: number }
  | { kind: "hotDice"; unbankedScore: number }
  | { kind: "swept"; points: number; unbankedScore: number }
  | { kind: "busted"; dice: Roll; forfeited: number }
  | { kind: "banked"; amount: number };

export type TurnResult =
  | { kind: "banked"; turnScore: number; events: readonly TurnEvent[] }
  | { kind: "busted"; turnScore: 0; events: readonly TurnEvent[] };
