import type { ActionCode, TurnResult } from "../types";
import type { EnvSession } from "./env";

export type EnvErrorCode = "ILLEGAL_MOVE" | "EPISODE_ENDED";

/** Stable reason strings reported with ILLEGAL_MOVE. */
export type IllegalMoveReason =
  | "no such action"
  | "rolled twice in a row without busting"
  | "in must-roll state"
  | "tried to take a combo that was not there"
  | "tried to take a die that was not there"
  | "nothing to bank"
  | "below the get-on-board minimum";

export type EnvError = {
  code: EnvErrorCode;
  message: string;
};

export type OpponentTurn = {
  seat: number;
  result: TurnResult;
  bankedAfter: number;
};

export type StepInfo = {
  action: ActionCode;

  /** Points scored by a take, or banked by a bank. */
  points?: number;
  busted?: boolean;
  hotDice?: boolean;

  /** Set when the episode ends with a winner. */
  result?: "win" | "loss";

  /** Full turns the opponents played after the agent's turn ended. */
  opponentTurns?: readonly OpponentTurn[];
};

export type StepOk = {
  ok: true;
  session: EnvSession;
  observation: number[];
  reward: number;
  done: boolean;
  info: StepInfo;
};

/**
 * ILLEGAL_MOVE: the episode ends, the penalty applies, and `session` is already reset.
 * EPISODE_ENDED: the session was finished before this step; nothing changed.
 */
export type StepErr = {
  ok: false;
  error: EnvError;
  session: EnvSession;
  observation: number[];
  reward: number;
  done: true;
};

export type StepResponse = StepOk | StepErr;
