// src/server/protocol.ts
//
// JSON-over-WebSocket bridge to the decision surface, for trainers running out of
// process. One environment session per connection.

import type { ActionCode } from "../types";
import type { EnvErrorCode, StepInfo } from "../engine/envEnvelope";
import type { ObservationEncoding } from "../engine/observation";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage = HelloMessage | ResetMessage | StepMessage | GetLegalActionsMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Start (or restart) the episode. Options are locked until the next reset.
 */
export interface ResetMessage {
  type: "reset";
  seed?: number | string;

  /** Registered strategy names, one per opponent seat. Empty/omitted = single-player. */
  opponents?: string[];

  encoding?: ObservationEncoding;
  rules?: { targetScore?: number; minFirstBank?: number };
  reqId?: string;
}

/**
 * `action` is deliberately unknown: out-of-range codes are an illegal move for the
 * episode, not a malformed message.
 */
export interface StepMessage {
  type: "step";
  action: unknown;
  reqId?: string;
}

export interface GetLegalActionsMessage {
  type: "getLegalActions";
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | ObservationMessage
  | StepResultMessage
  | LegalActionsMessage
  | ErrorMessage;

export interface SessionSnapshot {
  scores: number[];
  currentPlayerIndex: number;
  unbankedScore: number;
  dice: number[];
  mustRoll: boolean;
  justRolled: boolean;
  done: boolean;
}

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId?: string;
  reqId?: string;
}

export interface ObservationMessage {
  type: "observation";
  observation: number[];
  legalActions: ActionCode[];
  state: SessionSnapshot;
  reqId?: string;
}

export interface StepResultMessage {
  type: "stepResult";
  ok: boolean;
  observation: number[];
  reward: number;
  done: boolean;
  legalActions: ActionCode[];
  state: SessionSnapshot;
  info?: StepInfo;
  error?: { code: EnvErrorCode; message: string };
  reqId?: string;
}

export interface LegalActionsMessage {
  type: "legalActions";
  actions: ActionCode[];
  reqId?: string;
}

export type ServerErrorCode = "BAD_MESSAGE" | "NO_SESSION" | "BAD_CONFIG";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  reqId?: string;
}
