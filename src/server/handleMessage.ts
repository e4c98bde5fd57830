import type { ClientMessage, ResetMessage, ServerErrorCode, ServerMessage, SessionSnapshot } from "./protocol";
import { createEnv, envLegalActions, observe, stepEnv, type EnvSession } from "../engine/env";
import { makeSeededRng, randomSeed } from "../engine/rng";
import { createStrategy } from "../strategies";

export const SERVER_VERSION = "1.0.0";

export type ConnectionState = {
  clientId?: string;
  session?: EnvSession;
};

export type HandleResult = {
  nextState: ConnectionState;
  serverMessage: ServerMessage;
};

function withReqId<T extends ServerMessage>(msg: T, reqId?: string): T {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function mkError(code: ServerErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

export function snapshot(session: EnvSession): SessionSnapshot {
  return {
    scores: session.game.players.map((p) => p.bankedScore),
    currentPlayerIndex: session.game.currentPlayerIndex,
    unbankedScore: session.turn.unbankedScore,
    dice: [...session.turn.dice],
    mustRoll: session.turn.mustRoll,
    justRolled: session.turn.justRolled,
    done: session.done,
  };
}

function mkObservation(session: EnvSession, reqId?: string): ServerMessage {
  return withReqId(
    {
      type: "observation",
      observation: observe(session),
      legalActions: envLegalActions(session),
      state: snapshot(session),
    },
    reqId
  );
}

/**
 * Build a fresh session from a reset message. Opponent strategies share the session's
 * random stream. Throws on unknown strategies or invalid rules.
 */
function sessionFromReset(msg: ResetMessage): EnvSession {
  const rng = makeSeededRng(msg.seed ?? randomSeed());
  return createEnv({
    rng,
    encoding: msg.encoding,
    rules: msg.rules,
    opponents: (msg.opponents ?? []).map((name) => createStrategy(name, rng)),
  });
}

export function handleClientMessage(state: ConnectionState, msg: ClientMessage): HandleResult {
  switch (msg.type) {
    case "hello": {
      const clientId = msg.clientId ?? state.clientId;
      return {
        nextState: { ...state, clientId },
        serverMessage: withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId }, msg.reqId),
      };
    }

    case "reset": {
      let session: EnvSession;
      try {
        session = sessionFromReset(msg);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return { nextState: state, serverMessage: mkError("BAD_CONFIG", message, msg.reqId) };
      }
      return { nextState: { ...state, session }, serverMessage: mkObservation(session, msg.reqId) };
    }

    case "getLegalActions": {
      if (!state.session) {
        return { nextState: state, serverMessage: mkError("NO_SESSION", "send reset first", msg.reqId) };
      }
      return {
        nextState: state,
        serverMessage: withReqId({ type: "legalActions", actions: envLegalActions(state.session) }, msg.reqId),
      };
    }

    case "step": {
      if (!state.session) {
        return { nextState: state, serverMessage: mkError("NO_SESSION", "send reset first", msg.reqId) };
      }

      const res = stepEnv(state.session, msg.action);
      const session = res.session;

      return {
        nextState: { ...state, session },
        serverMessage: withReqId(
          {
            type: "stepResult",
            ok: res.ok,
            observation: res.observation,
            reward: res.reward,
            done: res.done,
            legalActions: envLegalActions(session),
            state: snapshot(session),
            ...(res.ok ? { info: res.info } : { error: res.error }),
          },
          msg.reqId
        ),
      };
    }
  }
}

