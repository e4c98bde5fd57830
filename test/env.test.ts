import { describe, it, expect } from "vitest";
import { createEnv, envLegalActions, observe, stepEnv, type EnvSession } from "../src/engine/env";
import type { StepResponse } from "../src/engine/envEnvelope";
import { createBasicStrategy } from "../src/strategies/basic";
import { hot, scriptedRng } from "./helpers";
import type { Face } from "../src/types";

function session(faces: Face[], opts: Parameters<typeof createEnv>[0] = {}): EnvSession {
  return createEnv({ ...opts, rng: scriptedRng(...faces) });
}

function steps(s: EnvSession, actions: unknown[]): StepResponse {
  let cur = s;
  let last: StepResponse | undefined;
  for (const a of actions) {
    last = stepEnv(cur, a);
    cur = last.session;
  }
  if (!last) throw new Error("no steps");
  return last;
}

describe("env: start of episode", () => {
  it("offers only a roll and encodes the empty table", () => {
    const s = session([]);
    expect(envLegalActions(s)).toEqual([9]);
    expect(hot(observe(s))).toEqual([14, 15, 20]);
  });

  it("supports the compact encoding", () => {
    const s = session([], { encoding: "compact" });
    expect(observe(s)).toHaveLength(15);
    expect(hot(observe(s))).toEqual([14]);
  });
});

describe("env: illegal actions", () => {
  it.each([
    [42, "no such action"],
    ["9", "no such action"],
    [1.5, "no such action"],
    [0, "in must-roll state"],
    [8, "in must-roll state"],
  ])("action %j at turn start is rejected as %s", (action, reason) => {
    const res = stepEnv(session([]), action);
    expect(res.ok).toBe(false);
    expect(res.reward).toBe(-1);
    expect(res.done).toBe(true);
    if (!res.ok) expect(res.error).toEqual({ code: "ILLEGAL_MOVE", message: reason });
  });

  it("rejects a second roll in a row", () => {
    const res = steps(session([1, 5, 2, 3, 4, 6]), [9, 9]);
    expect(res.ok).toBe(false);
    if (!res.ok) expect(res.error.message).toBe("rolled twice in a row without busting");
  });

  it("distinguishes a missing combo from a missing die", () => {
    const combo = steps(session([1, 5, 2, 3, 4, 6]), [9, 3]);
    const die = steps(session([1, 2, 2, 3, 4, 6]), [9, 7]);
    expect(combo.ok ? undefined : combo.error.message).toBe("tried to take a combo that was not there");
    expect(die.ok ? undefined : die.error.message).toBe("tried to take a die that was not there");
  });

  it("explains why a bank is refused", () => {
    const nothing = steps(session([1, 5, 2, 3, 4, 6]), [9, 0]);
    const tooLow = steps(session([1, 5, 2, 3, 4, 6]), [9, 8, 0]);
    expect(nothing.ok ? undefined : nothing.error.message).toBe("nothing to bank");
    expect(tooLow.ok ? undefined : tooLow.error.message).toBe("below the get-on-board minimum");
  });

  it("resets the episode after an illegal action", () => {
    const res = steps(session([1, 5, 2, 3, 4, 6]), [9, 8, 3]);
    expect(res.session.turn.unbankedScore).toBe(0);
    expect(res.session.turn.mustRoll).toBe(true);
    expect(res.session.done).toBe(false);
    expect(envLegalActions(res.session)).toEqual([9]);
  });
});

describe("env: legal play", () => {
  it("a scoring roll yields 0 reward and the take actions", () => {
    const res = stepEnv(session([1, 5, 2, 3, 4, 6]), 9);
    expect(res).toMatchObject({ ok: true, reward: 0, done: false, info: { action: 9 } });
    expect(envLegalActions(res.session)).toEqual([7, 8]);
    expect(hot(res.observation)).toEqual([5, 13, 15, 20]);
  });

  it("a take reports its points and re-allows rolling", () => {
    const res = steps(session([1, 5, 2, 3, 4, 6]), [9, 8]);
    expect(res).toMatchObject({ ok: true, reward: 0, info: { action: 8, points: 100 } });
    expect(res.session.turn.unbankedScore).toBe(100);
    expect(envLegalActions(res.session)).toEqual([7, 9]);
  });

  it("a busting roll costs the bust penalty and starts a new turn", () => {
    const res = stepEnv(session([2, 2, 3, 4, 6, 6]), 9);
    expect(res).toMatchObject({ ok: true, reward: -10, done: false, info: { action: 9, busted: true } });
    expect(envLegalActions(res.session)).toEqual([9]);
    expect(res.session.game.turnsPlayed).toBe(1);
  });

  it("taking every die leaves roll as the only action", () => {
    const res = steps(session([1, 1, 1, 5, 5, 5]), [9, 1, 5]);
    expect(res).toMatchObject({ ok: true, info: { action: 5, points: 500, hotDice: true } });
    expect(envLegalActions(res.session)).toEqual([9]);
    expect(hot(res.observation)).toEqual([14, 15, 20]);
  });

  it("a winning bank pays the amount plus the win bonus and ends the episode", () => {
    const s = session([1, 1, 1, 2, 3, 4], { rules: { targetScore: 1000, minFirstBank: 100 } });
    const res = steps(s, [9, 1, 0]);

    expect(res).toMatchObject({ ok: true, reward: 2000, done: true, info: { action: 0, points: 1000, result: "win" } });
    expect(envLegalActions(res.session)).toEqual([]);

    const after = stepEnv(res.session, 9);
    expect(after.ok).toBe(false);
    expect(after.reward).toBe(0);
    if (!after.ok) expect(after.error.code).toBe("EPISODE_ENDED");
  });

  it("opponents play their turn after the agent banks", () => {
    const s = session([1, 1, 1, 5, 2, 3, 2, 2, 3, 4, 6, 6], { opponents: [createBasicStrategy()] });
    const res = steps(s, [9, 1, 7, 0]);

    expect(res.ok).toBe(true);
    expect(res.reward).toBe(1050);
    if (!res.ok) return;
    expect(res.info.points).toBe(1050);
    expect(res.info.opponentTurns?.map((t) => [t.seat, t.result.kind, t.bankedAfter])).toEqual([[1, "busted", 0]]);
    expect(res.session.game.players.map((p) => p.bankedScore)).toEqual([1050, 0]);
    expect(res.session.game.currentPlayerIndex).toBe(0);
    expect(envLegalActions(res.session)).toEqual([9]);
  });
});
