import type { Face, Roll, ScoreGroup, TurnState } from "../src/types";
import type { Rng } from "../src/engine/rng";
import { DEFAULT_RULES, type RulesConfig } from "../src/engine/rulesConstants";
import { createBasicStrategy } from "../src/strategies/basic";
import type { Strategy, StrategyContext } from "../src/strategies/types";

/**
 * Rng that rolls exactly `faces`, in order, then throws. Each value lands in the
 * middle of its face's sixth of [0, 1).
 */
export function scriptedRng(...faces: Face[]): Rng {
  const queue = [...faces];
  return () => {
    const f = queue.shift();
    if (f === undefined) throw new Error("scriptedRng: out of scripted faces");
    return (f - 1) / 6 + 1 / 12;
  };
}

export function rules(overrides: Partial<RulesConfig> = {}): RulesConfig {
  return { ...DEFAULT_RULES, ...overrides };
}

export function ctx(overrides: Partial<StrategyContext> = {}): StrategyContext {
  return {
    turnNumber: 0,
    bankedScore: 0,
    diceInPlay: 6,
    unbankedScore: 0,
    targetScore: DEFAULT_RULES.targetScore,
    minFirstBank: DEFAULT_RULES.minFirstBank,
    opponentScores: [],
    ...overrides,
  };
}

export function turnState(overrides: Partial<TurnState> = {}): TurnState {
  return {
    unbankedScore: 0,
    diceInPlay: 6,
    mustRoll: true,
    justRolled: false,
    busted: false,
    dice: [],
    ...overrides,
  };
}

/** Takes like `basic`, rolls as `roll` says. */
export function stubStrategy(
  roll: (c: StrategyContext) => boolean,
  choose: (r: Roll) => ScoreGroup[] = (r) => createBasicStrategy().chooseActions(r, ctx())
): Strategy {
  return { name: "stub", shouldRoll: roll, chooseActions: choose };
}

/** Indices of the set slots of an observation vector. */
export function hot(obs: readonly number[]): number[] {
  const out: number[] = [];
  obs.forEach((v, i) => {
    if (v === 1) out.push(i);
  });
  return out;
}
