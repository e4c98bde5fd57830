import { describe, it, expect } from "vitest";
import type { ActionCode } from "../src/types";
import { isBlown, takeAll, triple, SINGLE_FIVE, SINGLE_ONE } from "../src/engine/scorer";
import { makeSeededRng, rollDice } from "../src/engine/rng";
import { StrategyContractError } from "../src/engine/errors";
import {
  createBasicStrategy,
  createCautiousStrategy,
  createGameAwareStrategy,
  createPolicyStrategy,
  createRandomStrategy,
  createStrategy,
  createThresholdStrategy,
  DEFAULT_THRESHOLDS,
  strategyNames,
  type DecisionModel,
} from "../src/strategies";
import { thresholdFor } from "../src/strategies/threshold";
import { ctx, hot } from "./helpers";

describe("basic", () => {
  const s = createBasicStrategy();

  it("takes a high triple, then every 1", () => {
    expect(s.chooseActions([1, 1, 5, 5, 5, 2], ctx())).toEqual([triple(5), SINGLE_ONE, SINGLE_ONE]);
  });

  it("rolls while more than two dice remain", () => {
    expect(s.shouldRoll(ctx({ diceInPlay: 3 }))).toBe(true);
    expect(s.shouldRoll(ctx({ diceInPlay: 2 }))).toBe(false);
  });

  it("selects nothing from a blown roll", () => {
    expect(s.chooseActions([2, 3, 4, 6, 6, 3], ctx())).toEqual([]);
  });
});

describe("cautious", () => {
  const s = createCautiousStrategy();

  it("takes at most one loose 5, and only as the first pick", () => {
    expect(s.chooseActions([5, 5, 2, 3, 4, 6], ctx())).toEqual([SINGLE_FIVE]);
    expect(s.chooseActions([2, 2, 2, 5, 3, 4], ctx())).toEqual([SINGLE_FIVE]);
    expect(s.chooseActions([5, 5, 5, 5, 2, 3], ctx())).toEqual([triple(5)]);
  });

  it("banks by the score-versus-dice ladder", () => {
    expect(s.shouldRoll(ctx({ unbankedScore: 1000, diceInPlay: 5 }))).toBe(false);
    expect(s.shouldRoll(ctx({ unbankedScore: 600, diceInPlay: 5 }))).toBe(true);
    expect(s.shouldRoll(ctx({ unbankedScore: 600, diceInPlay: 4 }))).toBe(false);
    expect(s.shouldRoll(ctx({ unbankedScore: 0, diceInPlay: 1 }))).toBe(false);
  });
});

describe("threshold", () => {
  const s = createThresholdStrategy();

  it("banks once the unbanked score reaches the table entry", () => {
    expect(s.shouldRoll(ctx({ unbankedScore: 299, diceInPlay: 1 }))).toBe(true);
    expect(s.shouldRoll(ctx({ unbankedScore: 300, diceInPlay: 1 }))).toBe(false);
    expect(s.shouldRoll(ctx({ unbankedScore: 550, diceInPlay: 6 }))).toBe(true);
  });

  it("keeps dice in hand on a full roll by taking a single 1", () => {
    expect(s.chooseActions([1, 1, 5, 2, 3, 4], ctx())).toEqual([SINGLE_ONE]);
  });

  it("takes a single 5 only as the first pick", () => {
    expect(s.chooseActions([5, 5, 2, 3, 4, 6], ctx())).toEqual([SINGLE_FIVE]);
  });

  it("takes every 1 from a partial roll", () => {
    expect(s.chooseActions([1, 1, 5], ctx({ diceInPlay: 3 }))).toEqual([SINGLE_ONE, SINGLE_ONE]);
  });

  it("validates its table", () => {
    expect(() => createThresholdStrategy({ ...DEFAULT_THRESHOLDS, 3: -5 })).toThrow(
      "Invalid threshold for 3 dice: -5"
    );
    expect(() => thresholdFor(DEFAULT_THRESHOLDS, 0)).toThrow("No threshold for 0 dice");
  });
});

describe("gameAware", () => {
  const s = createGameAwareStrategy("baseline");

  it("is named after its risk preference", () => {
    expect(s.name).toBe("gameAware:baseline");
  });

  it("takes one 1 from a full roll, then every 5", () => {
    expect(s.chooseActions([1, 5, 5, 2, 3, 4], ctx())).toEqual([SINGLE_ONE, SINGLE_FIVE, SINGLE_FIVE]);
    expect(s.chooseActions([1, 1, 5, 5, 2, 3], ctx())).toEqual([SINGLE_ONE, SINGLE_ONE, SINGLE_FIVE, SINGLE_FIVE]);
  });

  it("takes three 2s like any other triple", () => {
    expect(s.chooseActions([2, 2, 2, 3, 4, 6], ctx())).toEqual([triple(2)]);
  });

  it("uses its threshold table far from the end", () => {
    const c = { diceInPlay: 3, opponentScores: [0] };
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 300 }))).toBe(true);
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 400 }))).toBe(false);
  });

  it("banks once the turn covers what is left to go when an opponent is about to finish", () => {
    const c = { diceInPlay: 3, bankedScore: 9000, opponentScores: [9500] };
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 500 }))).toBe(false);
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 450 }))).toBe(true);
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 300 }))).toBe(true);
  });

  it("pushes harder when the opponent is close and the win is out of reach", () => {
    const c = { diceInPlay: 3, bankedScore: 5000, opponentScores: [9500] };
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 550 }))).toBe(true);
    expect(s.shouldRoll(ctx({ ...c, unbankedScore: 600 }))).toBe(false);
  });

  it("never rolls past the target", () => {
    expect(s.shouldRoll(ctx({ bankedScore: 9800, unbankedScore: 200, diceInPlay: 6 }))).toBe(false);
  });
});

describe("random", () => {
  it("always takes something valid from a scoring roll", () => {
    const rng = makeSeededRng("random-takes");
    const s = createRandomStrategy(rng);
    for (let i = 0; i < 200; i++) {
      const roll = rollDice(rng, 6);
      const picked = s.chooseActions(roll, ctx());
      expect(picked.length > 0).toBe(!isBlown(roll));
      expect(() => takeAll(roll, picked)).not.toThrow();
    }
  });

  it("is reproducible from its seed", () => {
    const a = createRandomStrategy(makeSeededRng(5));
    const b = createRandomStrategy(makeSeededRng(5));
    const roll = [1, 1, 1, 5, 5, 2] as const;
    expect(a.chooseActions(roll, ctx())).toEqual(b.chooseActions(roll, ctx()));
    expect(a.shouldRoll(ctx())).toBe(b.shouldRoll(ctx()));
  });
});

describe("policy", () => {
  function model(pickFrom: "first" | "last", seen: number[][] = []): DecisionModel {
    return {
      predict(observation, mask) {
        seen.push([...observation]);
        const legal = mask.flatMap((on, a) => (on ? [a] : []));
        const a = pickFrom === "first" ? legal[0] : legal[legal.length - 1];
        if (a === undefined || a > 9) throw new Error("empty mask");
        return toAction(a);
      },
    };
  }

  function toAction(a: number): ActionCode {
    const codes: readonly ActionCode[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    const found = codes.find((c) => c === a);
    if (found === undefined) throw new Error(`not an action: ${a}`);
    return found;
  }

  it("takes until the model answers bank or roll", () => {
    const seen: number[][] = [];
    const s = createPolicyStrategy(model("last", seen));
    expect(s.chooseActions([1, 5, 2, 3, 4, 6], ctx({ bankedScore: 2000 }))).toEqual([SINGLE_ONE]);
    expect(hot(seen[0])).toEqual([5, 13, 16, 20]);
    expect(seen).toHaveLength(2);
  });

  it("stops on a bank answer after the first take", () => {
    const s = createPolicyStrategy(model("first"));
    expect(s.chooseActions([1, 5, 2, 3, 4, 6], ctx({ bankedScore: 2000 }))).toEqual([SINGLE_FIVE]);
  });

  it("asks the model about rolling with the right mask", () => {
    const s = createPolicyStrategy(model("first"));
    expect(s.shouldRoll(ctx({ unbankedScore: 500, diceInPlay: 3 }))).toBe(true);
    expect(s.shouldRoll(ctx({ bankedScore: 2000, unbankedScore: 500, diceInPlay: 3 }))).toBe(false);
  });

  it("rejects a masked action from the model", () => {
    const s = createPolicyStrategy({ predict: () => 3 });
    expect(() => s.chooseActions([1, 5, 2, 3, 4, 6], ctx())).toThrow(StrategyContractError);
    expect(() => s.chooseActions([1, 5, 2, 3, 4, 6], ctx())).toThrow(
      'Strategy "policy": model chose masked action 3'
    );
  });
});

describe("strategy registry", () => {
  it("lists every built-in strategy by name", () => {
    expect(strategyNames()).toEqual([
      "basic",
      "cautious",
      "threshold",
      "random",
      "gameAware:conservative",
      "gameAware:baseline",
      "gameAware:aggressive",
      "gameAware",
    ]);
  });

  it("builds strategies by name", () => {
    expect(createStrategy("gameAware:aggressive").name).toBe("gameAware:aggressive");
    expect(createStrategy("gameAware").name).toBe("gameAware:baseline");
    expect(() => createStrategy("nope")).toThrow('Unknown strategy "nope"');
  });

  it("every registered strategy makes only valid selections", () => {
    const rng = makeSeededRng("registry");
    for (const name of strategyNames()) {
      const s = createStrategy(name, rng);
      for (let i = 0; i < 100; i++) {
        const roll = rollDice(rng, 1 + (i % 6));
        const picked = s.chooseActions(roll, ctx({ diceInPlay: roll.length }));
        expect(picked.length > 0).toBe(!isBlown(roll));
        expect(() => takeAll(roll, picked)).not.toThrow();
      }
    }
  });
});
