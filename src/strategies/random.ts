// src/strategies/random.ts

import type { Face, Roll, ScoreGroup } from "../types";
import { evaluate, isBlown, take } from "../engine/scorer";
import { chance, pick, type Rng } from "../engine/rng";
import type { Strategy } from "./types";

/**
 * Chaotic baseline: coin-flip roll decisions, uniformly random legal takes.
 * Always takes at least one group, then flips a coin to keep going.
 */
export function createRandomStrategy(rng: Rng): Strategy {
  return {
    name: "random",

    shouldRoll(): boolean {
      return chance(rng);
    },

    chooseActions(roll: Roll): ScoreGroup[] {
      if (isBlown(roll)) return [];

      const out: ScoreGroup[] = [];
      let rest: Face[] = [...roll];

      for (;;) {
        const available = evaluate(rest);
        if (available.length === 0) break;

        const g = pick(rng, available);
        rest = take(rest, g).remaining;
        out.push(g);

        if (chance(rng)) break;
      }

      return out;
    },
  };
}
