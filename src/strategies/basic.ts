// src/strategies/basic.ts

import type { Roll, ScoreGroup } from "../types";
import { triple } from "../engine/scorer";
import { allFives, allOnes, collectSelections, firstTriple } from "./selection";
import type { Strategy, StrategyContext } from "./types";

const TRIPLE_ORDER = [1, 6, 5, 4, 3] as const;

/**
 * Fixed rules: keep rolling while more than two dice remain; take everything that
 * scores, high triples first, then 1s, then three 2s, then 5s.
 */
export function createBasicStrategy(): Strategy {
  return {
    name: "basic",

    shouldRoll(ctx: StrategyContext): boolean {
      return ctx.diceInPlay > 2;
    },

    chooseActions(roll: Roll): ScoreGroup[] {
      return collectSelections(roll, ({ counts }) => {
        const t = firstTriple(counts, TRIPLE_ORDER);
        if (t) return [t];
        if (counts[1] > 0) return allOnes(counts);
        if (counts[2] >= 3) return [triple(2)];
        if (counts[5] > 0) return allFives(counts);
        return [];
      });
    },
  };
}
