// src/strategies/cautious.ts

import type { Roll, ScoreGroup } from "../types";
import { triple, SINGLE_FIVE } from "../engine/scorer";
import { allOnes, collectSelections, firstTriple } from "./selection";
import type { Strategy, StrategyContext } from "./types";

const TRIPLE_ORDER = [1, 6, 5, 4, 3] as const;

// [minimum unbanked score, at or below this many dice] => bank
const BANK_LADDER: readonly (readonly [number, number])[] = [
  [1000, 5],
  [600, 4],
  [350, 3],
  [200, 2],
];

/**
 * Conservative play: bank early as dice run low, and keep dice in hand by taking
 * at most one loose 5, only as the first pick of a roll.
 */
export function createCautiousStrategy(): Strategy {
  return {
    name: "cautious",

    shouldRoll(ctx: StrategyContext): boolean {
      for (const [score, dice] of BANK_LADDER) {
        if (ctx.unbankedScore >= score && ctx.diceInPlay <= dice) return false;
      }
      return ctx.diceInPlay >= 2;
    },

    chooseActions(roll: Roll): ScoreGroup[] {
      return collectSelections(roll, ({ counts, depth }) => {
        const t = firstTriple(counts, TRIPLE_ORDER);
        if (t) return [t];
        if (counts[1] > 0) return allOnes(counts);
        if (depth === 0 && counts[5] > 0) return [SINGLE_FIVE];
        if (depth === 0 && counts[2] >= 3) return [triple(2)];
        return [];
      });
    },
  };
}
