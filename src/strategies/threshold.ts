// src/strategies/threshold.ts

import type { Roll, ScoreGroup } from "../types";
import { triple, SINGLE_FIVE, SINGLE_ONE } from "../engine/scorer";
import { allOnes, collectSelections, firstTriple } from "./selection";
import type { Strategy, StrategyContext } from "./types";

const TRIPLE_ORDER = [1, 6, 5, 4, 3] as const;

/** Bank once the unbanked score reaches table[diceInPlay]. Keys 1..6. */
export type ThresholdTable = Readonly<Record<1 | 2 | 3 | 4 | 5 | 6, number>>;

export const DEFAULT_THRESHOLDS: ThresholdTable = { 1: 300, 2: 300, 3: 350, 4: 400, 5: 500, 6: 600 };

export function thresholdFor(table: ThresholdTable, diceInPlay: number): number {
  switch (diceInPlay) {
    case 1:
    case 2:
    case 3:
    case 4:
    case 5:
    case 6:
      return table[diceInPlay];
    default:
      throw new RangeError(`No threshold for ${diceInPlay} dice`);
  }
}

/**
 * Threshold-table play. Takes are chosen to keep dice in hand on a full six-dice roll:
 * a single 1 (not all of them), or else a single 5.
 */
export function createThresholdStrategy(table: ThresholdTable = DEFAULT_THRESHOLDS): Strategy {
  for (const k of [1, 2, 3, 4, 5, 6] as const) {
    const v = table[k];
    if (!Number.isInteger(v) || v < 0) {
      throw new RangeError(`Invalid threshold for ${k} dice: ${String(v)}`);
    }
  }

  return {
    name: "threshold",

    shouldRoll(ctx: StrategyContext): boolean {
      return ctx.unbankedScore < thresholdFor(table, ctx.diceInPlay);
    },

    chooseActions(roll: Roll): ScoreGroup[] {
      let oneTaken = false;

      return collectSelections(roll, ({ counts, depth, rolledCount }) => {
        const t = firstTriple(counts, TRIPLE_ORDER);
        if (t) return [t];
        if (depth === 0 && rolledCount === 6 && counts[1] > 0) {
          oneTaken = true;
          return [SINGLE_ONE];
        }
        if (counts[1] > 0 && !oneTaken) return allOnes(counts);
        if (depth === 0 && counts[5] > 0) return [SINGLE_FIVE];
        if (depth === 0 && counts[2] >= 3) return [triple(2)];
        return [];
      });
    },
  };
}
