// src/strategies/gameAware.ts
//
// Banking thresholds derived from an exact dynamic program over all roll outcomes
// (singles 1/5 + triples, hot dice, first past the target wins), plus endgame racing
// against the closest opponent.

import type { Roll, ScoreGroup } from "../types";
import { SINGLE_FIVE, SINGLE_ONE } from "../engine/scorer";
import { allFives, allOnes, collectSelections, firstTriple } from "./selection";
import type { Strategy, StrategyContext } from "./types";
import { thresholdFor, type ThresholdTable } from "./threshold";

export type RiskPreference = "conservative" | "baseline" | "aggressive";

export const RISK_THRESHOLDS: Readonly<Record<RiskPreference, ThresholdTable>> = {
  conservative: { 1: 150, 2: 200, 3: 300, 4: 800, 5: 2700, 6: 10000 },
  baseline: { 1: 250, 2: 250, 3: 400, 4: 1000, 5: 2900, 6: 10050 },
  aggressive: { 1: 300, 2: 300, 3: 500, 4: 1200, 5: 3200, 6: 10050 },
};

// An opponent this close to the target is a coin flip to finish next turn.
const RACE_DISTANCE = 600;
const HAIL_MARY_MARGIN = 200;
const LATE_GAME_DISTANCE = 1000;

const TRIPLE_ORDER = [1, 6, 5, 4, 3, 2] as const;

export function createGameAwareStrategy(risk: RiskPreference = "baseline"): Strategy {
  const table = RISK_THRESHOLDS[risk];

  return {
    name: `gameAware:${risk}`,

    shouldRoll(ctx: StrategyContext): boolean {
      const { bankedScore, unbankedScore, targetScore, opponentScores } = ctx;

      if (bankedScore + unbankedScore >= targetScore) return false;

      const pointsNeeded = targetScore - bankedScore;
      let threshold = thresholdFor(table, ctx.diceInPlay);

      if (opponentScores.length > 0) {
        const opponentNeeds = targetScore - Math.max(...opponentScores);
        if (opponentNeeds <= RACE_DISTANCE) {
          const toGo = pointsNeeded - unbankedScore;
          // Within reach: bank once this turn covers what is left. Too far: hail mary.
          threshold = toGo <= RACE_DISTANCE ? toGo : threshold + HAIL_MARY_MARGIN;
        }
      } else if (pointsNeeded <= LATE_GAME_DISTANCE) {
        threshold = Math.min(threshold, pointsNeeded);
      }

      return unbankedScore < threshold;
    },

    chooseActions(roll: Roll): ScoreGroup[] {
      return collectSelections(roll, ({ counts, depth, rolledCount }) => {
        const t = firstTriple(counts, TRIPLE_ORDER);
        if (t) return [t];

        const fullRollFirstPick = depth === 0 && rolledCount === 6;

        if (counts[1] > 0) {
          return fullRollFirstPick && counts[1] === 1 ? [SINGLE_ONE] : allOnes(counts);
        }
        if (counts[5] > 0) {
          return fullRollFirstPick && counts[5] >= 2 ? [SINGLE_FIVE] : allFives(counts);
        }
        return [];
      });
    },
  };
}
