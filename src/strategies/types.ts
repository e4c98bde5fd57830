// src/strategies/types.ts

import type { Roll, ScoreGroup } from "../types";

/**
 * Everything a strategy may consult at a decision point.
 * The first four fields are the core contract; the rest feed opponent-aware variants.
 */
export type StrategyContext = {
  turnNumber: number;
  bankedScore: number;
  diceInPlay: number;
  unbankedScore: number;

  targetScore: number;
  minFirstBank: number;
  opponentScores: readonly number[];
};

export interface Strategy {
  readonly name: string;

  /** Roll again (true) or bank (false). Only consulted when no override applies. */
  shouldRoll(ctx: StrategyContext): boolean;

  /**
   * Ordered selections for a fresh, non-blown roll. Must be non-empty; each selection
   * must still be present after the earlier ones are applied.
   */
  chooseActions(roll: Roll, ctx: StrategyContext): ScoreGroup[];
}
