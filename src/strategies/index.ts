// src/strategies/index.ts

import { makeSeededRng, type Rng } from "../engine/rng";
import { createBasicStrategy } from "./basic";
import { createCautiousStrategy } from "./cautious";
import { createGameAwareStrategy, type RiskPreference } from "./gameAware";
import { createRandomStrategy } from "./random";
import { createThresholdStrategy, DEFAULT_THRESHOLDS } from "./threshold";
import type { Strategy } from "./types";

export type { Strategy, StrategyContext } from "./types";
export { createBasicStrategy } from "./basic";
export { createCautiousStrategy } from "./cautious";
export { createThresholdStrategy, DEFAULT_THRESHOLDS, type ThresholdTable } from "./threshold";
export { createRandomStrategy } from "./random";
export { createGameAwareStrategy, RISK_THRESHOLDS, type RiskPreference } from "./gameAware";
export { createPolicyStrategy, type DecisionModel } from "./policy";

export type StrategyFactory = (rng: Rng) => Strategy;

const RISKS: readonly RiskPreference[] = ["conservative", "baseline", "aggressive"];

/**
 * Strategies that need no external input, by name. The policy strategy needs a model
 * and is constructed directly.
 */
export const STRATEGY_REGISTRY: ReadonlyMap<string, StrategyFactory> = new Map<string, StrategyFactory>([
  ["basic", () => createBasicStrategy()],
  ["cautious", () => createCautiousStrategy()],
  ["threshold", () => createThresholdStrategy(DEFAULT_THRESHOLDS)],
  ["random", (rng) => createRandomStrategy(rng)],
  ...RISKS.map((r): [string, StrategyFactory] => [`gameAware:${r}`, () => createGameAwareStrategy(r)]),
  ["gameAware", () => createGameAwareStrategy("baseline")],
]);

export function strategyNames(): string[] {
  return [...STRATEGY_REGISTRY.keys()];
}

/** Build a registered strategy. Throws on an unknown name. */
export function createStrategy(name: string, rng: Rng = makeSeededRng(name)): Strategy {
  const factory = STRATEGY_REGISTRY.get(name);
  if (!factory) {
    throw new Error(`Unknown strategy "${name}". Known: ${strategyNames().join(", ")}`);
  }
  return factory(rng);
}
