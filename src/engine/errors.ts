// src/engine/errors.ts
//
// Engine-internal faults. These are programming defects (a strategy proposed an
// impossible take, a state drifted out of shape) and abort the simulation.
// Illegal moves from an external actor are NOT thrown: see envEnvelope.ts.

import type { Roll, ScoreGroup } from "../types";

export function describeGroup(group: ScoreGroup): string {
  switch (group.kind) {
    case "triple":
      return `Triple(${group.face})`;
    case "singleOne":
      return "SingleOne";
    case "singleFive":
      return "SingleFive";
  }
}

export class InvalidTakeError extends Error {
  readonly group: ScoreGroup;
  readonly roll: Roll;

  constructor(group: ScoreGroup, roll: Roll) {
    super(`Invalid take: ${describeGroup(group)} is not present in [${roll.join(",")}]`);
    this.name = "InvalidTakeError";
    this.group = group;
    this.roll = roll;
  }
}

export class StrategyContractError extends Error {
  readonly strategyName: string;

  constructor(strategyName: string, message: string) {
    super(`Strategy "${strategyName}": ${message}`);
    this.name = "StrategyContractError";
    this.strategyName = strategyName;
  }
}

export class StateInvariantError extends Error {
  readonly where: string;

  constructor(message: string, where: string) {
    super(`[validateState:${where}] ${message}`);
    this.name = "StateInvariantError";
    this.where = where;
  }
}
