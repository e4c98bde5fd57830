// src/strategies/selection.ts
//
// "Take, then look again at what is left" as a loop over a local copy of the roll.

import type { Face, Roll, ScoreGroup } from "../types";
import { countFaces, isBlown, take, triple, SINGLE_FIVE, SINGLE_ONE, type FaceCounts } from "../engine/scorer";

export type PickStep = {
  rest: Roll;
  counts: FaceCounts;

  // 0 for the first pick of this roll.
  depth: number;

  // Dice in the roll as it came off the table.
  rolledCount: number;
};

/** Return the groups to take at this step, or [] to stop. */
export type PickFn = (step: PickStep) => ScoreGroup[];

export function collectSelections(roll: Roll, pickFn: PickFn): ScoreGroup[] {
  if (isBlown(roll)) return [];

  const out: ScoreGroup[] = [];
  let rest: Face[] = [...roll];

  for (let depth = 0; rest.length > 0; depth++) {
    const picked = pickFn({ rest, counts: countFaces(rest), depth, rolledCount: roll.length });
    if (picked.length === 0) break;

    for (const g of picked) {
      rest = take(rest, g).remaining;
      out.push(g);
    }
  }

  return out;
}

export function repeat(group: ScoreGroup, n: number): ScoreGroup[] {
  return Array.from({ length: n }, () => group);
}

export function firstTriple(counts: FaceCounts, order: readonly Face[]): ScoreGroup | undefined {
  for (const face of order) {
    if (counts[face] >= 3) return triple(face);
  }
  return undefined;
}

export function allOnes(counts: FaceCounts): ScoreGroup[] {
  return repeat(SINGLE_ONE, counts[1]);
}

export function allFives(counts: FaceCounts): ScoreGroup[] {
  return repeat(SINGLE_FIVE, counts[5]);
}
