// src/engine/scorer.ts
//
// Pure evaluator over a set of die faces. Every function is a function of the roll
// passed in: face counts are recomputed on each call, never cached across takes.

import type { Face, Roll, ScoreGroup } from "../types";
import { InvalidTakeError } from "./errors";

export type FaceCounts = readonly number[];

export type TakeResult = {
  points: number;
  remaining: Face[];
};

export type RawScore = {
  remainingDice: number;
  totalScore: number;
};

export const TRIPLE_FACES: readonly Face[] = [1, 2, 3, 4, 5, 6];

// Greedy extraction order used by rawScore and the priority strategies.
const HIGH_TRIPLES_FIRST: readonly Face[] = [1, 6, 5, 4, 3];

export const SINGLE_ONE: ScoreGroup = { kind: "singleOne" };
export const SINGLE_FIVE: ScoreGroup = { kind: "singleFive" };

export function triple(face: Face): ScoreGroup {
  return { kind: "triple", face };
}

/** Index 1..6 holds the count of that face; index 0 is unused. */
export function countFaces(roll: Roll): FaceCounts {
  const counts = [0, 0, 0, 0, 0, 0, 0];
  for (const face of roll) counts[face] += 1;
  return counts;
}

export function groupFace(group: ScoreGroup): Face {
  switch (group.kind) {
    case "triple":
      return group.face;
    case "singleOne":
      return 1;
    case "singleFive":
      return 5;
  }
}

export function groupSize(group: ScoreGroup): number {
  return group.kind === "triple" ? 3 : 1;
}

export function groupValue(group: ScoreGroup): number {
  switch (group.kind) {
    case "triple":
      return group.face === 1 ? 1000 : group.face * 100;
    case "singleOne":
      return 100;
    case "singleFive":
      return 50;
  }
}

export function isAvailable(roll: Roll, group: ScoreGroup): boolean {
  return countFaces(roll)[groupFace(group)] >= groupSize(group);
}

/**
 * Available groups, in action-code order: triples 1..6, then SingleFive, then SingleOne.
 */
export function evaluate(roll: Roll): ScoreGroup[] {
  const counts = countFaces(roll);
  const out: ScoreGroup[] = [];
  for (const face of TRIPLE_FACES) {
    if (counts[face] >= 3) out.push(triple(face));
  }
  if (counts[5] > 0) out.push(SINGLE_FIVE);
  if (counts[1] > 0) out.push(SINGLE_ONE);
  return out;
}

/**
 * A roll is blown iff it holds no triple, no loose 1 and no loose 5.
 * Only meaningful for a freshly rolled set of dice.
 */
export function isBlown(roll: Roll): boolean {
  const counts = countFaces(roll);
  if (counts[1] > 0 || counts[5] > 0) return false;
  for (const face of TRIPLE_FACES) {
    if (counts[face] >= 3) return false;
  }
  return true;
}

/**
 * Remove exactly the dice `group` consumes. Throws InvalidTakeError if they are not there.
 * The remaining dice keep their original order.
 */
export function take(roll: Roll, group: ScoreGroup): TakeResult {
  const face = groupFace(group);
  let toRemove = groupSize(group);

  if (countFaces(roll)[face] < toRemove) {
    throw new InvalidTakeError(group, roll);
  }

  const remaining: Face[] = [];
  for (const d of roll) {
    if (d === face && toRemove > 0) {
      toRemove -= 1;
      continue;
    }
    remaining.push(d);
  }

  return { points: groupValue(group), remaining };
}

/**
 * Apply a batch of selections in order. Each selection must be valid against the dice
 * left by the previous ones.
 */
export function takeAll(roll: Roll, groups: readonly ScoreGroup[]): TakeResult {
  let remaining: Face[] = [...roll];
  let points = 0;
  for (const g of groups) {
    const r = take(remaining, g);
    points += r.points;
    remaining = r.remaining;
  }
  return { points, remaining };
}

/**
 * Take every available group greedily: Triple(1), then triples 6..3, then loose 1s,
 * then Triple(2), then loose 5s. Auto-complete helper only; players choose their own takes.
 */
export function rawScore(roll: Roll): RawScore {
  if (isBlown(roll)) {
    return { remainingDice: roll.length, totalScore: 0 };
  }

  let rest: Face[] = [...roll];
  let total = 0;

  const takeWhile = (group: ScoreGroup) => {
    while (isAvailable(rest, group)) {
      const r = take(rest, group);
      total += r.points;
      rest = r.remaining;
      if (group.kind === "triple") break;
    }
  };

  for (const face of HIGH_TRIPLES_FIRST) takeWhile(triple(face));
  takeWhile(SINGLE_ONE);
  takeWhile(triple(2));
  takeWhile(SINGLE_FIVE);

  return { remainingDice: rest.length, totalScore: total };
}
