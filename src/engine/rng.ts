// src/engine/rng.ts

import type { Face } from "../types";

/** Uniform float in [0, 1). Each game or session owns its own stream. */
export type Rng = () => number;

const FACES: readonly Face[] = [1, 2, 3, 4, 5, 6];

export function hashStringToUint32(s: string): number {
  // FNV-1a 32-bit
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

export function makeSeededRng(seed: number | string): Rng {
  let x = typeof seed === "string" ? hashStringToUint32(seed) : seed >>> 0;
  if (x === 0) x = 0x6d2b79f5; // xorshift32 must not start at zero
  return function nextFloat(): number {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  };
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 0x7fffffff);
}

export function rollDie(rng: Rng): Face {
  const i = Math.min(FACES.length - 1, Math.floor(rng() * FACES.length));
  return FACES[i];
}

export function rollDice(rng: Rng, count: number): Face[] {
  const out: Face[] = [];
  for (let i = 0; i < count; i++) out.push(rollDie(rng));
  return out;
}

/** Coin flip used by randomized strategies. */
export function chance(rng: Rng): boolean {
  return rng() < 0.5;
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  if (items.length === 0) throw new Error("Cannot pick from an empty list");
  return items[Math.min(items.length - 1, Math.floor(rng() * items.length))];
}
