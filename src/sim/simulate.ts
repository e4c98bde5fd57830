// src/sim/simulate.ts
//
// Head-to-head simulation between registered strategies. Each game gets its own seeded
// stream derived from (seed, matchup, game index), so any single game can be replayed.

import { playGame } from "../engine/game";
import { makeSeededRng } from "../engine/rng";
import type { RulesConfig } from "../engine/rulesConstants";
import { createStrategy } from "../strategies";

export type MatchupResult = {
  a: string;
  b: string;
  games: number;
  winsA: number;
  winsB: number;
  unfinished: number;
  avgTurns: number;
};

export type RankingEntry = {
  name: string;
  avgWinRate: number;
};

export type TournamentReport = {
  matchups: MatchupResult[];
  ranking: RankingEntry[];
};

export type SimulationOptions = {
  games: number;
  seed: number | string;
  rules: RulesConfig;
  maxTurns?: number;
  sweepOnBank?: boolean;
};

export function runMatchup(a: string, b: string, opts: SimulationOptions): MatchupResult {
  let winsA = 0;
  let winsB = 0;
  let unfinished = 0;
  let totalTurns = 0;

  for (let i = 0; i < opts.games; i++) {
    const rng = makeSeededRng(`${opts.seed}:${a}:${b}:${i}`);
    // player 0 always starts
    const result = playGame([createStrategy(a, rng), createStrategy(b, rng)], {
      rng,
      rules: opts.rules,
      maxTurns: opts.maxTurns,
      sweepOnBank: opts.sweepOnBank,
    });

    totalTurns += result.turns;
    if (result.winnerIndex === 0) winsA++;
    else if (result.winnerIndex === 1) winsB++;
    else unfinished++;
  }

  return {
    a,
    b,
    games: opts.games,
    winsA,
    winsB,
    unfinished,
    avgTurns: opts.games > 0 ? totalTurns / opts.games : 0,
  };
}

/** Every pairing (self-play included), then a ranking by average win rate outside self-play. */
export function runTournament(names: readonly string[], opts: SimulationOptions): TournamentReport {
  const matchups: MatchupResult[] = [];
  for (let i = 0; i < names.length; i++) {
    for (let j = i; j < names.length; j++) {
      matchups.push(runMatchup(names[i], names[j], opts));
    }
  }

  const rates = new Map<string, number[]>(names.map((n) => [n, []]));
  for (const m of matchups) {
    if (m.a === m.b || m.games === 0) continue;
    rates.get(m.a)?.push(m.winsA / m.games);
    rates.get(m.b)?.push(m.winsB / m.games);
  }

  const ranking = [...rates.entries()]
    .filter(([, rs]) => rs.length > 0)
    .map(([name, rs]) => ({ name, avgWinRate: rs.reduce((s, r) => s + r, 0) / rs.length }))
    .sort((x, y) => y.avgWinRate - x.avgWinRate);

  return { matchups, ranking };
}

function pct(n: number, d: number): string {
  return d > 0 ? `${((100 * n) / d).toFixed(1)}%` : "n/a";
}

export function formatReport(report: TournamentReport): string {
  const lines: string[] = [];
  const rule = "=".repeat(60);

  lines.push(rule, "HEAD-TO-HEAD RESULTS", rule);
  for (const m of report.matchups) {
    if (m.a === m.b) {
      lines.push("", `${m.a} vs ${m.a} (self-play):`, `  Avg turns per game: ${m.avgTurns.toFixed(1)}`);
      continue;
    }
    lines.push(
      "",
      `${m.a} vs ${m.b}:`,
      `  ${m.a}: ${m.winsA} wins (${pct(m.winsA, m.games)})`,
      `  ${m.b}: ${m.winsB} wins (${pct(m.winsB, m.games)})`,
      `  Avg turns: ${m.avgTurns.toFixed(1)}`
    );
    if (m.unfinished > 0) lines.push(`  Hit turn limit: ${m.unfinished}`);
  }

  lines.push("", rule, "OVERALL RANKING (by avg win rate across matchups)", rule);
  report.ranking.forEach((r, i) => {
    lines.push(`  ${i + 1}. ${r.name}: ${(100 * r.avgWinRate).toFixed(1)}% avg win rate`);
  });

  return lines.join("\n");
}
