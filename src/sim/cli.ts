// src/sim/cli.ts
//
// Usage:
//   npm run simulate -- [games] [strategy ...]
//
// Env:
//   BLEWIT_SEED=42            (default: random)
//   BLEWIT_MAX_TURNS=2000     runaway guard per game
//   BLEWIT_SWEEP=true         score leftover dice on bank
//   BLEWIT_TARGET_SCORE / BLEWIT_MIN_FIRST_BANK

import { randomSeed } from "../engine/rng";
import { envFlag, envInt, rulesFromEnv } from "../engine/rulesConstants";
import { strategyNames } from "../strategies";
import { formatReport, runTournament } from "./simulate";

function main(argv: readonly string[]): void {
  const [gamesArg, ...names] = argv;
  const games = gamesArg === undefined ? 1000 : Number(gamesArg);
  if (!Number.isInteger(games) || games <= 0) {
    throw new Error(`games must be a positive integer, got "${String(gamesArg)}"`);
  }

  const seed = envInt("BLEWIT_SEED", randomSeed());
  const strategies = names.length > 0 ? names : ["random", "basic", "cautious", "threshold", "gameAware"];

  const known = new Set(strategyNames());
  const unknown = strategies.filter((n) => !known.has(n));
  if (unknown.length > 0) {
    throw new Error(`Unknown strategies: ${unknown.join(", ")}. Known: ${[...known].join(", ")}`);
  }

  // eslint-disable-next-line no-console
  console.log(`Running ${games} games per matchup (seed ${seed})...\n`);

  const report = runTournament(strategies, {
    games,
    seed,
    rules: rulesFromEnv(),
    maxTurns: envInt("BLEWIT_MAX_TURNS", 2000),
    sweepOnBank: envFlag("BLEWIT_SWEEP"),
  });

  // eslint-disable-next-line no-console
  console.log(formatReport(report));
}

try {
  main(process.argv.slice(2));
} catch (err) {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
}
