// src/ui/commands.ts
//
// Pure helpers for the terminal client: command parsing and text rendering.
// Nothing here touches the socket or stdin.

import type { ActionCode } from "../types";
import { describeAction } from "../engine/actions";
import {
  ACTION_BANK,
  ACTION_ROLL,
  ACTION_TAKE_FIVE,
  ACTION_TAKE_ONE,
  isActionCode,
} from "../engine/rulesConstants";
import type { SessionSnapshot } from "../server/protocol";

export type Command =
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "new"; opponents: string[]; seed?: string }
  | { kind: "actions" }
  | { kind: "act"; action: ActionCode }
  | { kind: "invalid"; message: string };

export const DEFAULT_OPPONENTS = ["basic"];

export const USAGE =
  "\nCommands:\n" +
  "  help\n" +
  "  new [opponent ...] [seed=<seed>]   start a game (default opponent: basic)\n" +
  "  actions                            list legal actions\n" +
  "  roll | r\n" +
  "  bank | b\n" +
  "  one | five                         take a single 1 or 5\n" +
  "  triple <1-6> | t <1-6>\n" +
  "  <0-9>                              raw action code\n" +
  "  q\n";

function parseTriple(arg: string | undefined): Command {
  const face = Number(arg);
  if (face < 1 || face > 6 || !isActionCode(face)) {
    return { kind: "invalid", message: "Usage: triple <1-6>" };
  }
  return { kind: "act", action: face };
}

export function parseCommand(line: string): Command {
  const parts = line.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return { kind: "invalid", message: "Type: help" };

  const [head, ...args] = parts;
  const cmd = head.toLowerCase();

  switch (cmd) {
    case "help":
    case "?":
      return { kind: "help" };
    case "q":
    case "quit":
    case "exit":
      return { kind: "quit" };
    case "new": {
      const seedArg = args.find((a) => a.startsWith("seed="));
      const opponents = args.filter((a) => !a.startsWith("seed="));
      return {
        kind: "new",
        opponents: opponents.length ? opponents : [...DEFAULT_OPPONENTS],
        ...(seedArg ? { seed: seedArg.slice("seed=".length) } : {}),
      };
    }
    case "actions":
    case "a":
      return { kind: "actions" };
    case "roll":
    case "r":
      return { kind: "act", action: ACTION_ROLL };
    case "bank":
    case "b":
      return { kind: "act", action: ACTION_BANK };
    case "one":
      return { kind: "act", action: ACTION_TAKE_ONE };
    case "five":
      return { kind: "act", action: ACTION_TAKE_FIVE };
    case "triple":
    case "t":
      return parseTriple(args[0]);
  }

  if (/^\d$/.test(cmd)) {
    const code = Number(cmd);
    if (isActionCode(code)) return { kind: "act", action: code };
  }

  return { kind: "invalid", message: `Unknown command: ${head}. Type: help` };
}

export function describeActions(actions: readonly ActionCode[]): string {
  if (actions.length === 0) return "No legal actions (game over). Type: new";
  return actions.map((a) => `  ${a}: ${describeAction(a)}`).join("\n");
}

export function renderStatus(state: SessionSnapshot, names?: readonly string[]): string {
  const scoreLine = state.scores
    .map((score, seat) => `${names?.[seat] ?? (seat === 0 ? "you" : `seat ${seat}`)}=${score}`)
    .join("  ");

  const lines = [`scores: ${scoreLine}`];
  if (state.done) {
    lines.push("game over");
    return lines.join("\n");
  }

  lines.push(`turn points: ${state.unbankedScore}`);
  if (state.mustRoll) {
    lines.push("dice: (none on the table, you must roll)");
  } else if (state.dice.length > 0) {
    lines.push(`dice: ${state.dice.join(" ")}`);
  } else {
    lines.push("dice: (roll to start)");
  }
  return lines.join("\n");
}
