import { describe, it, expect } from "vitest";
import { describeActions, parseCommand, renderStatus } from "../src/ui/commands";

describe("parseCommand", () => {
  it("maps words to action codes", () => {
    expect(parseCommand("roll")).toEqual({ kind: "act", action: 9 });
    expect(parseCommand("  B ")).toEqual({ kind: "act", action: 0 });
    expect(parseCommand("one")).toEqual({ kind: "act", action: 8 });
    expect(parseCommand("five")).toEqual({ kind: "act", action: 7 });
    expect(parseCommand("t 4")).toEqual({ kind: "act", action: 4 });
    expect(parseCommand("5")).toEqual({ kind: "act", action: 5 });
  });

  it("rejects triples that cannot exist", () => {
    expect(parseCommand("triple 7")).toEqual({ kind: "invalid", message: "Usage: triple <1-6>" });
    expect(parseCommand("triple")).toEqual({ kind: "invalid", message: "Usage: triple <1-6>" });
  });

  it("parses a new game with opponents and a seed", () => {
    expect(parseCommand("new cautious random seed=abc")).toEqual({
      kind: "new",
      opponents: ["cautious", "random"],
      seed: "abc",
    });
    expect(parseCommand("new")).toEqual({ kind: "new", opponents: ["basic"] });
  });

  it("reports unknown input", () => {
    expect(parseCommand("12")).toEqual({ kind: "invalid", message: "Unknown command: 12. Type: help" });
    expect(parseCommand("")).toEqual({ kind: "invalid", message: "Type: help" });
  });
});

describe("describeActions", () => {
  it("lists codes with their meaning", () => {
    expect(describeActions([0, 7, 9])).toBe("  0: bank\n  7: take a 5 (+50)\n  9: roll");
    expect(describeActions([1, 4])).toBe("  1: take three 1s (+1000)\n  4: take three 4s (+400)");
  });

  it("says when nothing is legal", () => {
    expect(describeActions([])).toBe("No legal actions (game over). Type: new");
  });
});

describe("renderStatus", () => {
  const state = {
    scores: [1050, 300],
    currentPlayerIndex: 0,
    unbankedScore: 150,
    dice: [2, 3, 4],
    mustRoll: false,
    justRolled: false,
    done: false,
  };

  it("shows scores, turn points and the dice", () => {
    expect(renderStatus(state, ["you", "basic"])).toBe("scores: you=1050  basic=300\nturn points: 150\ndice: 2 3 4");
  });

  it("falls back to seat labels and flags a forced roll", () => {
    expect(renderStatus({ ...state, dice: [], mustRoll: true })).toBe(
      "scores: you=1050  seat 1=300\nturn points: 150\ndice: (none on the table, you must roll)"
    );
  });

  it("shows the end of the game", () => {
    expect(renderStatus({ ...state, done: true }, ["you", "basic"])).toBe("scores: you=1050  basic=300\ngame over");
  });
});
