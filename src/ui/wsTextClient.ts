// src/ui/wsTextClient.ts
//
// Text client for the env server: one human seat against strategy opponents.
//
// Usage (interactive): type "help" for commands.
//
// Env:
//   BLEWIT_WS_URL=ws://localhost:8787

/* eslint-disable no-console */

import WebSocket from "ws";
import readline from "readline";
import type { ClientMessage, ServerMessage } from "../server/protocol";
import type { StepInfo } from "../engine/envEnvelope";
import { describeAction } from "../engine/actions";
import { describeActions, parseCommand, renderStatus, USAGE } from "./commands";

const WS_URL = process.env.BLEWIT_WS_URL ?? "ws://localhost:8787";

const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

let ws: WebSocket;
let seatNames: string[] = ["you"];

function prompt() {
  rl.setPrompt("> ");
  rl.prompt();
}

function send(msg: ClientMessage) {
  ws.send(JSON.stringify(msg));
}

function describeInfo(info: StepInfo): string[] {
  const lines: string[] = [];
  if (info.busted) lines.push("BLEW IT. Turn over, nothing banked.");
  else if (info.points !== undefined) lines.push(`${describeAction(info.action)}: ${info.points} points`);
  if (info.hotDice) lines.push("Hot dice! All six come back; you must roll.");

  for (const t of info.opponentTurns ?? []) {
    const who = seatNames[t.seat] ?? `seat ${t.seat}`;
    lines.push(
      t.result.kind === "busted"
        ? `${who} blew it (score ${t.bankedAfter})`
        : `${who} banked ${t.result.turnScore} (score ${t.bankedAfter})`
    );
  }

  if (info.result === "win") lines.push("You win!");
  if (info.result === "loss") lines.push("You lose.");
  return lines;
}

function handleServerMessage(msg: ServerMessage) {
  switch (msg.type) {
    case "welcome":
      console.log(`server ${msg.serverVersion}. Type 'new' to start a game against 'basic'.`);
      break;

    case "observation":
      console.log(renderStatus(msg.state, seatNames));
      console.log(describeActions(msg.legalActions));
      break;

    case "stepResult":
      if (!msg.ok && msg.error) {
        console.log(`ILLEGAL (${msg.error.message}). Penalty ${msg.reward}; a fresh game has started.`);
      }
      if (msg.info) {
        for (const line of describeInfo(msg.info)) console.log(line);
      }
      console.log(renderStatus(msg.state, seatNames));
      console.log(describeActions(msg.legalActions));
      break;

    case "legalActions":
      console.log(describeActions(msg.actions));
      break;

    case "error":
      console.log(`ERROR ${msg.code}: ${msg.message}`);
      break;
  }
  prompt();
}

function connect() {
  ws = new WebSocket(WS_URL);

  ws.on("open", () => {
    console.log(`connected: ${WS_URL}`);
    send({ type: "hello" });
  });

  ws.on("message", (raw) => {
    try {
      const msg: ServerMessage = JSON.parse(String(raw));
      handleServerMessage(msg);
    } catch (err) {
      console.error("unreadable server message:", err);
    }
  });

  ws.on("close", () => {
    console.log("disconnected");
    process.exit(0);
  });

  ws.on("error", (err) => {
    console.error("ws error:", err.message);
  });
}

rl.on("line", (line) => {
  if (!line.trim()) return prompt();

  const cmd = parseCommand(line);
  switch (cmd.kind) {
    case "help":
      console.log(USAGE);
      return prompt();
    case "quit":
      ws.close();
      return process.exit(0);
    case "invalid":
      console.log(cmd.message);
      return prompt();
    case "new":
      seatNames = ["you", ...cmd.opponents];
      send({ type: "reset", opponents: cmd.opponents, ...(cmd.seed !== undefined ? { seed: cmd.seed } : {}) });
      return;
    case "actions":
      send({ type: "getLegalActions" });
      return;
    case "act":
      send({ type: "step", action: cmd.action });
      return;
  }
});

connect();
prompt();
