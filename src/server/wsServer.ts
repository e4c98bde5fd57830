import type { AddressInfo } from "node:net";
import { WebSocketServer, type WebSocket } from "ws";
import type { ClientMessage, ServerMessage } from "./protocol";
import { handleClientMessage, SERVER_VERSION, type ConnectionState } from "./handleMessage";

export type EnvServerOptions = {
  port: number;
  host?: string;
};

export type EnvServer = {
  readonly port: number;
  ready: Promise<void>;
  close: () => Promise<void>;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x["reqId"];
  return typeof v === "string" ? v : undefined;
}

function isOptionalString(x: Record<string, unknown>, key: string): boolean {
  return !(key in x) || typeof x[key] === "string";
}

function isOptionalPositiveInt(x: Record<string, unknown>, key: string): boolean {
  if (!(key in x)) return true;
  const v = x[key];
  return typeof v === "number" && Number.isInteger(v) && v > 0;
}

function isValidResetRules(x: unknown): boolean {
  return isPlainObject(x) && isOptionalPositiveInt(x, "targetScore") && isOptionalPositiveInt(x, "minFirstBank");
}

export function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (typeof x.type !== "string") return false;
  if (!isOptionalString(x, "reqId")) return false;

  switch (x.type) {
    case "hello":
      return isOptionalString(x, "clientId");

    case "reset": {
      const seedOk = !("seed" in x) || typeof x.seed === "number" || typeof x.seed === "string";
      const opponentsOk =
        !("opponents" in x) || (Array.isArray(x.opponents) && x.opponents.every((o) => typeof o === "string"));
      const encodingOk = !("encoding" in x) || x.encoding === "compact" || x.encoding === "extended";
      const rulesOk = !("rules" in x) || isValidResetRules(x.rules);
      return seedOk && opponentsOk && encodingOk && rulesOk;
    }

    case "step":
      return "action" in x;

    case "getLegalActions":
      return true;

    default:
      return false;
  }
}

function isAddressInfo(addr: AddressInfo | string | null): addr is AddressInfo {
  return typeof addr === "object" && addr !== null;
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

/**
 * One decision-surface session per connection; sessions share nothing.
 */
export function startEnvServer(opts: EnvServerOptions): EnvServer {
  const wss = new WebSocketServer({ port: opts.port, host: opts.host });
  const connections = new Map<WebSocket, ConnectionState>();

  const ready = new Promise<void>((resolve, reject) => {
    wss.once("listening", () => resolve());
    wss.once("error", reject);
  });

  wss.on("error", (err) => {
    // eslint-disable-next-line no-console
    console.error("[env-server] server error:", err.message);
  });

  wss.on("connection", (ws) => {
    connections.set(ws, {});
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION });

    ws.on("message", (data) => {
      const raw = data.toString();
      const parsed = safeParseJson(raw);
      const reqId = getReqId(parsed);

      if (parsed === undefined) {
        send(ws, { type: "error", code: "BAD_MESSAGE", message: "Invalid JSON." });
        return;
      }

      if (!isClientMessage(parsed)) {
        const t = isPlainObject(parsed) ? parsed["type"] : undefined;
        send(ws, {
          type: "error",
          code: "BAD_MESSAGE",
          message: `Invalid client message shape. type=${String(t)}`,
          ...(reqId ? { reqId } : {}),
        });
        return;
      }

      const { nextState, serverMessage } = handleClientMessage(connections.get(ws) ?? {}, parsed);
      connections.set(ws, nextState);
      send(ws, serverMessage);
    });

    ws.on("close", () => {
      connections.delete(ws);
    });

    ws.on("error", (err) => {
      // eslint-disable-next-line no-console
      console.error("[env-server] socket error:", err.message);
    });
  });

  return {
    get port(): number {
      const addr = wss.address();
      return isAddressInfo(addr) ? addr.port : opts.port;
    },
    ready,
    close: async () => {
      for (const ws of connections.keys()) ws.terminate();
      connections.clear();
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
