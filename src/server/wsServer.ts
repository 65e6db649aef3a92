import path from "node:path";
import { WebSocketServer, type WebSocket } from "ws";
import type { RulesConfig } from "../engine";
import type { PlayerCount } from "../types";
import { handleClientMessage, mkError, mkStateSync, withReqId, type TableSession } from "./handleMessage";
import { createInitialMatch } from "./initialState";
import { hasPersistedTable, loadTable, saveTable } from "./persistence";
import type { ClientMessage, GameplayMessage, ServerMessage } from "./protocol";

const SERVER_VERSION = "carrom-ws-0.1.0";

const TABLE_CODE_PATTERN = /^[A-Za-z0-9_-]{1,32}$/;

export type WsServerOptions = {
  port: number;
  playerCount?: PlayerCount;
  rules?: Partial<RulesConfig>;

  /** Directory for saveGame/loadGame files; saving is disabled without it. */
  saveDir?: string;

  /** Line logger for table lifecycle events. */
  log?: (line: string) => void;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

// One presentation client drives a table. The match outlives the socket, so a client that
// reconnects with the same code picks the game up again.
type Table = {
  code: string;
  session: TableSession;
  client: WebSocket | null;
};

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x.reqId;
  return typeof v === "string" ? v : undefined;
}

function isFiniteNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function optional(x: Record<string, unknown>, key: string, check: (v: unknown) => boolean): boolean {
  return !(key in x) || x[key] === undefined || check(x[key]);
}

export function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (typeof x.type !== "string") return false;
  if (!optional(x, "reqId", (v) => typeof v === "string")) return false;

  switch (x.type) {
    case "hello":
      return optional(x, "clientId", (v) => typeof v === "string");

    case "joinTable":
      return optional(x, "tableCode", (v) => typeof v === "string" && TABLE_CODE_PATTERN.test(v));

    case "newMatch":
      return optional(x, "playerCount", (v) => v === 2 || v === 4);

    case "positionStriker":
      return isFiniteNumber(x.offset);

    case "shoot":
      return isFiniteNumber(x.angle) && isFiniteNumber(x.power);

    case "tick":
      return optional(x, "count", (v) => typeof v === "number" && Number.isInteger(v));

    case "getState":
    case "saveGame":
    case "loadGame":
      return true;

    default:
      return false;
  }
}

function isGameplayMessage(msg: ClientMessage): msg is GameplayMessage {
  return (
    msg.type === "newMatch" ||
    msg.type === "positionStriker" ||
    msg.type === "shoot" ||
    msg.type === "tick" ||
    msg.type === "getState"
  );
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

function makeTableCode(): string {
  const alphabet = "ABCDEFGHJKLMNPQRSTUVWXYZ23456789";
  let out = "";
  for (let i = 0; i < 6; i++) out += alphabet[Math.floor(Math.random() * alphabet.length)];
  return out;
}

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const wss = new WebSocketServer({ port: opts.port });
  const playerCount = opts.playerCount ?? 2;
  const log = opts.log ?? (() => undefined);

  const tables = new Map<string, Table>();
  const wsClientId = new Map<WebSocket, string>();
  const wsTable = new Map<WebSocket, string>();
  let nextClient = 1;

  function tableFile(code: string): string | null {
    return opts.saveDir ? path.join(opts.saveDir, `${code}.json`) : null;
  }

  function openTable(code: string): Table {
    const table: Table = {
      code,
      session: { match: createInitialMatch(playerCount, opts.rules) },
      client: null,
    };
    tables.set(code, table);
    log(`table ${code} opened (${playerCount} players)`);
    return table;
  }

  function leaveTable(ws: WebSocket, code: string): void {
    const table = tables.get(code);
    if (table?.client === ws) table.client = null;
  }

  function freshTableCode(): string {
    let code = makeTableCode();
    while (tables.has(code)) code = makeTableCode();
    return code;
  }

  wss.on("connection", (ws) => {
    const anonId = `c${nextClient++}`;
    wsClientId.set(ws, anonId);
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: anonId });

    ws.on("message", (data) => {
      const raw = safeParseJson(String(data));
      if (raw === null) {
        send(ws, mkError("BAD_MESSAGE", "Invalid JSON."));
        return;
      }

      const reqId = getReqId(raw);
      if (!isClientMessage(raw)) {
        send(ws, mkError("BAD_MESSAGE", "Invalid client message shape.", reqId));
        return;
      }
      const msg = raw;

      if (msg.type === "hello") {
        if (msg.clientId) wsClientId.set(ws, msg.clientId);
        send(ws, withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId: wsClientId.get(ws) }, reqId));
        return;
      }

      if (msg.type === "joinTable") {
        const code = msg.tableCode ?? freshTableCode();
        const existing = tables.get(code);
        if (existing?.client && existing.client !== ws) {
          send(ws, mkError("TABLE_BUSY", `Table ${code} already has a client.`, reqId));
          return;
        }

        const previous = wsTable.get(ws);
        if (previous && previous !== code) leaveTable(ws, previous);

        const table = existing ?? openTable(code);
        table.client = ws;
        wsTable.set(ws, code);

        const clientId = wsClientId.get(ws) ?? anonId;
        send(ws, withReqId({ type: "tableJoined", tableCode: code, clientId }, reqId));
        send(ws, mkStateSync(code, table.session.match, reqId));
        return;
      }

      const code = wsTable.get(ws);
      const table = code ? tables.get(code) : undefined;
      if (!table) {
        send(ws, mkError("NOT_AT_TABLE", "Not at a table. Send joinTable first.", reqId));
        return;
      }

      if (msg.type === "saveGame") {
        const filePath = tableFile(table.code);
        if (!filePath) {
          send(ws, mkError("PERSISTENCE_DISABLED", "Saving is not enabled on this server.", reqId));
          return;
        }
        try {
          const saved = saveTable(table.session.match, { filePath });
          log(`table ${table.code} saved`);
          send(
            ws,
            withReqId(
              { type: "gameSaved", tableCode: table.code, savedAt: saved.savedAt, stateHash: saved.stateHash },
              reqId
            )
          );
        } catch (err) {
          send(ws, mkError("SAVE_FAILED", errorText(err), reqId));
        }
        return;
      }

      if (msg.type === "loadGame") {
        const filePath = tableFile(table.code);
        if (!filePath) {
          send(ws, mkError("PERSISTENCE_DISABLED", "Saving is not enabled on this server.", reqId));
          return;
        }
        if (!hasPersistedTable({ filePath })) {
          send(ws, mkError("LOAD_FAILED", `No saved game for table ${table.code}.`, reqId));
          return;
        }
        try {
          table.session = { match: loadTable({ filePath }) };
        } catch (err) {
          send(ws, mkError("LOAD_FAILED", errorText(err), reqId));
          return;
        }
        log(`table ${table.code} loaded`);
        send(ws, mkStateSync(table.code, table.session.match, reqId));
        return;
      }

      if (!isGameplayMessage(msg)) {
        send(ws, mkError("BAD_MESSAGE", "Unhandled message type.", reqId));
        return;
      }

      const result = handleClientMessage(table.code, table.session, msg);
      table.session = result.nextState;

      send(ws, result.serverMessage);

      if (msg.type === "newMatch") log(`table ${table.code} new match`);
      if (result.serverMessage.type === "tickResult") {
        const last = result.serverMessage.results[result.serverMessage.results.length - 1];
        if (last?.outcome?.winner) log(`table ${table.code} game over: ${last.outcome.message}`);
      }
    });

    ws.on("close", () => {
      const code = wsTable.get(ws);

      wsClientId.delete(ws);
      wsTable.delete(ws);

      if (code) leaveTable(ws, code);
    });

    ws.on("error", (err) => {
      log(`socket error: ${err.message}`);
    });
  });

  const address = wss.address();
  return {
    port: typeof address === "object" && address !== null ? address.port : opts.port,
    close: async () => {
      for (const ws of wss.clients) ws.close();
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
