import type { Server } from "node:http";
import WebSocket, { WebSocketServer, type RawData } from "ws";
import { parseClientCommand, type ClientConnection, type ServerMessage } from "../../src/shared/protocol.ts";
import type { SessionEventLoop } from "./eventLoop.ts";
import { silentLogger, type Logger } from "./log.ts";
import { secureRandomHex } from "./secureRandom.ts";

export const WS_PATH = "/ws";

export type WebSocketTransport = {
  connectionCount: () => number;
  close: () => Promise<void>;
};

function rawDataToText(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString("utf8");
  return raw.toString("utf8");
}

function parseFrame(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

/**
 * Speaks JSON frames on `path` and turns socket activity into loop events.
 * The session core never sees a socket, only a `ClientConnection`.
 */
export function attachWebSocketTransport(args: {
  server: Server;
  loop: SessionEventLoop;
  logger?: Logger;
  heartbeatMs?: number;
  path?: string;
}): WebSocketTransport {
  const log = args.logger ?? silentLogger;
  const wss = new WebSocketServer({ server: args.server, path: args.path ?? WS_PATH });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on("connection", (ws: WebSocket) => {
    alive.set(ws, true);
    ws.on("pong", () => {
      alive.set(ws, true);
    });

    const connection: ClientConnection = {
      id: secureRandomHex(8),
      send: (message: ServerMessage) => {
        if (ws.readyState !== WebSocket.OPEN) return;
        ws.send(JSON.stringify(message));
      },
      disconnect: () => {
        if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) ws.close(1000, "closed");
      },
    };
    log.debug(`ws connected id=${connection.id}`);
    args.loop.enqueue({ type: "connect", connection });

    ws.on("message", (raw: RawData) => {
      const command = parseClientCommand(parseFrame(rawDataToText(raw)));
      if (!command) {
        log.warn(`ignored malformed frame from ${connection.id}`);
        return;
      }
      args.loop.enqueue({ type: "command", connection, command });
    });

    ws.on("close", () => {
      log.debug(`ws closed id=${connection.id}`);
      args.loop.enqueue({ type: "disconnect", connection });
    });

    ws.on("error", (err) => {
      log.warn(`ws error id=${connection.id}: ${err.message}`);
    });
  });

  // Sockets that miss a pong between two beats are dropped.
  const heartbeat = setInterval(() => {
    for (const ws of wss.clients) {
      if (!alive.get(ws)) {
        ws.terminate();
        continue;
      }
      alive.set(ws, false);
      ws.ping();
    }
  }, Math.max(1, args.heartbeatMs ?? 15_000));

  return {
    connectionCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(heartbeat);
        for (const ws of wss.clients) ws.terminate();
        wss.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
