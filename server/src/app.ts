import { createServer, type Server } from "node:http";
import cors from "cors";
import express from "express";
import { SessionEventLoop } from "./eventLoop.ts";
import { silentLogger, type Logger } from "./log.ts";
import type { RandomInt } from "./secureRandom.ts";
import { SessionServer } from "./sessionServer.ts";
import { attachWebSocketTransport, type WebSocketTransport } from "./wsTransport.ts";

export type ServerOpts = {
  tickMs?: number;
  maxEventsPerTick?: number;
  heartbeatMs?: number;
  randomInt?: RandomInt;
  logger?: Logger;
};

export function createChessApp(opts: ServerOpts = {}): {
  app: express.Express;
  sessions: SessionServer;
  loop: SessionEventLoop;
  attachWebSockets: (server: Server) => void;
  shutdown: () => Promise<void>;
} {
  const log = opts.logger ?? silentLogger;
  const sessions = new SessionServer({ randomInt: opts.randomInt, logger: log });
  const loop = new SessionEventLoop(sessions, {
    tickMs: opts.tickMs,
    maxEventsPerTick: opts.maxEventsPerTick,
    logger: log,
  });
  let transport: WebSocketTransport | null = null;

  function attachWebSockets(server: Server): void {
    if (transport) return;
    transport = attachWebSocketTransport({ server, loop, logger: log, heartbeatMs: opts.heartbeatMs });
    loop.start();
  }

  async function shutdown(): Promise<void> {
    loop.stop();
    if (transport) {
      const t = transport;
      transport = null;
      await t.close();
    }
  }

  const app = express();
  app.use(cors());

  app.use((req, _res, next) => {
    log.debug(`${req.method} ${req.path}`);
    next();
  });

  app.get("/api/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.get("/api/stats", (_req, res) => {
    res.json({ ...sessions.stats(), connections: transport ? transport.connectionCount() : 0 });
  });

  return { app, sessions, loop, attachWebSockets, shutdown };
}

export async function startChessServer(
  args: ServerOpts & { port?: number; host?: string } = {},
): Promise<{
  app: express.Express;
  server: Server;
  sessions: SessionServer;
  url: string;
  close: () => Promise<void>;
}> {
  const { app, sessions, attachWebSockets, shutdown } = createChessApp(args);
  const port = args.port !== undefined && Number.isFinite(args.port) ? args.port : 1812;

  // Explicit HTTP server so the WebSocket endpoint shares the port.
  const server = createServer(app);
  attachWebSockets(server);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.once("listening", () => resolve());
    server.listen(port, args.host);
  });

  const address = server.address();
  const actualPort = address !== null && typeof address === "object" ? address.port : port;

  async function close(): Promise<void> {
    await shutdown();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  return { app, server, sessions, url: `http://${args.host ?? "localhost"}:${actualPort}`, close };
}
