export type ServerConfig = {
  port: number;
  host: string;
  /** Interval between event-loop ticks. */
  tickMs: number;
  maxEventsPerTick: number;
  heartbeatMs: number;
  debug: boolean;
};

export const DEFAULT_PORT = 1812;

function parsePort(raw: string, source: string): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0 || n > 65_535) throw new Error(`Invalid port from ${source}: ${raw}`);
  return n;
}

function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Math.trunc(Number(raw));
  return Number.isFinite(n) && n > 0 ? n : fallback;
}

/** `--port=<n>` or `-p=<n>` on the command line wins over `PORT`. */
function portFromArgv(argv: readonly string[]): string | null {
  for (const arg of argv) {
    const eq = arg.indexOf("=");
    if (eq < 0) continue;
    const key = arg.slice(0, eq);
    if (key === "--port" || key === "-p") return arg.slice(eq + 1);
  }
  return null;
}

export function resolveServerConfig(
  env: Record<string, string | undefined> = process.env,
  argv: readonly string[] = process.argv.slice(2),
): ServerConfig {
  const argPort = portFromArgv(argv);
  const port =
    argPort !== null
      ? parsePort(argPort, "--port")
      : env.PORT != null && env.PORT !== ""
        ? parsePort(env.PORT, "PORT")
        : DEFAULT_PORT;

  return {
    port,
    host: env.HOST && env.HOST.trim() !== "" ? env.HOST.trim() : "127.0.0.1",
    tickMs: positiveInt(env.CHESS_TICK_MS, 10),
    maxEventsPerTick: positiveInt(env.CHESS_MAX_EVENTS_PER_TICK, 256),
    heartbeatMs: positiveInt(env.CHESS_HEARTBEAT_MS, 15_000),
    debug: env.CHESS_SERVER_DEBUG === "1",
  };
}
