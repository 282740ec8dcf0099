import { startChessServer } from "./app.ts";
import { resolveServerConfig } from "./config.ts";
import { createConsoleLogger } from "./log.ts";
import { WS_PATH } from "./wsTransport.ts";

const config = resolveServerConfig();
const logger = createConsoleLogger({ debug: config.debug });

startChessServer({
  port: config.port,
  host: config.host,
  tickMs: config.tickMs,
  maxEventsPerTick: config.maxEventsPerTick,
  heartbeatMs: config.heartbeatMs,
  logger,
})
  .then(({ url, close }) => {
    logger.info(`listening on ${url} (websocket ${WS_PATH})`);

    let stopping = false;
    const stop = (signal: string): void => {
      if (stopping) return;
      stopping = true;
      logger.info(`${signal} received, shutting down`);
      close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error("shutdown failed", err);
          process.exit(1);
        },
      );
    };
    process.on("SIGINT", () => stop("SIGINT"));
    process.on("SIGTERM", () => stop("SIGTERM"));
  })
  .catch((err: unknown) => {
    logger.error("failed to start", err);
    process.exit(1);
  });
