/**
 * @petledger/node — Entry point.
 *
 * Loads config, starts the block author and the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { LedgerNode } from "@petledger/runtime";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const node = new LedgerNode({
    maxNameLength: config.MAX_NAME_LENGTH,
    finalityDepth: config.FINALITY_DEPTH,
    maxPoolSize: config.MAX_POOL_SIZE,
    maxExtrinsicsPerBlock: config.MAX_EXTRINSICS_PER_BLOCK,
    blockTimeMs: config.BLOCK_TIME_MS,
    log: (entry) => {
      logger[entry.level]({ ...entry }, entry.event);
    },
  });

  const { app } = createApp({
    node,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onInternalError: (err) => {
      logger.error({ err }, "Unhandled error");
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  node.start();
  logger.info(
    { port: config.PORT, host: config.HOST, blockTimeMs: config.BLOCK_TIME_MS },
    "Pet ledger node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    node.stop();
    server.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
