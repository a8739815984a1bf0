/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around a LedgerNode.
 * Separated from main.ts so tests build the app without an HTTP server
 * or a block timer.
 */

import type { Context } from "hono";
import { Hono } from "hono";
import type { LedgerNode } from "@petledger/runtime";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createExtrinsicRoutes } from "./routes/extrinsics.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createPetRoutes } from "./routes/pets.js";
import { createBlockRoutes } from "./routes/blocks.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly node: LedgerNode;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Sees every error answered with a 500 */
  readonly onInternalError?: ((err: Error, c: Context) => void) | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly node: LedgerNode;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { node } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(node));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/v1/*", async (c, next) => {
    c.set("node", node);
    await next();
  });

  app.route("/v1/extrinsics", createExtrinsicRoutes());
  app.route("/v1/accounts", createAccountRoutes());
  app.route("/v1/pets", createPetRoutes());
  app.route("/v1/blocks", createBlockRoutes());
  app.route("/v1/events", createEventRoutes());

  return { app, node };
}
