/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe (node accepting extrinsics + event log hash chain intact)
 */

import { Hono } from "hono";
import type { LedgerNode } from "@petledger/runtime";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(node: LedgerNode): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = node.eventLog.verifyIntegrity();
    const ready = integrity.valid && !node.stopped;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        head: node.head(),
        finalized: node.finalizedHead(),
        events: node.eventLog.position(),
        eventLog: integrity.valid
          ? { status: "ok" }
          : { status: "down", detail: `${integrity.errors.length} integrity errors` },
        accepting: !node.stopped,
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
