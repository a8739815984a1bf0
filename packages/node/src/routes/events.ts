/**
 * Event query routes.
 *
 * GET /v1/events?limit=N — The latest N events, oldest first (default 20, max 100)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RecentEventsQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const queryResult = RecentEventsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const node = c.get("node");
    return c.json({
      data: node.recentEvents(queryResult.data.limit),
      head: node.head(),
    });
  });

  return routes;
}
