/**
 * Block routes.
 *
 * GET /v1/blocks/head          — Head and finalized head
 * GET /v1/blocks/:hash         — A block's extrinsics and dispatch failures
 * GET /v1/blocks/:hash/events  — Events and dispatch failures of a block
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createBlockRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/head", (c) => {
    const node = c.get("node");
    return c.json({ data: { head: node.head(), finalized: node.finalizedHead() } });
  });

  routes.get("/:hash", (c) => {
    const hash = c.req.param("hash");
    const block = c.get("node").getBlock(hash);
    if (block === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Unknown block ${hash}`), 404);
    }
    return c.json({ data: block });
  });

  // Unknown blocks throw UNKNOWN_BLOCK, mapped to 404 by the error handler
  routes.get("/:hash/events", (c) => {
    return c.json({ data: c.get("node").fetchEvents(c.req.param("hash")) });
  });

  return routes;
}
