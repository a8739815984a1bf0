/**
 * Account routes.
 *
 * GET /v1/accounts/:account/pet    — The account's pet, or 404
 * GET /v1/accounts/:account/nonce  — Nonce for the account's next envelope
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account/pet", (c) => {
    const account = c.req.param("account");
    const pet = c.get("node").petOf(account);
    if (pet === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Account ${account} has no pet`), 404);
    }
    return c.json({ data: pet });
  });

  routes.get("/:account/nonce", (c) => {
    return c.json({ data: { nonce: c.get("node").nextNonce(c.req.param("account")) } });
  });

  return routes;
}
