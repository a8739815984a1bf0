/**
 * Pet routes.
 *
 * GET /v1/pets/:id/activity — Last feed and sleep heights.
 * `lastSleptAt` is null for a pet that never slept; `lastFedAt` is 0
 * for one that was never fed.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { PetIdParamSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createPetRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:id/activity", (c) => {
    const parsed = PetIdParamSchema.safeParse(c.req.param("id"));
    if (!parsed.success) {
      return c.json(createErrorEnvelope("VALIDATION_ERROR", "Pet id must be a uint32"), 400);
    }

    const activity = c.get("node").activityOf(parsed.data);
    return c.json({
      data: {
        petId: activity.petId,
        lastFedAt: activity.lastFedAt,
        lastSleptAt: activity.lastSleptAt ?? null,
      },
    });
  });

  return routes;
}
