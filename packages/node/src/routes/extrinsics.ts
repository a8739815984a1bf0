/**
 * Extrinsic submission routes.
 *
 * POST /v1/extrinsics          — Submit a signed envelope, stream its statuses (SSE)
 * POST /v1/extrinsics/dry-run  — Check an envelope against current state
 *
 * The status stream sends one `status` event per TxStatus and ends when
 * the node closes it. A client that disconnects stops observation only.
 */

import { Hono } from "hono";
import { streamSSE } from "hono/streaming";
import type { AppEnv } from "../types/api-contract.js";
import { SignedEnvelopeSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export const EXTRINSIC_HASH_HEADER = "X-Extrinsic-Hash";

export function createExtrinsicRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /v1/extrinsics — Submit and watch
  routes.post("/", validateBody(SignedEnvelopeSchema), (c) => {
    const { hash, statuses } = c.get("node").submit(c.get("validatedBody"));
    c.header(EXTRINSIC_HASH_HEADER, hash);

    return streamSSE(c, async (stream) => {
      const iterator = statuses[Symbol.asyncIterator]();
      stream.onAbort(async () => {
        await iterator.return?.();
      });

      let id = 0;
      for (;;) {
        const next = await iterator.next();
        if (next.done === true) break;
        await stream.writeSSE({
          event: "status",
          data: JSON.stringify(next.value),
          id: String(id++),
        });
      }
    });
  });

  // POST /v1/extrinsics/dry-run
  routes.post("/dry-run", validateBody(SignedEnvelopeSchema), (c) => {
    return c.json({ data: c.get("node").dryRun(c.get("validatedBody")) });
  });

  return routes;
}
