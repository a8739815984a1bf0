/**
 * Zod validation middleware.
 *
 * Validates the JSON request body and exposes the parsed value as
 * `validatedBody`, typed by the schema, to the handlers after it.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodSchema } from "zod";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<T>(
  schema: ZodSchema<T>,
): MiddlewareHandler<{ Variables: { validatedBody: T } }> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
