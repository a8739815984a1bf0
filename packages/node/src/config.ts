/**
 * @petledger/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  MAX_NAME_LENGTH: z.coerce.number().int().min(1).max(1024).default(32),

  // Block authoring
  BLOCK_TIME_MS: z.coerce.number().int().min(1).default(6000),
  FINALITY_DEPTH: z.coerce.number().int().min(0).default(2),
  MAX_POOL_SIZE: z.coerce.number().int().min(1).default(1024),
  MAX_EXTRINSICS_PER_BLOCK: z.coerce.number().int().min(1).default(256),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
