/**
 * @petledger/node — HTTP service hosting a ledger node.
 */

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export { EXTRINSIC_HASH_HEADER } from "./routes/extrinsics.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
