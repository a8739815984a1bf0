/**
 * @petledger/runtime — Authoritative ledger node.
 *
 * Provides:
 * - LedgerNode: admission, pool, block authoring and finality
 * - Ed25519 signed envelopes and extrinsic hashes
 * - Single-consumer status streams
 */

export { LedgerNode, GENESIS_BLOCK_HASH } from "./ledger-node.js";
export type { LedgerNodeOptions } from "./ledger-node.js";

export { StatusChannel } from "./status-channel.js";

export {
  Ed25519Signer,
  generateSigner,
  signerFromPrivateKey,
  signingPayload,
  signEnvelope,
  verifyEnvelope,
  extrinsicHash,
  isAccount,
} from "./signing.js";
export type { Signer } from "./signing.js";

export type {
  LedgerNodeConfig,
  Block,
  BlockEvents,
  DispatchFailure,
  DryRunResult,
  NodeLogEvent,
  NodeLogEntry,
  RuntimeErrorCode,
} from "./types.js";
export {
  RuntimeError,
  DEFAULT_FINALITY_DEPTH,
  DEFAULT_MAX_POOL_SIZE,
  DEFAULT_MAX_EXTRINSICS_PER_BLOCK,
  DEFAULT_BLOCK_TIME_MS,
} from "./types.js";
