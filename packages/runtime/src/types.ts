/**
 * @petledger/runtime domain types.
 *
 * Block authoring types for:
 * - Node configuration
 * - Authored blocks and their dispatch failures
 * - Log entries emitted by the node
 */

import type { BlockRef, ExtrinsicHash, Height, PetEvent } from "@petledger/types";
import type { StoredPetEvent } from "@petledger/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface LedgerNodeConfig {
  /** Maximum UTF-8 byte length of a pet name (fixed for the node's lifetime) */
  readonly maxNameLength: number;

  /** Blocks that must be built on top of a block before it is final. Default: 2 */
  readonly finalityDepth?: number | undefined;

  /** Pending extrinsics held before new ones are dropped. Default: 1024 */
  readonly maxPoolSize?: number | undefined;

  /** Extrinsics taken from the pool per block. Default: 256 */
  readonly maxExtrinsicsPerBlock?: number | undefined;

  /** Interval between authored blocks once started. Default: 6000 */
  readonly blockTimeMs?: number | undefined;

  /** Receives structured log entries */
  readonly log?: ((entry: NodeLogEntry) => void) | undefined;
}

export const DEFAULT_FINALITY_DEPTH = 2;
export const DEFAULT_MAX_POOL_SIZE = 1024;
export const DEFAULT_MAX_EXTRINSICS_PER_BLOCK = 256;
export const DEFAULT_BLOCK_TIME_MS = 6000;

// =============================================================================
// Blocks
// =============================================================================

/**
 * A command that was included but whose dispatch failed.
 * Its nonce is consumed; it produced no event.
 */
export interface DispatchFailure {
  readonly extrinsicHash: ExtrinsicHash;
  readonly extrinsicIndex: number;
  readonly code: string;
  readonly message: string;
}

export interface Block {
  readonly ref: BlockRef;
  readonly parentHash: string;
  readonly extrinsics: readonly ExtrinsicHash[];
  readonly failures: readonly DispatchFailure[];
}

/**
 * Everything a block produced, as read back after finality.
 */
export interface BlockEvents {
  readonly block: BlockRef;
  readonly events: readonly StoredPetEvent[];
  readonly failures: readonly DispatchFailure[];
}

/**
 * Outcome of checking an envelope against current state without applying it.
 */
export type DryRunResult =
  | { readonly ok: true; readonly event: PetEvent; readonly height: Height }
  | { readonly ok: false; readonly code: string; readonly message: string };

// =============================================================================
// Logging
// =============================================================================

export type NodeLogEvent =
  | "extrinsic.accepted"
  | "extrinsic.rejected"
  | "dispatch.failed"
  | "dispatch.errored"
  | "block.authored"
  | "block.finalized"
  | "subscriber.failed"
  | "node.started"
  | "node.stopped";

export interface NodeLogEntry {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly event: NodeLogEvent;
  readonly height?: Height | undefined;
  readonly blockHash?: string | undefined;
  readonly extrinsicHash?: ExtrinsicHash | undefined;
  readonly detail?: string | undefined;
}

// =============================================================================
// Errors
// =============================================================================

export type RuntimeErrorCode =
  | "UNKNOWN_BLOCK"
  | "STREAM_CONSUMED"
  | "INVALID_KEY"
  | "INVALID_CONFIG";

export class RuntimeError extends Error {
  constructor(
    public readonly code: RuntimeErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RuntimeError";
  }
}
