/**
 * Chain Types
 *
 * Block references and the status stream of a submitted extrinsic.
 *
 * Status order: ready → (in_block)* → finalized | dropped | invalid | error.
 * Non-terminal statuses may repeat or be skipped; a terminal status
 * ends the stream.
 */

import type { Height } from "./pet.js";

/**
 * Hex-encoded SHA-256 hash of a signed envelope.
 */
export type ExtrinsicHash = string;

/**
 * Reference to an authored block.
 */
export interface BlockRef {
  readonly hash: string;
  readonly height: Height;
}

/** Accepted into the pending pool, not yet included. */
export interface ReadyStatus {
  readonly kind: "ready";
}

/** Included in a block. Not final: inclusion may still be reorganized. */
export interface InBlockStatus {
  readonly kind: "in_block";
  readonly block: BlockRef;
}

export interface FinalizedStatus {
  readonly kind: "finalized";
  readonly block: BlockRef;
}

/** Removed from the pool without inclusion. */
export interface DroppedStatus {
  readonly kind: "dropped";
  readonly reason: string;
}

/** Rejected on admission (bad signature, bad nonce, oversized name, ...). */
export interface InvalidStatus {
  readonly kind: "invalid";
  readonly reason: string;
}

export interface ErrorStatus {
  readonly kind: "error";
  readonly detail: string;
}

export type TxStatus =
  | ReadyStatus
  | InBlockStatus
  | FinalizedStatus
  | DroppedStatus
  | InvalidStatus
  | ErrorStatus;

export type TxStatusKind = TxStatus["kind"];

export type TerminalTxStatus = FinalizedStatus | DroppedStatus | InvalidStatus | ErrorStatus;

const TERMINAL_KINDS: ReadonlySet<TxStatusKind> = new Set<TxStatusKind>([
  "finalized",
  "dropped",
  "invalid",
  "error",
]);

export function isTerminalStatus(status: TxStatus): status is TerminalTxStatus {
  return TERMINAL_KINDS.has(status.kind);
}
