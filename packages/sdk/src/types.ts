/**
 * @petledger/sdk — SDK types.
 *
 * Transport contract, submission handles, confirmation outcomes and
 * the SDK error type. Domain types come from @petledger/types.
 */

import type {
  Account,
  BlockRef,
  Command,
  ExtrinsicHash,
  PetEvent,
  SignedEnvelope,
  TxStatus,
} from "@petledger/types";
import type { BlockEvents, DispatchFailure, DryRunResult } from "@petledger/runtime";
import type { StoredPetEvent } from "@petledger/event-store";

// =============================================================================
// Transport
// =============================================================================

/**
 * Connection to a ledger node.
 */
export interface Transport {
  /** Hand an envelope to the node and observe its status stream */
  submitAndWatch(envelope: SignedEnvelope): Promise<AsyncIterable<TxStatus>>;

  /** Events and dispatch failures of a block */
  fetchEvents(blockHash: string): Promise<BlockEvents>;

  /** Nonce the account's next envelope must carry */
  nextNonce(account: Account): Promise<number>;

  /** Check an envelope against current state without submitting it */
  dryRun?(envelope: SignedEnvelope): Promise<DryRunResult>;
}

// =============================================================================
// Submission
// =============================================================================

export interface Submission {
  readonly extrinsicHash: ExtrinsicHash;
  readonly envelope: SignedEnvelope;
  readonly command: Command;

  /** Single-pass: iterating a second time throws SdkError STREAM_CONSUMED */
  readonly statuses: AsyncIterable<TxStatus>;
}

// =============================================================================
// Confirmation
// =============================================================================

export type WatchState = "awaiting" | "pooled" | "in_block" | "resolved";

export interface WatchTransition {
  readonly from: WatchState;
  readonly to: WatchState;
  readonly status: TxStatus;
}

export interface WatchOptions {
  /** Stop observing after this many ms and report `indeterminate` */
  readonly timeoutMs?: number | undefined;

  /** Stop observing when aborted and report `indeterminate` */
  readonly signal?: AbortSignal | undefined;

  readonly onTransition?: ((transition: WatchTransition) => void) | undefined;
}

/** The command's event is present in the finalized block. */
export interface ConfirmedOutcome {
  readonly kind: "confirmed";
  readonly block: BlockRef;
  readonly event: PetEvent;
  readonly stored: StoredPetEvent;
}

/**
 * The extrinsic was finalized but produced no matching event.
 * Usually a dispatch failure, carried in `failure` when the block records one.
 */
export interface UnconfirmedOutcome {
  readonly kind: "unconfirmed";
  readonly block: BlockRef;
  readonly failure?: DispatchFailure | undefined;
}

export interface RejectedOutcome {
  readonly kind: "rejected";
  readonly status: "dropped" | "invalid" | "error";
  readonly detail: string;
}

/**
 * Why the effect of an extrinsic is unknown:
 *
 * - stream_closed: the status stream ended without a terminal status
 * - timeout / cancelled: the caller stopped observing
 * - transport_error: the submission or its status stream failed in transit
 * - events_unavailable: the block was finalized but its events could not
 *   be fetched
 */
export type IndeterminateReason =
  | "stream_closed"
  | "timeout"
  | "cancelled"
  | "transport_error"
  | "events_unavailable";

/**
 * The extrinsic may or may not be applied; callers must not treat this
 * as success or failure.
 */
export interface IndeterminateOutcome {
  readonly kind: "indeterminate";
  readonly reason: IndeterminateReason;
  readonly lastStatus?: TxStatus | undefined;
  /** Message of the failure behind `transport_error` and `events_unavailable` */
  readonly detail?: string | undefined;
}

export type ConfirmationOutcome =
  | ConfirmedOutcome
  | UnconfirmedOutcome
  | RejectedOutcome
  | IndeterminateOutcome;

// =============================================================================
// Errors
// =============================================================================

/**
 * Error raised by the SDK. `statusCode` is the HTTP status where one
 * applies, 0 otherwise.
 */
export class SdkError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: string, message: string, statusCode = 0, details?: unknown) {
    super(message);
    this.name = "SdkError";
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }
}

/**
 * The submission failed in transit after the envelope may have reached
 * the node: a timeout, a network failure or a server error. The node may
 * still apply it, so this is neither success nor failure.
 */
export class SubmissionUnknownError extends SdkError {
  readonly extrinsicHash: ExtrinsicHash;
  override readonly cause: unknown;

  constructor(extrinsicHash: ExtrinsicHash, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(
      "SUBMISSION_UNKNOWN",
      `Submission ${extrinsicHash} may or may not have reached the node: ${message}`,
      cause instanceof SdkError ? cause.statusCode : 0,
    );
    this.name = "SubmissionUnknownError";
    this.extrinsicHash = extrinsicHash;
    this.cause = cause;
  }
}
