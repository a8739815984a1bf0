/**
 * @petledger/event-store — Core types.
 *
 * Design principles:
 * - Events are immutable after creation
 * - The log is append-only (no UPDATE, no DELETE)
 * - Every event has a monotonically increasing global position
 * - Each event links to its predecessor by hash
 */

import type { ExtrinsicHash, Height, PetEvent } from "@petledger/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * Where an event came from.
 *
 * `height` is always known. Block and extrinsic fields are set when the
 * event was produced while authoring a block; a bare ledger leaves them out.
 */
export interface EventOrigin {
  readonly height: Height;
  readonly blockHash?: string | undefined;
  readonly extrinsicHash?: ExtrinsicHash | undefined;
  /** Index of the extrinsic within its block (0-based) */
  readonly extrinsicIndex?: number | undefined;
}

/**
 * An event as persisted in the log.
 */
export interface StoredPetEvent {
  readonly event: PetEvent;
  readonly origin: EventOrigin;

  /** Position across the whole log (1-based, gap-free) */
  readonly position: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;
  readonly previousHash: string;
}

// =============================================================================
// Read Options
// =============================================================================

export type ReadDirection = "forward" | "backward";

export interface ReadAllOptions {
  /** Start reading from this position (inclusive). Default: 1 forward, head backward */
  readonly fromPosition?: number | undefined;

  /** Maximum number of events to read. Default: unlimited */
  readonly maxCount?: number | undefined;

  /** Reading direction. Default: "forward" */
  readonly direction?: ReadDirection | undefined;
}

// =============================================================================
// Subscription
// =============================================================================

export type EventHandler = (event: StoredPetEvent) => void;

export interface Subscription {
  unsubscribe(): void;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Position of the last event whose hash was checked */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_POSITION"
  | "INVALID_ORIGIN"
  | "INVALID_LIMIT";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
