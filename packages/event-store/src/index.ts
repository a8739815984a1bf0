/**
 * @petledger/event-store — Append-only pet event log.
 *
 * Provides:
 * - PetEventLog: process-scoped, hash-chained log in dispatch order
 * - Bounded reads: recent window, per-block, positional ranges
 * - Synchronous in-order subscriptions
 */

export { PetEventLog } from "./pet-event-log.js";
export type { PetEventLogOptions, PetEventSink } from "./pet-event-log.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";
export type { HashableEvent } from "./hash-chain.js";

export type {
  EventOrigin,
  StoredPetEvent,
  ReadDirection,
  ReadAllOptions,
  EventHandler,
  Subscription,
  IntegrityError,
  EventStoreIntegrityResult,
  EventStoreErrorCode,
} from "./types.js";
export { EventStoreError } from "./types.js";
