/**
 * @petledger/ledger — Single-owner pet ledger engine.
 *
 * Enforces:
 * - At most one pet per account
 * - Records are moved, never copied, by transfer
 * - Activity heights are keyed by pet id and survive transfer
 * - A dispatch writes everything and emits one event, or nothing at all
 *
 * Zero runtime dependencies outside the workspace.
 */

// Core engine
export { Dispatcher } from "./dispatcher.js";
export type { DispatchOrigin } from "./dispatcher.js";
export { LockingDispatcher, accountKey, petKey } from "./locking-dispatcher.js";
export { KeyedMutex } from "./keyed-mutex.js";

// Store
export { InMemoryLedgerStore, NEVER_FED } from "./store.js";
export type { LedgerStore } from "./store.js";

// Clock
export { ManualClock, assertHeight } from "./clock.js";
export type { Clock } from "./clock.js";

// Types
export type {
  StoreWrite,
  DispatchPlan,
  ValidationResult,
  DispatchResult,
  LedgerStoreSnapshot,
  LedgerErrorCode,
} from "./types.js";
export { LedgerError } from "./types.js";
