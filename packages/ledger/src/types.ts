/**
 * @petledger/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - A failed dispatch writes nothing and emits nothing
 * - Validation failures are returned, programmer errors are thrown
 */

import type { Account, Height, PetEvent, PetId, PetRecord } from "@petledger/types";
import type { StoredPetEvent } from "@petledger/event-store";

// ─── Store Writes ────────────────────────────────────────────────────────

/**
 * A single store mutation planned by the dispatcher.
 * All writes of one dispatch are committed together.
 */
export type StoreWrite =
  | { readonly op: "put"; readonly account: Account; readonly record: PetRecord }
  | { readonly op: "remove"; readonly account: Account }
  | { readonly op: "set_feed_time"; readonly petId: PetId; readonly height: Height }
  | { readonly op: "set_sleep_time"; readonly petId: PetId; readonly height: Height };

// ─── Dispatch Results ────────────────────────────────────────────────────

/**
 * The validated effect of a command: what to write and what to emit.
 */
export interface DispatchPlan {
  readonly writes: readonly StoreWrite[];
  readonly event: PetEvent;
  readonly height: Height;
}

export type ValidationResult =
  | { readonly ok: true; readonly plan: DispatchPlan }
  | { readonly ok: false; readonly error: LedgerError };

export type DispatchResult =
  | { readonly ok: true; readonly event: PetEvent; readonly stored: StoredPetEvent }
  | { readonly ok: false; readonly error: LedgerError };

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the whole store.
 */
export interface LedgerStoreSnapshot {
  readonly version: 1;
  readonly owners: readonly { readonly account: Account; readonly record: PetRecord }[];
  readonly feedTimes: readonly { readonly petId: PetId; readonly height: Height }[];
  readonly sleepTimes: readonly { readonly petId: PetId; readonly height: Height }[];
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "ACCOUNT_ALREADY_HAS_PET"
  | "ACCOUNT_HAS_NO_PET"
  | "CLOCK_REGRESSION"
  | "INVALID_HEIGHT";

/**
 * Structured error from the ledger engine.
 *
 * ACCOUNT_* codes are precondition failures and come back inside a
 * DispatchResult. The others signal a broken clock and are thrown.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
