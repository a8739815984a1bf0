/**
 * @petledger/ledger — Ledger store.
 *
 * The authoritative mapping from account to pet record, and from pet id
 * to activity heights. Pure data access: no validation happens here.
 *
 * Invariant kept by callers (the dispatcher): at most one record per account.
 */

import type { Account, Height, PetId, PetRecord } from "@petledger/types";
import type { LedgerStoreSnapshot, StoreWrite } from "./types.js";

/** Feed height reported for a pet that was never fed. */
export const NEVER_FED: Height = 0;

export interface LedgerStore {
  get(account: Account): PetRecord | undefined;
  put(account: Account, record: PetRecord): void;
  remove(account: Account): void;

  /** Last feed height, or NEVER_FED. Always defined. */
  feedTimeOf(petId: PetId): Height;
  setFeedTime(petId: PetId, height: Height): void;

  /** Last sleep height, or undefined if the pet never slept. */
  sleepTimeOf(petId: PetId): Height | undefined;
  setSleepTime(petId: PetId, height: Height): void;

  /**
   * Apply every write of one dispatch, in order, as a single call.
   */
  commit(writes: readonly StoreWrite[]): void;
}

/**
 * Map-backed store. One instance per ledger; instances never share state.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly _owners = new Map<Account, PetRecord>();
  private readonly _feedTimes = new Map<PetId, Height>();
  private readonly _sleepTimes = new Map<PetId, Height>();

  get(account: Account): PetRecord | undefined {
    return this._owners.get(account);
  }

  put(account: Account, record: PetRecord): void {
    this._owners.set(account, record);
  }

  remove(account: Account): void {
    this._owners.delete(account);
  }

  feedTimeOf(petId: PetId): Height {
    return this._feedTimes.get(petId) ?? NEVER_FED;
  }

  setFeedTime(petId: PetId, height: Height): void {
    this._feedTimes.set(petId, height);
  }

  sleepTimeOf(petId: PetId): Height | undefined {
    return this._sleepTimes.get(petId);
  }

  setSleepTime(petId: PetId, height: Height): void {
    this._sleepTimes.set(petId, height);
  }

  commit(writes: readonly StoreWrite[]): void {
    for (const write of writes) {
      switch (write.op) {
        case "put":
          this.put(write.account, write.record);
          break;
        case "remove":
          this.remove(write.account);
          break;
        case "set_feed_time":
          this.setFeedTime(write.petId, write.height);
          break;
        case "set_sleep_time":
          this.setSleepTime(write.petId, write.height);
          break;
      }
    }
  }

  // ─── Inspection ──────────────────────────────────────────────────────

  get accountCount(): number {
    return this._owners.size;
  }

  owners(): readonly { readonly account: Account; readonly record: PetRecord }[] {
    return [...this._owners].map(([account, record]) => ({ account, record }));
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(): LedgerStoreSnapshot {
    return {
      version: 1,
      owners: this.owners(),
      feedTimes: [...this._feedTimes].map(([petId, height]) => ({ petId, height })),
      sleepTimes: [...this._sleepTimes].map(([petId, height]) => ({ petId, height })),
    };
  }

  static fromSnapshot(snapshot: LedgerStoreSnapshot): InMemoryLedgerStore {
    const store = new InMemoryLedgerStore();
    for (const { account, record } of snapshot.owners) {
      store.put(account, record);
    }
    for (const { petId, height } of snapshot.feedTimes) {
      store.setFeedTime(petId, height);
    }
    for (const { petId, height } of snapshot.sleepTimes) {
      store.setSleepTime(petId, height);
    }
    return store;
  }
}
