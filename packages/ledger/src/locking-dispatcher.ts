/**
 * @petledger/ledger — Dispatcher for hosts that run commands concurrently.
 *
 * Every dispatch holds locks on the accounts and the pet id it touches:
 *
 * - mint      — account:<sender>, pet:<id>
 * - transfer  — account:<sender>, account:<receiver>, pet:<sender's pet id>
 * - feed/sleep — account:<sender>, pet:<sender's pet id>
 *
 * The sender's pet id is read before locking. If it changed by the time the
 * locks are held, the locks are released and taken again.
 */

import type { Account, Command, PetId } from "@petledger/types";
import type { Dispatcher, DispatchOrigin } from "./dispatcher.js";
import { KeyedMutex } from "./keyed-mutex.js";
import type { LedgerStore } from "./store.js";
import type { DispatchResult } from "./types.js";

export function accountKey(account: Account): string {
  return `account:${account}`;
}

export function petKey(petId: PetId): string {
  return `pet:${petId}`;
}

export class LockingDispatcher {
  private readonly _mutex: KeyedMutex;

  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly store: LedgerStore,
    mutex?: KeyedMutex,
  ) {
    this._mutex = mutex ?? new KeyedMutex();
  }

  async dispatch(
    sender: Account,
    command: Command,
    origin?: DispatchOrigin,
  ): Promise<DispatchResult> {
    for (;;) {
      const petId = command.kind === "mint" ? command.id : this.store.get(sender)?.id;
      const keys = this.lockKeys(sender, command, petId);

      const outcome = await this._mutex.runExclusive(keys, () => {
        const current = command.kind === "mint" ? command.id : this.store.get(sender)?.id;
        if (current !== petId) {
          return undefined;
        }
        return this.dispatcher.dispatch(sender, command, origin);
      });

      if (outcome !== undefined) {
        return outcome;
      }
    }
  }

  lockKeys(sender: Account, command: Command, petId: PetId | undefined): string[] {
    const keys = [accountKey(sender)];
    if (command.kind === "transfer") {
      keys.push(accountKey(command.receiver));
    }
    if (petId !== undefined) {
      keys.push(petKey(petId));
    }
    return keys;
  }
}
