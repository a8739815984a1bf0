/**
 * @petledger/ledger — Command dispatcher.
 *
 * One transition per command kind, evaluated against the store at the
 * clock's current height:
 *
 * - mint      — sender must own nothing; stores the record under sender
 * - transfer  — sender must own a pet, receiver must own nothing; moves it
 * - feed      — sender must own a pet; stamps its last feed height
 * - sleep     — sender must own a pet; stamps its last sleep height
 *
 * Mint does NOT check that the id is unused by other accounts. Two accounts
 * may hold pets with the same id (and then share activity heights, which
 * are keyed by pet id).
 *
 * A dispatch either commits all its writes and appends exactly one event,
 * or returns a LedgerError having touched nothing.
 */

import type { Account, Command, PetEvent, PetRecord } from "@petledger/types";
import type { EventOrigin, PetEventSink } from "@petledger/event-store";
import type { Clock } from "./clock.js";
import { assertHeight } from "./clock.js";
import type { LedgerStore } from "./store.js";
import type { DispatchResult, StoreWrite, ValidationResult } from "./types.js";
import { LedgerError } from "./types.js";

/** Block/extrinsic context attached to emitted events. The height comes from the clock. */
export type DispatchOrigin = Omit<EventOrigin, "height">;

export class Dispatcher {
  constructor(
    private readonly store: LedgerStore,
    private readonly clock: Clock,
    private readonly sink: PetEventSink,
  ) {}

  /**
   * Check preconditions and plan the effect, without touching the store.
   */
  validate(sender: Account, command: Command): ValidationResult {
    const height = this.clock.now();
    assertHeight(height);

    switch (command.kind) {
      case "mint": {
        if (this.store.get(sender) !== undefined) {
          return fail("ACCOUNT_ALREADY_HAS_PET", `Account ${sender} already has a pet`);
        }
        const record: PetRecord = {
          id: command.id,
          name: command.name,
          species: command.species,
        };
        return plan(
          [{ op: "put", account: sender, record }],
          { kind: "pet_minted", owner: sender, petId: command.id },
          height,
        );
      }

      case "transfer": {
        const record = this.store.get(sender);
        if (record === undefined) {
          return fail("ACCOUNT_HAS_NO_PET", `Account ${sender} has no pet`);
        }
        if (this.store.get(command.receiver) !== undefined) {
          return fail(
            "ACCOUNT_ALREADY_HAS_PET",
            `Account ${command.receiver} already has a pet`,
          );
        }
        return plan(
          [
            { op: "put", account: command.receiver, record },
            { op: "remove", account: sender },
          ],
          { kind: "pet_transferred", from: sender, to: command.receiver, petId: record.id },
          height,
        );
      }

      case "feed": {
        const record = this.store.get(sender);
        if (record === undefined) {
          return fail("ACCOUNT_HAS_NO_PET", `Account ${sender} has no pet`);
        }
        return plan(
          [{ op: "set_feed_time", petId: record.id, height }],
          { kind: "pet_fed", owner: sender, petId: record.id },
          height,
        );
      }

      case "sleep": {
        const record = this.store.get(sender);
        if (record === undefined) {
          return fail("ACCOUNT_HAS_NO_PET", `Account ${sender} has no pet`);
        }
        return plan(
          [{ op: "set_sleep_time", petId: record.id, height }],
          { kind: "pet_slept", owner: sender, petId: record.id },
          height,
        );
      }
    }
  }

  /**
   * Validate and apply a command.
   */
  dispatch(sender: Account, command: Command, origin?: DispatchOrigin): DispatchResult {
    const validation = this.validate(sender, command);
    if (!validation.ok) {
      return validation;
    }

    const { writes, event, height } = validation.plan;
    this.store.commit(writes);
    const stored = this.sink.append(event, { ...origin, height });

    return { ok: true, event, stored };
  }
}

function plan(writes: readonly StoreWrite[], event: PetEvent, height: number): ValidationResult {
  return { ok: true, plan: { writes, event, height } };
}

function fail(code: "ACCOUNT_ALREADY_HAS_PET" | "ACCOUNT_HAS_NO_PET", message: string): ValidationResult {
  return { ok: false, error: new LedgerError(code, message) };
}
