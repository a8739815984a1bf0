/**
 * Test helpers for @petledger/ledger.
 */

import { PetEventLog } from "@petledger/event-store";
import type { Command } from "@petledger/types";
import { ManualClock } from "../src/clock.js";
import { Dispatcher } from "../src/dispatcher.js";
import { InMemoryLedgerStore } from "../src/store.js";

export interface TestLedger {
  readonly store: InMemoryLedgerStore;
  readonly clock: ManualClock;
  readonly log: PetEventLog;
  readonly dispatcher: Dispatcher;
}

export function createTestLedger(startHeight = 1): TestLedger {
  const store = new InMemoryLedgerStore();
  const clock = new ManualClock(startHeight);
  const log = new PetEventLog();
  const dispatcher = new Dispatcher(store, clock, log);
  return { store, clock, log, dispatcher };
}

export function mint(id: number, name = "Shelly"): Command {
  return { kind: "mint", name, species: "Turtle", id };
}

/** Let every pending microtask run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
