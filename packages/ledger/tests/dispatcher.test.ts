/**
 * Tests for the command dispatcher.
 *
 * Covers:
 * - Mint, transfer, feed and sleep transitions
 * - Precondition failures leave the store and the event log untouched
 * - Activity heights follow the clock and survive transfer
 * - Pet ids are not unique across accounts
 */

import { describe, it, expect } from "vitest";
import { createTestLedger, mint } from "./helpers.js";
import { LedgerError } from "../src/types.js";
import type { DispatchResult } from "../src/types.js";

function expectError(result: DispatchResult, code: string): void {
  expect(result.ok).toBe(false);
  if (!result.ok) {
    expect(result.error).toBeInstanceOf(LedgerError);
    expect(result.error.code).toBe(code);
  }
}

// =============================================================================
// Mint
// =============================================================================

describe("mint", () => {
  it("stores the record under the sender and emits pet_minted", () => {
    const { store, log, dispatcher } = createTestLedger();

    const result = dispatcher.dispatch("alice", {
      kind: "mint",
      name: "Shelly",
      species: "Turtle",
      id: 7,
    });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event).toEqual({ kind: "pet_minted", owner: "alice", petId: 7 });
      expect(result.stored.position).toBe(1);
    }
    expect(store.get("alice")).toEqual({ id: 7, name: "Shelly", species: "Turtle" });
    expect(log.position()).toBe(1);
  });

  it("fails with ACCOUNT_ALREADY_HAS_PET and changes nothing", () => {
    const { store, log, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    const before = store.snapshot();

    const result = dispatcher.dispatch("alice", mint(8, "Other"));

    expectError(result, "ACCOUNT_ALREADY_HAS_PET");
    expect(store.snapshot()).toEqual(before);
    expect(log.position()).toBe(1);
  });

  it("lets two accounts mint the same id independently", () => {
    const { store, dispatcher } = createTestLedger();

    const first = dispatcher.dispatch("alice", mint(7, "Shelly"));
    const second = dispatcher.dispatch("bob", mint(7, "Slinky"));

    expect(first.ok).toBe(true);
    expect(second.ok).toBe(true);
    expect(store.get("alice")?.id).toBe(7);
    expect(store.get("bob")?.id).toBe(7);
  });
});

// =============================================================================
// Transfer
// =============================================================================

describe("transfer", () => {
  it("moves the record and emits pet_transferred", () => {
    const { store, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));

    const result = dispatcher.dispatch("alice", { kind: "transfer", receiver: "bob" });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.event).toEqual({ kind: "pet_transferred", from: "alice", to: "bob", petId: 7 });
    }
    expect(store.get("alice")).toBeUndefined();
    expect(store.get("bob")).toEqual({ id: 7, name: "Shelly", species: "Turtle" });
  });

  it("fails with ACCOUNT_HAS_NO_PET when the sender owns nothing", () => {
    const { store, log, dispatcher } = createTestLedger();

    const result = dispatcher.dispatch("alice", { kind: "transfer", receiver: "bob" });

    expectError(result, "ACCOUNT_HAS_NO_PET");
    expect(store.accountCount).toBe(0);
    expect(log.position()).toBe(0);
  });

  it("fails with ACCOUNT_ALREADY_HAS_PET when the receiver owns a pet", () => {
    const { store, log, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    dispatcher.dispatch("bob", mint(8, "Hopper"));
    const before = store.snapshot();

    const result = dispatcher.dispatch("alice", { kind: "transfer", receiver: "bob" });

    expectError(result, "ACCOUNT_ALREADY_HAS_PET");
    expect(store.snapshot()).toEqual(before);
    expect(log.position()).toBe(2);
  });

  it("rejects a transfer to oneself as the receiver already has a pet", () => {
    const { store, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));

    const result = dispatcher.dispatch("alice", { kind: "transfer", receiver: "alice" });

    expectError(result, "ACCOUNT_ALREADY_HAS_PET");
    expect(store.get("alice")?.id).toBe(7);
  });

  it("round-trips A → B → A leaving the record identical", () => {
    const { store, log, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    const minted = store.get("alice");

    dispatcher.dispatch("alice", { kind: "transfer", receiver: "bob" });
    dispatcher.dispatch("bob", { kind: "transfer", receiver: "alice" });

    expect(store.get("alice")).toEqual(minted);
    expect(store.get("bob")).toBeUndefined();
    const transfers = log.readAll().filter((s) => s.event.kind === "pet_transferred");
    expect(transfers).toHaveLength(2);
  });

  it("keeps activity heights across a transfer", () => {
    const { store, clock, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    clock.advanceTo(4);
    dispatcher.dispatch("alice", { kind: "feed" });
    dispatcher.dispatch("alice", { kind: "sleep" });

    clock.advanceTo(6);
    dispatcher.dispatch("alice", { kind: "transfer", receiver: "bob" });

    expect(store.feedTimeOf(7)).toBe(4);
    expect(store.sleepTimeOf(7)).toBe(4);
  });
});

// =============================================================================
// Feed / Sleep
// =============================================================================

describe("feed", () => {
  it("stamps the current height and emits pet_fed", () => {
    const { store, clock, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    clock.advanceTo(5);

    const result = dispatcher.dispatch("alice", { kind: "feed" });

    expect(result.ok && result.event).toEqual({ kind: "pet_fed", owner: "alice", petId: 7 });
    expect(store.feedTimeOf(7)).toBe(5);
  });

  it("is not idempotent in time: a later feed overwrites the earlier one", () => {
    const { store, clock, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));

    clock.advanceTo(5);
    dispatcher.dispatch("alice", { kind: "feed" });
    clock.advanceTo(9);
    dispatcher.dispatch("alice", { kind: "feed" });

    expect(store.feedTimeOf(7)).toBe(9);
  });

  it("fails with ACCOUNT_HAS_NO_PET and writes no height", () => {
    const { store, log, dispatcher } = createTestLedger();

    const result = dispatcher.dispatch("alice", { kind: "feed" });

    expectError(result, "ACCOUNT_HAS_NO_PET");
    expect(store.snapshot().feedTimes).toEqual([]);
    expect(log.position()).toBe(0);
  });
});

describe("sleep", () => {
  it("records presence: absent before the first sleep, the height after", () => {
    const { store, clock, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(7));
    expect(store.sleepTimeOf(7)).toBeUndefined();

    clock.advanceTo(3);
    const result = dispatcher.dispatch("alice", { kind: "sleep" });

    expect(result.ok && result.event).toEqual({ kind: "pet_slept", owner: "alice", petId: 7 });
    expect(store.sleepTimeOf(7)).toBe(3);
  });

  it("fails with ACCOUNT_HAS_NO_PET and writes no height", () => {
    const { store, dispatcher } = createTestLedger();

    const result = dispatcher.dispatch("alice", { kind: "sleep" });

    expectError(result, "ACCOUNT_HAS_NO_PET");
    expect(store.snapshot().sleepTimes).toEqual([]);
  });
});

// =============================================================================
// Validation and origins
// =============================================================================

describe("validate", () => {
  it("plans without writing", () => {
    const { store, log, dispatcher } = createTestLedger(2);

    const result = dispatcher.validate("alice", mint(7));

    expect(result).toEqual({
      ok: true,
      plan: {
        writes: [{ op: "put", account: "alice", record: { id: 7, name: "Shelly", species: "Turtle" } }],
        event: { kind: "pet_minted", owner: "alice", petId: 7 },
        height: 2,
      },
    });
    expect(store.accountCount).toBe(0);
    expect(log.position()).toBe(0);
  });
});

describe("origins", () => {
  it("stamps emitted events with the clock height and the given origin", () => {
    const { clock, dispatcher } = createTestLedger();
    clock.advanceTo(12);

    const result = dispatcher.dispatch("alice", mint(7), {
      blockHash: "b12",
      extrinsicHash: "xt",
      extrinsicIndex: 3,
    });

    expect(result.ok && result.stored.origin).toEqual({
      blockHash: "b12",
      extrinsicHash: "xt",
      extrinsicIndex: 3,
      height: 12,
    });
  });

  it("appends events in dispatch order", () => {
    const { log, dispatcher } = createTestLedger();
    dispatcher.dispatch("alice", mint(1));
    dispatcher.dispatch("bob", mint(2));
    dispatcher.dispatch("alice", { kind: "feed" });

    expect(log.readAll().map((s) => s.event.kind)).toEqual([
      "pet_minted",
      "pet_minted",
      "pet_fed",
    ]);
  });
});
