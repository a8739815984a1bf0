/**
 * Tests for the event hash chain.
 */

import { describe, it, expect } from "vitest";
import { PetEventLog } from "../src/pet-event-log.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredPetEvent } from "../src/types.js";

function chain(): readonly StoredPetEvent[] {
  const log = new PetEventLog();
  log.append({ kind: "pet_minted", owner: "alice", petId: 7 }, { height: 1 });
  log.append({ kind: "pet_fed", owner: "alice", petId: 7 }, { height: 2 });
  log.append({ kind: "pet_slept", owner: "alice", petId: 7 }, { height: 3 });
  return log.readAll();
}

describe("computeEventHash", () => {
  it("is deterministic for the same content and predecessor", () => {
    const [first] = chain();
    expect(first).toBeDefined();
    if (first === undefined) return;

    expect(computeEventHash(first, GENESIS_HASH)).toBe(first.hash);
  });

  it("changes when the predecessor changes", () => {
    const [first] = chain();
    if (first === undefined) throw new Error("missing event");

    expect(computeEventHash(first, "other")).not.toBe(first.hash);
  });
});

describe("verifyHashChain", () => {
  it("accepts an empty sequence", () => {
    expect(verifyHashChain([])).toEqual({ valid: true, lastVerifiedPosition: 0, errors: [] });
  });

  it("detects a tampered payload", () => {
    const events = [...chain()];
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, event: { kind: "pet_fed", owner: "mallory", petId: 7 } };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
  });

  it("detects a removed event", () => {
    const events = chain().filter((e) => e.position !== 2);

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.position).toBe(3);
    expect(result.errors[0]?.reason).toContain("previousHash mismatch at position 3");
  });
});
