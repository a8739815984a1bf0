/**
 * Test helpers for @petledger/sdk.
 */

import type { BlockRef, Command, SignedEnvelope, TxStatus } from "@petledger/types";
import type { BlockEvents } from "@petledger/runtime";
import type { StoredPetEvent } from "@petledger/event-store";
import type { Submission, Transport } from "../src/types.js";

export const BLOCK: BlockRef = { hash: "b1", height: 1 };

/** Yields `statuses`, then fails the way a dropped connection does. */
export async function* failing(statuses: readonly TxStatus[], error: Error): AsyncGenerator<TxStatus> {
  for (const status of statuses) {
    yield status;
  }
  throw error;
}

export async function* scripted(statuses: readonly TxStatus[]): AsyncGenerator<TxStatus> {
  for (const status of statuses) {
    yield status;
  }
}

export function submission(
  statuses: AsyncIterable<TxStatus>,
  command: Command = { kind: "mint", name: "Shelly", species: "Turtle", id: 7 },
  extrinsicHash = "x1",
): Submission {
  return {
    extrinsicHash,
    envelope: { signer: "alice", nonce: 0, command, signature: "sig" },
    command,
    statuses,
  };
}

export function storedEvent(
  event: StoredPetEvent["event"],
  extrinsicHash: string,
  block: BlockRef = BLOCK,
): StoredPetEvent {
  return {
    event,
    origin: { height: block.height, blockHash: block.hash, extrinsicHash, extrinsicIndex: 0 },
    position: 1,
    appendedAt: "2026-01-01T00:00:00.000Z",
    hash: "h1",
    previousHash: "genesis",
  };
}

/**
 * Transport with canned answers. Records every submitted envelope.
 */
export class FakeTransport implements Transport {
  readonly submitted: SignedEnvelope[] = [];
  nonce = 0;
  statuses: readonly TxStatus[] = [{ kind: "ready" }];
  blockEvents: BlockEvents = { block: BLOCK, events: [], failures: [] };
  /** Thrown by submitAndWatch after the envelope is recorded */
  submitError: Error | undefined;
  /** Thrown by fetchEvents */
  fetchError: Error | undefined;

  async submitAndWatch(envelope: SignedEnvelope): Promise<AsyncIterable<TxStatus>> {
    this.submitted.push(envelope);
    if (this.submitError !== undefined) {
      throw this.submitError;
    }
    return scripted(this.statuses);
  }

  async fetchEvents(_blockHash: string): Promise<BlockEvents> {
    if (this.fetchError !== undefined) {
      throw this.fetchError;
    }
    return this.blockEvents;
  }

  async nextNonce(_account: string): Promise<number> {
    return this.nonce;
  }
}

/** Let every pending microtask and zero-delay timer run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
