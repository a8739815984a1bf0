/**
 * @petledger/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredPetEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first event in the chain.
 */
export const GENESIS_HASH = "genesis";

/** The hashed fields of a stored event. */
export type HashableEvent = Pick<StoredPetEvent, "event" | "origin" | "position" | "appendedAt">;

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 */
export function computeEventHash(
  event: HashableEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    event: event.event,
    origin: event.origin,
    position: event.position,
    appendedAt: event.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of a sequence of events in position order.
 */
export function verifyHashChain(
  events: readonly StoredPetEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let lastVerifiedPosition = 0;

  for (const event of events) {
    if (event.previousHash !== previousHash) {
      errors.push({
        position: event.position,
        reason: `previousHash mismatch at position ${event.position}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      errors.push({
        position: event.position,
        reason: `Hash mismatch at position ${event.position}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    previousHash = event.hash;
    lastVerifiedPosition = event.position;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
