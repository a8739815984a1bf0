/**
 * Runtime Type Guards
 *
 * Narrowing functions for pet ledger types.
 * Used at system boundaries (HTTP bodies, SSE frames, deserialized data).
 */

import type { Command, SignedEnvelope } from "./command.js";
import type { PetEvent } from "./event.js";
import type { BlockRef, TxStatus } from "./chain.js";
import type { PetId, PetRecord, Species } from "./pet.js";
import { MAX_PET_ID, SPECIES } from "./pet.js";

// =============================================================================
// Pet guards
// =============================================================================

const SPECIES_SET = new Set<string>(SPECIES);

export function isSpecies(value: unknown): value is Species {
  return typeof value === "string" && SPECIES_SET.has(value);
}

export function isPetId(value: unknown): value is PetId {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= MAX_PET_ID
  );
}

export function isPetRecord(value: unknown): value is PetRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isPetId(v.id) && typeof v.name === "string" && isSpecies(v.species);
}

// =============================================================================
// Command guards
// =============================================================================

export function isCommand(value: unknown): value is Command {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.kind) {
    case "mint":
      return typeof v.name === "string" && isSpecies(v.species) && isPetId(v.id);
    case "transfer":
      return typeof v.receiver === "string" && v.receiver.length > 0;
    case "feed":
    case "sleep":
      return true;
    default:
      return false;
  }
}

export function isSignedEnvelope(value: unknown): value is SignedEnvelope {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.signer === "string" &&
    v.signer.length > 0 &&
    typeof v.nonce === "number" &&
    Number.isInteger(v.nonce) &&
    v.nonce >= 0 &&
    isCommand(v.command) &&
    typeof v.signature === "string"
  );
}

// =============================================================================
// Event guards
// =============================================================================

export function isPetEvent(value: unknown): value is PetEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.kind) {
    case "pet_minted":
    case "pet_fed":
    case "pet_slept":
      return typeof v.owner === "string" && isPetId(v.petId);
    case "pet_transferred":
      return typeof v.from === "string" && typeof v.to === "string" && isPetId(v.petId);
    default:
      return false;
  }
}

// =============================================================================
// Chain guards
// =============================================================================

export function isBlockRef(value: unknown): value is BlockRef {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.hash === "string" &&
    typeof v.height === "number" &&
    Number.isInteger(v.height) &&
    v.height >= 0
  );
}

export function isTxStatus(value: unknown): value is TxStatus {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  switch (v.kind) {
    case "ready":
      return true;
    case "in_block":
    case "finalized":
      return isBlockRef(v.block);
    case "dropped":
    case "invalid":
      return typeof v.reason === "string";
    case "error":
      return typeof v.detail === "string";
    default:
      return false;
  }
}
