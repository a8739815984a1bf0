/**
 * Pet Types
 *
 * The asset held in the ledger and the keys it is indexed by.
 *
 * Rules:
 * - A record never changes once minted; transfer only moves it
 * - Accounts are opaque comparable keys
 * - Heights come from the ledger's logical clock, never from wall time
 */

/**
 * Opaque account identifier.
 * The runtime uses the hex-encoded Ed25519 public key of the signer.
 */
export type Account = string;

/** Pet identifier chosen by the minting account (uint32). */
export type PetId = number;

/** Logical clock value (block height). Monotonically non-decreasing. */
export type Height = number;

/** Largest value a PetId may take. */
export const MAX_PET_ID = 0xffff_ffff;

export const SPECIES = ["Turtle", "Snake", "Rabbit"] as const;

export type Species = (typeof SPECIES)[number];

/**
 * A minted pet.
 */
export interface PetRecord {
  readonly id: PetId;

  /** Display name, bounded by the ledger's configured maximum length */
  readonly name: string;

  readonly species: Species;
}

/**
 * Activity timestamps for a pet.
 *
 * `lastFedAt` is always present (0 when the pet was never fed).
 * `lastSleptAt` is absent until the first sleep, so "never slept"
 * stays distinguishable from "slept at height 0".
 */
export interface PetActivity {
  readonly petId: PetId;
  readonly lastFedAt: Height;
  readonly lastSleptAt?: Height | undefined;
}

const encoder = new TextEncoder();

/**
 * Length of a pet name as the ledger bounds it: UTF-8 bytes, not characters.
 */
export function nameByteLength(name: string): number {
  return encoder.encode(name).length;
}
