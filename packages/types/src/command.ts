/**
 * Command Types
 *
 * State-change requests accepted by the ledger. The signer is never
 * part of the command itself; it is resolved from the envelope.
 */

import type { Account, PetId, Species } from "./pet.js";

export interface MintCommand {
  readonly kind: "mint";
  readonly name: string;
  readonly species: Species;
  readonly id: PetId;
}

export interface TransferCommand {
  readonly kind: "transfer";
  readonly receiver: Account;
}

export interface FeedCommand {
  readonly kind: "feed";
}

export interface SleepCommand {
  readonly kind: "sleep";
}

/**
 * A ledger command. Discriminated by `kind`.
 */
export type Command = MintCommand | TransferCommand | FeedCommand | SleepCommand;

export type CommandKind = Command["kind"];

/**
 * A command packaged for submission.
 *
 * The signature covers the canonical JSON of `{ signer, nonce, command }`.
 */
export interface SignedEnvelope {
  /** Account that signed */
  readonly signer: Account;

  /** Per-signer sequence number; each accepted envelope consumes one */
  readonly nonce: number;

  readonly command: Command;

  /** Hex-encoded Ed25519 signature */
  readonly signature: string;
}
