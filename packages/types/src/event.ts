/**
 * Event Types
 *
 * Every successful dispatch produces exactly one PetEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are appended in dispatch order
 * - Failed dispatches produce no event
 */

import type { Account, PetId } from "./pet.js";
import type { CommandKind } from "./command.js";

export interface PetMintedEvent {
  readonly kind: "pet_minted";
  readonly owner: Account;
  readonly petId: PetId;
}

export interface PetTransferredEvent {
  readonly kind: "pet_transferred";
  readonly from: Account;
  readonly to: Account;
  readonly petId: PetId;
}

export interface PetFedEvent {
  readonly kind: "pet_fed";
  readonly owner: Account;
  readonly petId: PetId;
}

export interface PetSleptEvent {
  readonly kind: "pet_slept";
  readonly owner: Account;
  readonly petId: PetId;
}

/**
 * A ledger event. Discriminated by `kind`.
 */
export type PetEvent =
  | PetMintedEvent
  | PetTransferredEvent
  | PetFedEvent
  | PetSleptEvent;

export type PetEventKind = PetEvent["kind"];

/**
 * The event kind a successful command of each kind emits.
 */
export const EVENT_FOR_COMMAND = {
  mint: "pet_minted",
  transfer: "pet_transferred",
  feed: "pet_fed",
  sleep: "pet_slept",
} as const satisfies Readonly<Record<CommandKind, PetEventKind>>;
