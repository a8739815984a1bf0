/**
 * @petledger/types — Shared domain types for the pet ledger stack.
 *
 * These types are used across all packages:
 * - Pet records, accounts and logical heights
 * - Commands and signed envelopes
 * - Ledger events
 * - Block references and extrinsic status streams
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Pet types
export type { Account, PetId, Height, Species, PetRecord, PetActivity } from "./pet.js";
export { MAX_PET_ID, SPECIES, nameByteLength } from "./pet.js";

// Command types
export type {
  Command,
  CommandKind,
  MintCommand,
  TransferCommand,
  FeedCommand,
  SleepCommand,
  SignedEnvelope,
} from "./command.js";

// Event types
export type {
  PetEvent,
  PetEventKind,
  PetMintedEvent,
  PetTransferredEvent,
  PetFedEvent,
  PetSleptEvent,
} from "./event.js";
export { EVENT_FOR_COMMAND } from "./event.js";

// Chain types
export type {
  ExtrinsicHash,
  BlockRef,
  TxStatus,
  TxStatusKind,
  TerminalTxStatus,
  ReadyStatus,
  InBlockStatus,
  FinalizedStatus,
  DroppedStatus,
  InvalidStatus,
  ErrorStatus,
} from "./chain.js";
export { isTerminalStatus } from "./chain.js";

// Runtime type guards
export {
  isSpecies,
  isPetId,
  isPetRecord,
  isCommand,
  isSignedEnvelope,
  isPetEvent,
  isBlockRef,
  isTxStatus,
} from "./guards.js";
