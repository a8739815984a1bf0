/**
 * @petledger/sdk — Client SDK for the pet ledger.
 *
 * Submits signed commands to a ledger node and reports, for each one,
 * whether it was confirmed, failed, rejected or left undetermined.
 *
 * @packageDocumentation
 */

// Types
export type {
  Transport,
  Submission,
  WatchState,
  WatchTransition,
  WatchOptions,
  ConfirmationOutcome,
  ConfirmedOutcome,
  UnconfirmedOutcome,
  RejectedOutcome,
  IndeterminateOutcome,
  IndeterminateReason,
} from "./types.js";
export { SdkError, SubmissionUnknownError } from "./types.js";

// Clients
export { SubmissionClient } from "./submission-client.js";
export type { SubmissionClientConfig } from "./submission-client.js";
export { ConfirmationWatcher } from "./confirmation-watcher.js";
export { PetClient } from "./pet-client.js";
export type { PetClientConfig, MintParams } from "./pet-client.js";

// Transports
export { HttpTransport } from "./http-transport.js";
export type { HttpTransportConfig } from "./http-transport.js";
export { LocalTransport } from "./local-transport.js";

// Retry
export {
  withRetry,
  retryRead,
  isRetryableError,
  computeDelay,
  RetryExhaustedError,
  DEFAULT_RETRY_CONFIG,
} from "./retry.js";
export type { RetryConfig } from "./retry.js";

// SSE
export { SseReader } from "./sse.js";
export type { SseFrame } from "./sse.js";
