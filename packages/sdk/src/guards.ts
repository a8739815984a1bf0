/**
 * Response guards for data received over HTTP.
 */

import { isBlockRef, isPetEvent } from "@petledger/types";
import type { BlockEvents, DispatchFailure, DryRunResult } from "@petledger/runtime";
import type { StoredPetEvent } from "@petledger/event-store";

export interface ErrorEnvelope {
  readonly error: {
    readonly code: string;
    readonly message: string;
    readonly details?: unknown;
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (!isObject(value) || !isObject(value.error)) return false;
  return typeof value.error.code === "string" && typeof value.error.message === "string";
}

export function isStoredPetEvent(value: unknown): value is StoredPetEvent {
  if (!isObject(value) || !isObject(value.origin)) return false;
  return (
    isPetEvent(value.event) &&
    typeof value.origin.height === "number" &&
    typeof value.position === "number" &&
    typeof value.appendedAt === "string" &&
    typeof value.hash === "string" &&
    typeof value.previousHash === "string"
  );
}

export function isDispatchFailure(value: unknown): value is DispatchFailure {
  if (!isObject(value)) return false;
  return (
    typeof value.extrinsicHash === "string" &&
    typeof value.extrinsicIndex === "number" &&
    typeof value.code === "string" &&
    typeof value.message === "string"
  );
}

export function isBlockEvents(value: unknown): value is BlockEvents {
  if (!isObject(value)) return false;
  return (
    isBlockRef(value.block) &&
    Array.isArray(value.events) &&
    value.events.every(isStoredPetEvent) &&
    Array.isArray(value.failures) &&
    value.failures.every(isDispatchFailure)
  );
}

export function isDryRunResult(value: unknown): value is DryRunResult {
  if (!isObject(value)) return false;
  if (value.ok === true) {
    return isPetEvent(value.event) && typeof value.height === "number";
  }
  return value.ok === false && typeof value.code === "string" && typeof value.message === "string";
}
