/**
 * @petledger/event-store — In-memory pet event log.
 *
 * Process-scoped, append-only sequence of ledger events in dispatch order.
 * Consumers read a bounded window (the latest N events, or the events of one
 * block) and do their own matching; the log itself never filters by content.
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, in append order
 * - A throwing subscriber never undoes or interrupts an append
 * - No durability guarantees
 */

import type { PetEvent } from "@petledger/types";
import type {
  EventHandler,
  EventOrigin,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredPetEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * Anything that accepts events in dispatch order.
 * The ledger's dispatcher writes through this interface.
 */
export interface PetEventSink {
  append(event: PetEvent, origin: EventOrigin): StoredPetEvent;
}

export interface PetEventLogOptions {
  /** Called with whatever a subscriber threw, after the event is stored */
  readonly onSubscriberError?: ((err: unknown, stored: StoredPetEvent) => void) | undefined;
}

export class PetEventLog implements PetEventSink {
  private readonly _log: StoredPetEvent[] = [];

  /** Positions of the events of each block, in append order */
  private readonly _blockIndex = new Map<string, number[]>();

  private readonly _subscribers = new Set<EventHandler>();

  private _lastHash: string = GENESIS_HASH;
  private _subscriberFailures = 0;
  private readonly _onSubscriberError: ((err: unknown, stored: StoredPetEvent) => void) | undefined;

  constructor(options?: PetEventLogOptions) {
    this._onSubscriberError = options?.onSubscriberError;
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(event: PetEvent, origin: EventOrigin): StoredPetEvent {
    if (!Number.isInteger(origin.height) || origin.height < 0) {
      throw new EventStoreError(
        "INVALID_ORIGIN",
        `Event height must be a non-negative integer, got ${origin.height}`,
      );
    }

    const position = this._log.length + 1;
    const base = {
      event,
      origin,
      position,
      appendedAt: new Date().toISOString(),
    };

    const previousHash = this._lastHash;
    const stored: StoredPetEvent = {
      ...base,
      hash: computeEventHash(base, previousHash),
      previousHash,
    };

    this._lastHash = stored.hash;
    this._log.push(stored);

    if (origin.blockHash !== undefined) {
      let positions = this._blockIndex.get(origin.blockHash);
      if (positions === undefined) {
        positions = [];
        this._blockIndex.set(origin.blockHash, positions);
      }
      positions.push(position);
    }

    for (const handler of this._subscribers) {
      try {
        handler(stored);
      } catch (err) {
        this._subscriberFailures++;
        this._onSubscriberError?.(err, stored);
      }
    }

    return stored;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  readAll(options?: ReadAllOptions): readonly StoredPetEvent[] {
    const direction = options?.direction ?? "forward";
    const maxCount = options?.maxCount;

    if (maxCount !== undefined && (!Number.isInteger(maxCount) || maxCount < 0)) {
      throw new EventStoreError(
        "INVALID_LIMIT",
        `maxCount must be a non-negative integer, got ${maxCount}`,
      );
    }

    let result: StoredPetEvent[];

    if (direction === "forward") {
      const fromPosition = options?.fromPosition ?? 1;
      this._assertPosition(fromPosition, 1);
      result = this._log.slice(fromPosition - 1);
    } else {
      const fromPosition = options?.fromPosition ?? this._log.length;
      this._assertPosition(fromPosition, 0);
      result = this._log.slice(0, fromPosition).reverse();
    }

    if (maxCount !== undefined) {
      result = result.slice(0, maxCount);
    }

    return result;
  }

  /**
   * The latest `limit` events, oldest first.
   */
  recent(limit: number): readonly StoredPetEvent[] {
    if (!Number.isInteger(limit) || limit < 0) {
      throw new EventStoreError(
        "INVALID_LIMIT",
        `limit must be a non-negative integer, got ${limit}`,
      );
    }
    if (limit === 0) {
      return [];
    }
    return this._log.slice(-limit);
  }

  /**
   * Events produced while authoring the given block, in dispatch order.
   * Empty for an unknown block or a block whose extrinsics all failed.
   */
  readBlock(blockHash: string): readonly StoredPetEvent[] {
    const positions = this._blockIndex.get(blockHash) ?? [];
    const result: StoredPetEvent[] = [];
    for (const position of positions) {
      const stored = this._log[position - 1];
      if (stored !== undefined) {
        result.push(stored);
      }
    }
    return result;
  }

  /** Position of the last event, or 0 for an empty log. */
  position(): number {
    return this._log.length;
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  /** Number of subscriber calls that threw since the log was created. */
  get subscriberFailures(): number {
    return this._subscriberFailures;
  }

  subscribe(handler: EventHandler): Subscription {
    this._subscribers.add(handler);
    return {
      unsubscribe: () => {
        this._subscribers.delete(handler);
      },
    };
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertPosition(position: number, min: number): void {
    if (!Number.isInteger(position) || position < min) {
      throw new EventStoreError(
        "INVALID_POSITION",
        `Position must be an integer >= ${min}, got ${position}`,
      );
    }
  }
}
