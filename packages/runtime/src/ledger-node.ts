/**
 * Ledger Node
 *
 * The single authoritative instance that owns the ledger state.
 *
 * Lifecycle of a submitted envelope:
 *   submit ──▶ admission ──▶ pool ──▶ block ──▶ finality
 *                 │            │         │          │
 *              invalid      ready    in_block   finalized
 *              dropped
 *
 * Rules:
 * - Admission checks the signature, the name bound, the pet id range,
 *   the nonce and the pool capacity. Nothing else; state preconditions
 *   are checked at dispatch
 * - Included extrinsics consume their nonce even when dispatch fails
 * - A block is final once `finalityDepth` blocks are built on top of it
 * - Block height is the dispatcher's clock: commands in block N see height N
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  Account,
  BlockRef,
  ExtrinsicHash,
  PetActivity,
  PetId,
  PetRecord,
  SignedEnvelope,
  TxStatus,
} from "@petledger/types";
import { isPetId, nameByteLength } from "@petledger/types";
import { PetEventLog } from "@petledger/event-store";
import type { StoredPetEvent } from "@petledger/event-store";
import { Dispatcher, InMemoryLedgerStore } from "@petledger/ledger";
import type { Clock, LedgerStore } from "@petledger/ledger";
import { extrinsicHash, verifyEnvelope } from "./signing.js";
import { StatusChannel } from "./status-channel.js";
import type {
  Block,
  BlockEvents,
  DispatchFailure,
  DryRunResult,
  LedgerNodeConfig,
  NodeLogEntry,
} from "./types.js";
import {
  DEFAULT_BLOCK_TIME_MS,
  DEFAULT_FINALITY_DEPTH,
  DEFAULT_MAX_EXTRINSICS_PER_BLOCK,
  DEFAULT_MAX_POOL_SIZE,
  RuntimeError,
} from "./types.js";

export const GENESIS_BLOCK_HASH = createHash("sha256").update("genesis").digest("hex");

interface PooledExtrinsic {
  readonly hash: ExtrinsicHash;
  readonly envelope: SignedEnvelope;
  readonly channel: StatusChannel<TxStatus>;
}

interface AwaitingFinality {
  readonly block: BlockRef;
  readonly channel: StatusChannel<TxStatus>;
}

export interface LedgerNodeOptions extends LedgerNodeConfig {
  /** Backing store. Default: a fresh InMemoryLedgerStore */
  readonly store?: LedgerStore | undefined;
}

export class LedgerNode {
  readonly eventLog: PetEventLog;

  private readonly _store: LedgerStore;
  private readonly _dispatcher: Dispatcher;
  private readonly _maxNameLength: number;
  private readonly _finalityDepth: number;
  private readonly _maxPoolSize: number;
  private readonly _maxExtrinsicsPerBlock: number;
  private readonly _blockTimeMs: number;
  private readonly _log: (entry: NodeLogEntry) => void;

  private readonly _blocks: Block[] = [];
  private readonly _blocksByHash = new Map<string, Block>();
  private readonly _nonces = new Map<Account, number>();

  private _pool: PooledExtrinsic[] = [];
  private _awaiting: AwaitingFinality[] = [];
  private _timer: ReturnType<typeof setInterval> | undefined;
  private _stopped = false;

  constructor(options: LedgerNodeOptions) {
    this._maxNameLength = positiveInteger("maxNameLength", options.maxNameLength);
    this._finalityDepth = nonNegativeInteger(
      "finalityDepth",
      options.finalityDepth ?? DEFAULT_FINALITY_DEPTH,
    );
    this._maxPoolSize = positiveInteger("maxPoolSize", options.maxPoolSize ?? DEFAULT_MAX_POOL_SIZE);
    this._maxExtrinsicsPerBlock = positiveInteger(
      "maxExtrinsicsPerBlock",
      options.maxExtrinsicsPerBlock ?? DEFAULT_MAX_EXTRINSICS_PER_BLOCK,
    );
    this._blockTimeMs = positiveInteger("blockTimeMs", options.blockTimeMs ?? DEFAULT_BLOCK_TIME_MS);
    this._log = options.log ?? (() => {});
    // Events are already committed when subscribers run
    this.eventLog = new PetEventLog({
      onSubscriberError: (err, stored) => {
        this._log({
          level: "error",
          event: "subscriber.failed",
          height: stored.origin.height,
          blockHash: stored.origin.blockHash,
          extrinsicHash: stored.origin.extrinsicHash,
          detail: err instanceof Error ? err.message : String(err),
        });
      },
    });

    this._store = options.store ?? new InMemoryLedgerStore();

    // The block being authored is always one above the head
    const clock: Clock = { now: () => this._blocks.length };
    this._dispatcher = new Dispatcher(this._store, clock, this.eventLog);

    this._appendBlock({
      ref: { hash: GENESIS_BLOCK_HASH, height: 0 },
      parentHash: GENESIS_BLOCK_HASH,
      extrinsics: [],
      failures: [],
    });
  }

  get maxNameLength(): number {
    return this._maxNameLength;
  }

  get poolSize(): number {
    return this._pool.length;
  }

  // ─── Submission ─────────────────────────────────────────────────────

  /**
   * Admit an envelope and return its status stream.
   * Rejected envelopes get a single terminal status.
   */
  submit(envelope: SignedEnvelope): { hash: ExtrinsicHash; statuses: StatusChannel<TxStatus> } {
    const hash = extrinsicHash(envelope);
    const channel = new StatusChannel<TxStatus>();

    const rejection = this._checkAdmission(envelope);
    if (rejection !== undefined) {
      this._log({
        level: "warn",
        event: "extrinsic.rejected",
        extrinsicHash: hash,
        detail: rejection.kind === "dropped" || rejection.kind === "invalid" ? rejection.reason : undefined,
      });
      channel.push(rejection);
      channel.close();
      return { hash, statuses: channel };
    }

    this._pool.push({ hash, envelope, channel });
    this._log({ level: "debug", event: "extrinsic.accepted", extrinsicHash: hash });
    channel.push({ kind: "ready" });
    return { hash, statuses: channel };
  }

  /**
   * The nonce the account's next envelope must carry:
   * included extrinsics plus those still pending in the pool.
   */
  nextNonce(account: Account): number {
    let pending = 0;
    for (const pooled of this._pool) {
      if (pooled.envelope.signer === account) pending++;
    }
    return (this._nonces.get(account) ?? 0) + pending;
  }

  /**
   * Check an envelope against the state the next block would see,
   * without admitting or applying it. The nonce is not checked.
   */
  dryRun(envelope: SignedEnvelope): DryRunResult {
    if (!verifyEnvelope(envelope)) {
      return { ok: false, code: "BAD_SIGNATURE", message: "Signature does not match signer" };
    }
    const bound = this._checkCommandBounds(envelope);
    if (bound !== undefined) {
      return { ok: false, code: bound.code, message: bound.message };
    }
    const validation = this._dispatcher.validate(envelope.signer, envelope.command);
    if (!validation.ok) {
      return { ok: false, code: validation.error.code, message: validation.error.message };
    }
    return { ok: true, event: validation.plan.event, height: validation.plan.height };
  }

  // ─── Block authoring ────────────────────────────────────────────────

  /**
   * Author one block from the head of the pool, then finalize every
   * block that is now deep enough. Empty blocks are authored too.
   */
  produceBlock(): Block {
    const height = this._blocks.length;
    const parent = this.head();
    const batch = this._pool.slice(0, this._maxExtrinsicsPerBlock);
    this._pool = this._pool.slice(batch.length);

    const extrinsics = batch.map((pooled) => pooled.hash);
    const ref: BlockRef = {
      hash: computeBlockHash(height, parent.hash, extrinsics),
      height,
    };

    const failures: DispatchFailure[] = [];
    const included: PooledExtrinsic[] = [];

    batch.forEach((pooled, extrinsicIndex) => {
      const { signer, command } = pooled.envelope;
      this._nonces.set(signer, (this._nonces.get(signer) ?? 0) + 1);

      try {
        const result = this._dispatcher.dispatch(signer, command, {
          blockHash: ref.hash,
          extrinsicHash: pooled.hash,
          extrinsicIndex,
        });
        if (!result.ok) {
          failures.push({
            extrinsicHash: pooled.hash,
            extrinsicIndex,
            code: result.error.code,
            message: result.error.message,
          });
          this._log({
            level: "info",
            event: "dispatch.failed",
            height,
            blockHash: ref.hash,
            extrinsicHash: pooled.hash,
            detail: result.error.code,
          });
        }
        included.push(pooled);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        failures.push({ extrinsicHash: pooled.hash, extrinsicIndex, code: "DISPATCH_ERROR", message: detail });
        this._log({
          level: "error",
          event: "dispatch.errored",
          height,
          blockHash: ref.hash,
          extrinsicHash: pooled.hash,
          detail,
        });
        pooled.channel.push({ kind: "error", detail });
        pooled.channel.close();
      }
    });

    const block: Block = { ref, parentHash: parent.hash, extrinsics, failures };
    this._appendBlock(block);
    this._log({
      level: "info",
      event: "block.authored",
      height,
      blockHash: ref.hash,
      detail: `${extrinsics.length} extrinsics, ${failures.length} failed`,
    });

    for (const pooled of included) {
      if (pooled.channel.push({ kind: "in_block", block: ref })) {
        this._awaiting.push({ block: ref, channel: pooled.channel });
      }
    }

    this._finalize();
    return block;
  }

  // ─── Queries ────────────────────────────────────────────────────────

  head(): BlockRef {
    return this._blockAt(this._blocks.length - 1).ref;
  }

  finalizedHead(): BlockRef {
    return this._blockAt(Math.max(0, this._blocks.length - 1 - this._finalityDepth)).ref;
  }

  getBlock(hash: string): Block | undefined {
    return this._blocksByHash.get(hash);
  }

  isFinalized(block: BlockRef): boolean {
    return block.height <= this.finalizedHead().height;
  }

  /**
   * Events and dispatch failures of an authored block.
   * @throws RuntimeError UNKNOWN_BLOCK
   */
  fetchEvents(blockHash: string): BlockEvents {
    const block = this._blocksByHash.get(blockHash);
    if (block === undefined) {
      throw new RuntimeError("UNKNOWN_BLOCK", `Unknown block ${blockHash}`);
    }
    return {
      block: block.ref,
      events: this.eventLog.readBlock(blockHash),
      failures: block.failures,
    };
  }

  petOf(account: Account): PetRecord | undefined {
    return this._store.get(account);
  }

  activityOf(petId: PetId): PetActivity {
    const lastSleptAt = this._store.sleepTimeOf(petId);
    return lastSleptAt === undefined
      ? { petId, lastFedAt: this._store.feedTimeOf(petId) }
      : { petId, lastFedAt: this._store.feedTimeOf(petId), lastSleptAt };
  }

  recentEvents(limit: number): readonly StoredPetEvent[] {
    return this.eventLog.recent(limit);
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  get running(): boolean {
    return this._timer !== undefined;
  }

  get stopped(): boolean {
    return this._stopped;
  }

  /** Author a block every `blockTimeMs` until stopped. */
  start(): void {
    if (this._timer !== undefined || this._stopped) {
      return;
    }
    this._timer = setInterval(() => {
      this.produceBlock();
    }, this._blockTimeMs);
    this._log({ level: "info", event: "node.started", height: this.head().height });
  }

  /**
   * Stop authoring. Open status streams end without a terminal status;
   * pooled extrinsics are discarded unapplied.
   */
  stop(): void {
    if (this._stopped) {
      return;
    }
    this._stopped = true;
    if (this._timer !== undefined) {
      clearInterval(this._timer);
      this._timer = undefined;
    }
    for (const pooled of this._pool) pooled.channel.close();
    for (const awaiting of this._awaiting) awaiting.channel.close();
    this._pool = [];
    this._awaiting = [];
    this._log({ level: "info", event: "node.stopped", height: this.head().height });
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _checkAdmission(envelope: SignedEnvelope): TxStatus | undefined {
    if (this._stopped) {
      return { kind: "dropped", reason: "Node is not accepting extrinsics" };
    }
    if (!verifyEnvelope(envelope)) {
      return { kind: "invalid", reason: "Bad signature" };
    }
    const bound = this._checkCommandBounds(envelope);
    if (bound !== undefined) {
      return { kind: "invalid", reason: bound.message };
    }
    const expected = this.nextNonce(envelope.signer);
    if (envelope.nonce < expected) {
      return { kind: "invalid", reason: `Stale nonce ${envelope.nonce}, expected ${expected}` };
    }
    if (envelope.nonce > expected) {
      return { kind: "invalid", reason: `Future nonce ${envelope.nonce}, expected ${expected}` };
    }
    if (this._pool.length >= this._maxPoolSize) {
      return { kind: "dropped", reason: "Transaction pool is full" };
    }
    return undefined;
  }

  private _checkCommandBounds(
    envelope: SignedEnvelope,
  ): { code: "NAME_TOO_LONG" | "INVALID_PET_ID"; message: string } | undefined {
    const { command } = envelope;
    if (command.kind !== "mint") {
      return undefined;
    }
    const length = nameByteLength(command.name);
    if (length > this._maxNameLength) {
      return {
        code: "NAME_TOO_LONG",
        message: `Name is ${length} bytes, maximum is ${this._maxNameLength}`,
      };
    }
    if (!isPetId(command.id)) {
      return { code: "INVALID_PET_ID", message: `Pet id ${command.id} is out of range` };
    }
    return undefined;
  }

  private _finalize(): void {
    const finalized = this.finalizedHead();
    const remaining: AwaitingFinality[] = [];
    let count = 0;

    for (const awaiting of this._awaiting) {
      if (awaiting.block.height <= finalized.height) {
        awaiting.channel.push({ kind: "finalized", block: awaiting.block });
        awaiting.channel.close();
        count++;
      } else {
        remaining.push(awaiting);
      }
    }
    this._awaiting = remaining;

    if (count > 0) {
      this._log({
        level: "debug",
        event: "block.finalized",
        height: finalized.height,
        blockHash: finalized.hash,
        detail: `${count} extrinsics finalized`,
      });
    }
  }

  private _appendBlock(block: Block): void {
    this._blocks.push(block);
    this._blocksByHash.set(block.ref.hash, block);
  }

  private _blockAt(height: number): Block {
    const block = this._blocks[height];
    if (block === undefined) {
      throw new RuntimeError("UNKNOWN_BLOCK", `No block at height ${height}`);
    }
    return block;
  }
}

function computeBlockHash(height: number, parentHash: string, extrinsics: readonly ExtrinsicHash[]): string {
  return createHash("sha256").update(canonicalize({ height, parentHash, extrinsics })).digest("hex");
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RuntimeError("INVALID_CONFIG", `${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function nonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new RuntimeError("INVALID_CONFIG", `${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}
