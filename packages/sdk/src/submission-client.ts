/**
 * @petledger/sdk — Submission client.
 *
 * Turns a command into a signed envelope and hands it to the transport.
 *
 * - The name bound is enforced here, before anything is signed
 * - Submissions from one signer are serialized so each gets the next nonce
 * - A submission lost in transit raises SubmissionUnknownError; one the
 *   node refused (a 4xx) raises the node's SdkError
 * - The returned status stream can be consumed once
 */

import type { Command, SignedEnvelope, TxStatus } from "@petledger/types";
import { isPetId, nameByteLength } from "@petledger/types";
import { KeyedMutex } from "@petledger/ledger";
import { extrinsicHash, signEnvelope } from "@petledger/runtime";
import type { DryRunResult, Signer } from "@petledger/runtime";
import type { Submission, Transport } from "./types.js";
import { SdkError, SubmissionUnknownError } from "./types.js";

export interface SubmissionClientConfig {
  readonly transport: Transport;
  /** Maximum UTF-8 byte length of a pet name; must match the node's bound */
  readonly maxNameLength: number;
}

export class SubmissionClient {
  private readonly transport: Transport;
  private readonly maxNameLength: number;
  private readonly mutex = new KeyedMutex();

  constructor(config: SubmissionClientConfig) {
    this.transport = config.transport;
    this.maxNameLength = config.maxNameLength;
  }

  /**
   * Sign `command` with the signer's next nonce and submit it.
   *
   * @throws SdkError NAME_TOO_LONG, INVALID_PET_ID before any network call
   * @throws SubmissionUnknownError when the envelope may have reached the node
   */
  async submit(signer: Signer, command: Command): Promise<Submission> {
    this.checkBounds(command);

    return this.mutex.runExclusive([signer.account], async () => {
      const envelope = await this.sign(signer, command);
      const hash = extrinsicHash(envelope);
      let statuses: AsyncIterable<TxStatus>;
      try {
        statuses = await this.transport.submitAndWatch(envelope);
      } catch (err) {
        if (isRefusal(err)) {
          throw err;
        }
        throw new SubmissionUnknownError(hash, err);
      }
      return {
        extrinsicHash: hash,
        envelope,
        command,
        statuses: once(statuses),
      };
    });
  }

  /**
   * Check `command` against current node state without submitting it.
   *
   * @throws SdkError DRY_RUN_UNSUPPORTED when the transport has no dry run
   */
  async preview(signer: Signer, command: Command): Promise<DryRunResult> {
    this.checkBounds(command);
    const { transport } = this;
    if (transport.dryRun === undefined) {
      throw new SdkError("DRY_RUN_UNSUPPORTED", "Transport does not support dry runs");
    }
    return transport.dryRun(await this.sign(signer, command));
  }

  private async sign(signer: Signer, command: Command): Promise<SignedEnvelope> {
    const nonce = await this.transport.nextNonce(signer.account);
    return signEnvelope(signer, nonce, command);
  }

  private checkBounds(command: Command): void {
    if (command.kind !== "mint") {
      return;
    }
    const length = nameByteLength(command.name);
    if (length > this.maxNameLength) {
      throw new SdkError(
        "NAME_TOO_LONG",
        `Name is ${length} bytes, maximum is ${this.maxNameLength}`,
      );
    }
    if (!isPetId(command.id)) {
      throw new SdkError("INVALID_PET_ID", `Pet id ${command.id} is out of range`);
    }
  }
}

/** The node answered and did not take the envelope. */
function isRefusal(err: unknown): boolean {
  return err instanceof SdkError && err.statusCode >= 400 && err.statusCode < 500;
}

/**
 * Wrap a stream so that a second iteration fails instead of silently
 * yielding nothing.
 */
function once(stream: AsyncIterable<TxStatus>): AsyncIterable<TxStatus> {
  let consumed = false;
  return {
    [Symbol.asyncIterator]: () => {
      if (consumed) {
        throw new SdkError("STREAM_CONSUMED", "Status stream can only be consumed once");
      }
      consumed = true;
      return stream[Symbol.asyncIterator]();
    },
  };
}
