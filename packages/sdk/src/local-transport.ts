/**
 * In-process transport over a LedgerNode.
 */

import type { Account, SignedEnvelope, TxStatus } from "@petledger/types";
import { RuntimeError } from "@petledger/runtime";
import type { BlockEvents, DryRunResult, LedgerNode } from "@petledger/runtime";
import type { Transport } from "./types.js";
import { SdkError } from "./types.js";

export class LocalTransport implements Transport {
  constructor(private readonly node: LedgerNode) {}

  async submitAndWatch(envelope: SignedEnvelope): Promise<AsyncIterable<TxStatus>> {
    return this.node.submit(envelope).statuses;
  }

  async fetchEvents(blockHash: string): Promise<BlockEvents> {
    try {
      return this.node.fetchEvents(blockHash);
    } catch (err) {
      if (err instanceof RuntimeError) {
        throw new SdkError(err.code, err.message);
      }
      throw err;
    }
  }

  async nextNonce(account: Account): Promise<number> {
    return this.node.nextNonce(account);
  }

  async dryRun(envelope: SignedEnvelope): Promise<DryRunResult> {
    return this.node.dryRun(envelope);
  }
}
