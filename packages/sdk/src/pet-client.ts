/**
 * @petledger/sdk — Pet client.
 *
 * One call per command: submit, then watch until an outcome is known.
 *
 * Usage:
 *   const client = new PetClient({ transport, maxNameLength: 32 });
 *   const outcome = await client.mint(signer, { name: "Shelly", species: "Turtle", id: 7 });
 *   if (outcome.kind === "confirmed") { ... }
 */

import type { Account, Command, PetId, Species } from "@petledger/types";
import type { Signer } from "@petledger/runtime";
import { ConfirmationWatcher } from "./confirmation-watcher.js";
import { SubmissionClient } from "./submission-client.js";
import type { ConfirmationOutcome, Submission, Transport, WatchOptions } from "./types.js";
import { SubmissionUnknownError } from "./types.js";

export interface PetClientConfig {
  readonly transport: Transport;
  readonly maxNameLength: number;

  /**
   * Dry-run each command first and report a failing one as `rejected`
   * without submitting it. Ignored when the transport has no dry run.
   */
  readonly dryRunFirst?: boolean | undefined;
}

export interface MintParams {
  readonly name: string;
  readonly species: Species;
  readonly id: PetId;
}

export class PetClient {
  readonly submissions: SubmissionClient;
  readonly watcher: ConfirmationWatcher;
  private readonly dryRunFirst: boolean;
  private readonly canDryRun: boolean;

  constructor(config: PetClientConfig) {
    this.submissions = new SubmissionClient({
      transport: config.transport,
      maxNameLength: config.maxNameLength,
    });
    this.watcher = new ConfirmationWatcher(config.transport);
    this.dryRunFirst = config.dryRunFirst ?? false;
    this.canDryRun = config.transport.dryRun !== undefined;
  }

  mint(signer: Signer, params: MintParams, options?: WatchOptions): Promise<ConfirmationOutcome> {
    return this.execute(signer, { kind: "mint", ...params }, options);
  }

  transfer(signer: Signer, receiver: Account, options?: WatchOptions): Promise<ConfirmationOutcome> {
    return this.execute(signer, { kind: "transfer", receiver }, options);
  }

  feed(signer: Signer, options?: WatchOptions): Promise<ConfirmationOutcome> {
    return this.execute(signer, { kind: "feed" }, options);
  }

  sleep(signer: Signer, options?: WatchOptions): Promise<ConfirmationOutcome> {
    return this.execute(signer, { kind: "sleep" }, options);
  }

  /**
   * Submit and watch. Bound violations and refusals throw; a submission
   * lost in transit is `indeterminate`.
   */
  async execute(signer: Signer, command: Command, options?: WatchOptions): Promise<ConfirmationOutcome> {
    if (this.dryRunFirst && this.canDryRun) {
      const preview = await this.submissions.preview(signer, command);
      if (!preview.ok) {
        return { kind: "rejected", status: "invalid", detail: `${preview.code}: ${preview.message}` };
      }
    }
    let submission: Submission;
    try {
      submission = await this.submissions.submit(signer, command);
    } catch (err) {
      if (err instanceof SubmissionUnknownError) {
        return { kind: "indeterminate", reason: "transport_error", detail: err.message };
      }
      throw err;
    }
    return this.watcher.watch(submission, options);
  }
}
