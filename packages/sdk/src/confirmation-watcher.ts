/**
 * @petledger/sdk — Confirmation watcher.
 *
 * Consumes a submission's status stream and decides what happened.
 *
 * State machine:
 *   awaiting ──ready──▶ pooled ──in_block──▶ in_block ──finalized──▶ resolved
 *       │                 │                     │
 *       └──── dropped / invalid / error ────────┴──────────────────▶ resolved
 *
 * Rules:
 * - Only `finalized` can confirm; `in_block` may still be reorganized
 * - Confirmation requires the command's event, from this extrinsic, in the
 *   finalized block. Finality without it is `unconfirmed`
 * - A stream that ends or fails without a terminal status, a timeout and
 *   an abort are all `indeterminate`. They stop observation only; the
 *   node may still apply the extrinsic
 * - Finality whose block events cannot be fetched is `indeterminate`
 *   (`events_unavailable`), never a failure
 * - Nothing is retried
 */

import type { BlockRef, TxStatus } from "@petledger/types";
import { EVENT_FOR_COMMAND } from "@petledger/types";
import type {
  ConfirmationOutcome,
  IndeterminateOutcome,
  IndeterminateReason,
  Submission,
  Transport,
  WatchOptions,
  WatchState,
} from "./types.js";

type StopReason = "timeout" | "cancelled";

export class ConfirmationWatcher {
  constructor(private readonly transport: Pick<Transport, "fetchEvents">) {}

  async watch(submission: Submission, options: WatchOptions = {}): Promise<ConfirmationOutcome> {
    let state: WatchState = "awaiting";
    let lastStatus: TxStatus | undefined;

    const transition = (to: WatchState, status: TxStatus): void => {
      const from = state;
      state = to;
      if (from !== to) {
        options.onTransition?.({ from, to, status });
      }
    };

    const indeterminate = (reason: IndeterminateReason, detail?: string): IndeterminateOutcome => ({
      kind: "indeterminate",
      reason,
      ...(lastStatus === undefined ? {} : { lastStatus }),
      ...(detail === undefined ? {} : { detail }),
    });

    const stop = stopSignal(options);
    const iterator = submission.statuses[Symbol.asyncIterator]();
    let exhausted = false;

    try {
      for (;;) {
        if (options.signal?.aborted === true) {
          return indeterminate("cancelled");
        }
        let next: IteratorResult<TxStatus> | StopReason;
        try {
          next = await Promise.race([iterator.next(), stop.promise]);
        } catch (err) {
          // A failed iterator is finished; there is nothing to return
          exhausted = true;
          return indeterminate("transport_error", messageOf(err));
        }
        if (typeof next === "string") {
          return indeterminate(next);
        }
        if (next.done === true) {
          exhausted = true;
          return indeterminate("stream_closed");
        }

        const status = next.value;
        lastStatus = status;

        switch (status.kind) {
          case "ready":
            transition("pooled", status);
            break;
          case "in_block":
            transition("in_block", status);
            break;
          case "finalized":
            transition("resolved", status);
            try {
              return await this.resolveFinalized(submission, status.block);
            } catch (err) {
              return indeterminate("events_unavailable", messageOf(err));
            }
          case "dropped":
          case "invalid":
            transition("resolved", status);
            return { kind: "rejected", status: status.kind, detail: status.reason };
          case "error":
            transition("resolved", status);
            return { kind: "rejected", status: "error", detail: status.detail };
        }
      }
    } finally {
      stop.dispose();
      if (!exhausted) {
        await release(iterator);
      }
    }
  }

  private async resolveFinalized(submission: Submission, block: BlockRef): Promise<ConfirmationOutcome> {
    const { events, failures } = await this.transport.fetchEvents(block.hash);
    const expected = EVENT_FOR_COMMAND[submission.command.kind];

    const stored = events.find(
      (candidate) =>
        candidate.event.kind === expected &&
        candidate.origin.extrinsicHash === submission.extrinsicHash,
    );
    if (stored !== undefined) {
      return { kind: "confirmed", block, event: stored.event, stored };
    }

    const failure = failures.find((f) => f.extrinsicHash === submission.extrinsicHash);
    return failure === undefined ? { kind: "unconfirmed", block } : { kind: "unconfirmed", block, failure };
  }
}

/**
 * Stop the producer. The outcome is already decided, so a stream that
 * fails while closing does not change it.
 */
async function release(iterator: AsyncIterator<TxStatus>): Promise<void> {
  try {
    await iterator.return?.();
  } catch {
    // the stream is gone either way
  }
}

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * A promise that settles with the reason observation must stop.
 * It never rejects, and never settles when neither option is given.
 */
function stopSignal(options: WatchOptions): { promise: Promise<StopReason>; dispose: () => void } {
  const { timeoutMs, signal } = options;
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  const promise = new Promise<StopReason>((resolve) => {
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    }
    if (signal !== undefined) {
      if (signal.aborted) {
        resolve("cancelled");
        return;
      }
      onAbort = () => resolve("cancelled");
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  return {
    promise,
    dispose: () => {
      if (timer !== undefined) clearTimeout(timer);
      if (onAbort !== undefined) signal?.removeEventListener("abort", onAbort);
    },
  };
}
