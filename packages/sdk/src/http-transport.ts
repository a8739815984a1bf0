/**
 * @petledger/sdk — HTTP transport.
 *
 * Talks to a ledger node's HTTP API with native fetch():
 * - Submissions stream their statuses back as Server-Sent Events
 * - Reads (nonce, block events, dry run) retry on 5xx and network errors
 * - Error envelopes become SdkError with the server's code
 *
 * Design:
 * - Zero external dependencies (uses native fetch)
 * - Custom fetch function for testing
 * - Every response body is checked before it is trusted
 */

import type { ReadableStream } from "node:stream/web";
import type { Account, SignedEnvelope, TxStatus } from "@petledger/types";
import { isTxStatus } from "@petledger/types";
import type { BlockEvents, DryRunResult } from "@petledger/runtime";
import { isBlockEvents, isDryRunResult, isErrorEnvelope } from "./guards.js";
import type { RetryConfig } from "./retry.js";
import { DEFAULT_RETRY_CONFIG, retryRead, sleep } from "./retry.js";
import { SseReader } from "./sse.js";
import type { Transport } from "./types.js";
import { SdkError } from "./types.js";

export interface HttpTransportConfig {
  /** Base URL of the node API (e.g., "http://localhost:3000") */
  readonly baseUrl: string;
  /** Timeout in ms for a response to start (default: 30000) */
  readonly timeout?: number | undefined;
  readonly retry?: Partial<RetryConfig> | undefined;
  /** Custom fetch function (for testing or polyfills) */
  readonly fetchFn?: typeof fetch | undefined;
  /** Sleep between retries (for testing) */
  readonly sleepFn?: ((ms: number) => Promise<void>) | undefined;
}

function generateRequestId(): string {
  return `sdk-${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 8)}`;
}

export class HttpTransport implements Transport {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retry: RetryConfig;
  private readonly fetchFn: typeof fetch;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(config: HttpTransportConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.timeout = config.timeout ?? 30000;
    this.retry = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
    this.fetchFn = config.fetchFn ?? globalThis.fetch;
    this.sleepFn = config.sleepFn ?? sleep;
  }

  // ─── Transport ──────────────────────────────────────────────────────

  async submitAndWatch(envelope: SignedEnvelope): Promise<AsyncIterable<TxStatus>> {
    const response = await this.fetchWithTimeout("POST", "/v1/extrinsics", envelope, "text/event-stream");
    if (!response.ok) {
      throw await errorFromResponse(response);
    }
    if (response.body === null) {
      throw new SdkError("INVALID_RESPONSE", "Status stream has no body", response.status);
    }
    return new SseStatusStream(response.body);
  }

  async fetchEvents(blockHash: string): Promise<BlockEvents> {
    const data = await this.read("GET", `/v1/blocks/${encodeURIComponent(blockHash)}/events`);
    if (!isBlockEvents(data)) {
      throw new SdkError("INVALID_RESPONSE", "Malformed block events");
    }
    return data;
  }

  async nextNonce(account: Account): Promise<number> {
    const data = await this.read("GET", `/v1/accounts/${encodeURIComponent(account)}/nonce`);
    if (data === null || typeof data !== "object" || !("nonce" in data) || typeof data.nonce !== "number") {
      throw new SdkError("INVALID_RESPONSE", "Malformed nonce response");
    }
    return data.nonce;
  }

  async dryRun(envelope: SignedEnvelope): Promise<DryRunResult> {
    const data = await this.read("POST", "/v1/extrinsics/dry-run", envelope);
    if (!isDryRunResult(data)) {
      throw new SdkError("INVALID_RESPONSE", "Malformed dry run response");
    }
    return data;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * JSON request with retries. Returns the `data` member of the body.
   */
  private async read(method: string, path: string, body?: unknown): Promise<unknown> {
    return retryRead(
      async () => {
        const response = await this.fetchWithTimeout(method, path, body, "application/json");
        if (!response.ok) {
          throw await errorFromResponse(response);
        }
        const parsed = await parseJson(response);
        if (parsed === null || typeof parsed !== "object" || !("data" in parsed)) {
          throw new SdkError("INVALID_RESPONSE", "Response has no data member", response.status);
        }
        return parsed.data;
      },
      this.retry,
      this.sleepFn,
    );
  }

  private async fetchWithTimeout(
    method: string,
    path: string,
    body: unknown,
    accept: string,
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    const init: RequestInit = {
      method,
      headers: {
        "Content-Type": "application/json",
        Accept: accept,
        "X-Request-Id": generateRequestId(),
      },
      signal: controller.signal,
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    try {
      return await this.fetchFn(`${this.baseUrl}${path}`, init);
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new SdkError("TIMEOUT", `Request timed out after ${this.timeout}ms`);
      }
      throw new SdkError("NETWORK_ERROR", error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// =============================================================================
// Status stream
// =============================================================================

/**
 * Single-pass iterable over the `status` frames of a submission response.
 * Returning early cancels the response body.
 */
class SseStatusStream implements AsyncIterable<TxStatus> {
  private readonly _sse: SseReader;
  private _iterated = false;

  constructor(body: ReadableStream<Uint8Array>) {
    this._sse = new SseReader(body);
  }

  [Symbol.asyncIterator](): AsyncIterator<TxStatus> {
    if (this._iterated) {
      throw new SdkError("STREAM_CONSUMED", "Status stream can only be consumed once");
    }
    this._iterated = true;

    return {
      next: async (): Promise<IteratorResult<TxStatus>> => {
        for (;;) {
          const frame = await this._sse.next();
          if (frame === undefined) {
            return { value: undefined, done: true };
          }
          if (frame.event !== "status") {
            continue;
          }
          const status = parseStatus(frame.data);
          return { value: status, done: false };
        }
      },
      return: async (): Promise<IteratorResult<TxStatus>> => {
        await this._sse.cancel();
        return { value: undefined, done: true };
      },
    };
  }
}

function parseStatus(data: string): TxStatus {
  let value: unknown;
  try {
    value = JSON.parse(data);
  } catch (err) {
    throw new SdkError("INVALID_RESPONSE", `Status frame is not JSON: ${String(err)}`);
  }
  if (!isTxStatus(value)) {
    throw new SdkError("INVALID_RESPONSE", `Unrecognized status frame: ${data}`);
  }
  return value;
}

// =============================================================================
// Helpers
// =============================================================================

async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return {};
  }
  try {
    return JSON.parse(text);
  } catch {
    throw new SdkError("INVALID_RESPONSE", `Response is not JSON (HTTP ${response.status})`, response.status);
  }
}

async function errorFromResponse(response: Response): Promise<SdkError> {
  const text = await response.text();
  let body: unknown;
  try {
    body = text.length > 0 ? JSON.parse(text) : undefined;
  } catch {
    body = undefined;
  }
  if (isErrorEnvelope(body)) {
    return new SdkError(body.error.code, body.error.message, response.status, body.error.details);
  }
  const fallback = response.status >= 500 ? "SERVER_ERROR" : "CLIENT_ERROR";
  return new SdkError(fallback, `HTTP ${response.status}`, response.status);
}
