/**
 * Tests for extrinsic submission over HTTP.
 *
 * Verifies:
 * - Statuses stream back as `status` SSE frames until the node closes them
 * - Admission rejections arrive as a single terminal frame
 * - Malformed bodies are rejected before reaching the node
 * - Dry runs report what a block would do, without applying it
 */

import { describe, it, expect } from "vitest";
import { extrinsicHash, generateSigner } from "@petledger/runtime";
import { createTestApp, envelopeFor, jsonRequest, mint, statusFrames } from "./setup.js";

const alice = generateSigner();

describe("POST /v1/extrinsics", () => {
  it("streams ready, in_block and finalized", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7));

    const res = await app.request(jsonRequest("/v1/extrinsics", "POST", envelope));
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toContain("text/event-stream");
    expect(res.headers.get("X-Extrinsic-Hash")).toBe(extrinsicHash(envelope));

    const block = node.produceBlock();
    const frames = statusFrames(await res.text());

    expect(frames).toEqual([
      { kind: "ready" },
      { kind: "in_block", block: block.ref },
      { kind: "finalized", block: block.ref },
    ]);
    expect(node.petOf(alice.account)).toEqual({ id: 7, name: "Shelly", species: "Turtle" });
  });

  it("numbers frames from zero", async () => {
    const { app, node } = createTestApp();
    const res = await app.request(
      jsonRequest("/v1/extrinsics", "POST", envelopeFor(node, alice, mint(7))),
    );
    node.produceBlock();

    const ids = (await res.text())
      .split("\n")
      .filter((line) => line.startsWith("id: "));
    expect(ids).toEqual(["id: 0", "id: 1", "id: 2"]);
  });

  it("streams a single invalid frame for a bad signature", async () => {
    const { app, node } = createTestApp();
    const envelope = { ...envelopeFor(node, alice, mint(7)), signature: "00".repeat(64) };

    const res = await app.request(jsonRequest("/v1/extrinsics", "POST", envelope));

    expect(statusFrames(await res.text())).toEqual([{ kind: "invalid", reason: "Bad signature" }]);
    expect(node.poolSize).toBe(0);
  });

  it("leaves the name bound to the node", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7, "Shellington"));

    const res = await app.request(jsonRequest("/v1/extrinsics", "POST", envelope));

    expect(res.status).toBe(200);
    expect(statusFrames(await res.text())).toEqual([
      { kind: "invalid", reason: "Name is 11 bytes, maximum is 8" },
    ]);
  });

  it("rejects a stale nonce", async () => {
    const { app, node } = createTestApp();
    const first = envelopeFor(node, alice, mint(7));
    node.submit(first);

    const res = await app.request(jsonRequest("/v1/extrinsics", "POST", first));

    expect(statusFrames(await res.text())).toEqual([
      { kind: "invalid", reason: "Stale nonce 0, expected 1" },
    ]);
  });

  it("drops submissions once the node is stopped", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7));
    node.stop();

    const res = await app.request(jsonRequest("/v1/extrinsics", "POST", envelope));

    expect(statusFrames(await res.text())).toEqual([
      { kind: "dropped", reason: "Node is not accepting extrinsics" },
    ]);
  });

  it("returns 400 for an unknown command", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7));

    const res = await app.request(
      jsonRequest("/v1/extrinsics", "POST", { ...envelope, command: { kind: "pet" } }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Request body validation failed");
  });

  it("returns 400 for a pet id outside uint32", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7));

    const res = await app.request(
      jsonRequest("/v1/extrinsics", "POST", {
        ...envelope,
        command: { kind: "mint", name: "Shelly", species: "Turtle", id: 4294967296 },
      }),
    );

    expect(res.status).toBe(400);
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      new Request("http://localhost/v1/extrinsics", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Invalid JSON in request body");
  });
});

describe("POST /v1/extrinsics/dry-run", () => {
  it("returns the event the next block would emit", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, mint(7));

    const res = await app.request(jsonRequest("/v1/extrinsics/dry-run", "POST", envelope));

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      ok: true,
      event: { kind: "pet_minted", owner: alice.account, petId: 7 },
      height: 1,
    });
    expect(node.petOf(alice.account)).toBeUndefined();
    expect(node.poolSize).toBe(0);
  });

  it("returns the ledger's error for a failing command", async () => {
    const { app, node } = createTestApp();
    const envelope = envelopeFor(node, alice, { kind: "feed" });

    const res = await app.request(jsonRequest("/v1/extrinsics/dry-run", "POST", envelope));

    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      ok: false,
      code: "ACCOUNT_HAS_NO_PET",
      message: `Account ${alice.account} has no pet`,
    });
  });
});
