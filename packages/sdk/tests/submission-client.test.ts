import { describe, it, expect, vi } from "vitest";
import { LedgerNode, extrinsicHash, generateSigner, verifyEnvelope } from "@petledger/runtime";
import { MAX_PET_ID } from "@petledger/types";
import { LocalTransport } from "../src/local-transport.js";
import { SubmissionClient } from "../src/submission-client.js";
import { SdkError, SubmissionUnknownError } from "../src/types.js";
import { FakeTransport } from "./helpers.js";

const alice = generateSigner();

function setup(maxNameLength = 8): { transport: FakeTransport; client: SubmissionClient } {
  const transport = new FakeTransport();
  return { transport, client: new SubmissionClient({ transport, maxNameLength }) };
}

describe("SubmissionClient", () => {
  describe("bounds", () => {
    it("rejects a long name before contacting the node", async () => {
      const { transport, client } = setup(4);
      const nonce = vi.spyOn(transport, "nextNonce");

      await expect(
        client.submit(alice, { kind: "mint", name: "Shelly", species: "Turtle", id: 1 }),
      ).rejects.toMatchObject({ code: "NAME_TOO_LONG", message: "Name is 6 bytes, maximum is 4" });
      expect(nonce).not.toHaveBeenCalled();
      expect(transport.submitted).toEqual([]);
    });

    it("measures names in UTF-8 bytes", async () => {
      const { client } = setup(5);
      await expect(
        client.submit(alice, { kind: "mint", name: "ééé", species: "Snake", id: 1 }),
      ).rejects.toBeInstanceOf(SdkError);
    });

    it("accepts a name exactly at the bound", async () => {
      const { transport, client } = setup(6);
      await client.submit(alice, { kind: "mint", name: "Shelly", species: "Turtle", id: 1 });
      expect(transport.submitted).toHaveLength(1);
    });

    it("rejects a pet id outside uint32", async () => {
      const { client } = setup();
      await expect(
        client.submit(alice, { kind: "mint", name: "Rex", species: "Rabbit", id: MAX_PET_ID + 1 }),
      ).rejects.toMatchObject({ code: "INVALID_PET_ID" });
    });
  });

  describe("submit", () => {
    it("signs with the nonce the transport reports", async () => {
      const { transport, client } = setup();
      transport.nonce = 4;

      const result = await client.submit(alice, { kind: "feed" });

      expect(result.envelope.nonce).toBe(4);
      expect(result.envelope.signer).toBe(alice.account);
      expect(verifyEnvelope(result.envelope)).toBe(true);
      expect(result.extrinsicHash).toBe(extrinsicHash(result.envelope));
      expect(result.command).toEqual({ kind: "feed" });
      expect(transport.submitted).toEqual([result.envelope]);
    });

    it("yields the status stream only once", async () => {
      const { client } = setup();
      const result = await client.submit(alice, { kind: "feed" });

      const seen = [];
      for await (const status of result.statuses) seen.push(status);
      expect(seen).toEqual([{ kind: "ready" }]);

      expect(() => result.statuses[Symbol.asyncIterator]()).toThrow(SdkError);
    });

    it("gives concurrent submissions from one signer consecutive nonces", async () => {
      const node = new LedgerNode({ maxNameLength: 8 });
      const client = new SubmissionClient({ transport: new LocalTransport(node), maxNameLength: 8 });

      const [first, second] = await Promise.all([
        client.submit(alice, { kind: "mint", name: "Rex", species: "Rabbit", id: 1 }),
        client.submit(alice, { kind: "feed" }),
      ]);

      expect(first.envelope.nonce).toBe(0);
      expect(second.envelope.nonce).toBe(1);
      expect(node.poolSize).toBe(2);
    });
  });

  describe("transport failures", () => {
    it("marks a submission lost in transit as unknown", async () => {
      const { transport, client } = setup();
      transport.submitError = new SdkError("TIMEOUT", "Request timed out after 10ms");

      const err: unknown = await client.submit(alice, { kind: "feed" }).catch((e: unknown) => e);

      const [sent] = transport.submitted;
      expect(err).toBeInstanceOf(SubmissionUnknownError);
      expect(sent).toBeDefined();
      if (sent === undefined) return;
      expect(err).toMatchObject({ code: "SUBMISSION_UNKNOWN", extrinsicHash: extrinsicHash(sent) });
    });

    it("treats a server error as unknown", async () => {
      const { transport, client } = setup();
      transport.submitError = new SdkError("SERVER_ERROR", "HTTP 502", 502);

      await expect(client.submit(alice, { kind: "feed" })).rejects.toMatchObject({
        code: "SUBMISSION_UNKNOWN",
        statusCode: 502,
      });
    });

    it("passes on a refusal from the node", async () => {
      const { transport, client } = setup();
      const refusal = new SdkError("VALIDATION_ERROR", "Request body validation failed", 400);
      transport.submitError = refusal;

      await expect(client.submit(alice, { kind: "feed" })).rejects.toBe(refusal);
    });
  });

  describe("preview", () => {
    it("fails on a transport without dry run", async () => {
      const { client } = setup();
      await expect(client.preview(alice, { kind: "feed" })).rejects.toMatchObject({
        code: "DRY_RUN_UNSUPPORTED",
      });
    });

    it("returns the node's dry run result", async () => {
      const node = new LedgerNode({ maxNameLength: 8 });
      const client = new SubmissionClient({ transport: new LocalTransport(node), maxNameLength: 8 });

      expect(await client.preview(alice, { kind: "feed" })).toMatchObject({
        ok: false,
        code: "ACCOUNT_HAS_NO_PET",
      });
    });
  });
});
