/**
 * Envelope Signing
 *
 * Deterministic envelope construction and Ed25519 signatures.
 *
 * Design:
 * - RFC 8785 (JCS) canonical JSON of { signer, nonce, command } is signed
 * - An account is the hex-encoded raw Ed25519 public key of its signer
 * - The extrinsic hash is SHA-256 over the canonical signed envelope
 */

import {
  createHash,
  createPrivateKey,
  createPublicKey,
  generateKeyPairSync,
  sign,
  verify,
} from "node:crypto";
import type { KeyObject } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Account, Command, ExtrinsicHash, SignedEnvelope } from "@petledger/types";
import { RuntimeError } from "./types.js";

const ACCOUNT_PATTERN = /^[0-9a-f]{64}$/;
const SIGNATURE_PATTERN = /^[0-9a-f]{128}$/;

// =============================================================================
// Signers
// =============================================================================

/**
 * Holds a private key and signs on behalf of one account.
 */
export interface Signer {
  readonly account: Account;

  /** Hex-encoded signature over the UTF-8 bytes of `message` */
  sign(message: string): string;
}

export class Ed25519Signer implements Signer {
  readonly account: Account;

  constructor(private readonly privateKey: KeyObject) {
    if (privateKey.asymmetricKeyType !== "ed25519") {
      throw new RuntimeError(
        "INVALID_KEY",
        `Expected an ed25519 private key, got ${privateKey.asymmetricKeyType ?? "unknown"}`,
      );
    }
    this.account = accountOf(createPublicKey(privateKey));
  }

  sign(message: string): string {
    return sign(null, Buffer.from(message, "utf8"), this.privateKey).toString("hex");
  }

  /** PKCS#8 PEM, suitable for signerFromPrivateKey(). */
  exportPrivateKey(): string {
    return this.privateKey.export({ format: "pem", type: "pkcs8" }).toString();
  }
}

export function generateSigner(): Ed25519Signer {
  const { privateKey } = generateKeyPairSync("ed25519");
  return new Ed25519Signer(privateKey);
}

export function signerFromPrivateKey(pem: string): Ed25519Signer {
  return new Ed25519Signer(createPrivateKey(pem));
}

// =============================================================================
// Accounts
// =============================================================================

export function isAccount(value: string): boolean {
  return ACCOUNT_PATTERN.test(value);
}

function accountOf(publicKey: KeyObject): Account {
  const jwk = publicKey.export({ format: "jwk" });
  if (jwk.x === undefined) {
    throw new RuntimeError("INVALID_KEY", "Public key has no x coordinate");
  }
  return Buffer.from(jwk.x, "base64url").toString("hex");
}

function publicKeyOf(account: Account): KeyObject {
  return createPublicKey({
    key: {
      kty: "OKP",
      crv: "Ed25519",
      x: Buffer.from(account, "hex").toString("base64url"),
    },
    format: "jwk",
  });
}

// =============================================================================
// Envelopes
// =============================================================================

/**
 * The exact string a signer signs for an envelope.
 */
export function signingPayload(signer: Account, nonce: number, command: Command): string {
  return canonicalize({ signer, nonce, command });
}

export function signEnvelope(signer: Signer, nonce: number, command: Command): SignedEnvelope {
  return {
    signer: signer.account,
    nonce,
    command,
    signature: signer.sign(signingPayload(signer.account, nonce, command)),
  };
}

/**
 * Check that `envelope.signature` was made by `envelope.signer` over its
 * nonce and command. Malformed accounts or signatures verify as false.
 */
export function verifyEnvelope(envelope: SignedEnvelope): boolean {
  if (!isAccount(envelope.signer) || !SIGNATURE_PATTERN.test(envelope.signature)) {
    return false;
  }
  const message = signingPayload(envelope.signer, envelope.nonce, envelope.command);
  return verify(
    null,
    Buffer.from(message, "utf8"),
    publicKeyOf(envelope.signer),
    Buffer.from(envelope.signature, "hex"),
  );
}

export function extrinsicHash(envelope: SignedEnvelope): ExtrinsicHash {
  return createHash("sha256").update(canonicalize(envelope)).digest("hex");
}
