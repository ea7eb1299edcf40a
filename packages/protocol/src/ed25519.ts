/**
 * Ed25519 over Web Crypto.
 *
 * Keys travel as raw bytes: 32-byte public key, 32-byte private seed.
 * The ledger only verifies; signing and key generation serve clients
 * and tests.
 */

import { webcrypto } from "node:crypto";
import { concatBytes } from "@noble/hashes/utils";

const { subtle } = webcrypto;
const ED25519 = { name: "Ed25519" } as const;

/** RFC 8410 PKCS8 header for a bare Ed25519 seed. */
const PKCS8_SEED_PREFIX = new Uint8Array([
  0x30, 0x2e, 0x02, 0x01, 0x00, 0x30, 0x05, 0x06,
  0x03, 0x2b, 0x65, 0x70, 0x04, 0x22, 0x04, 0x20,
]);

export interface Ed25519Keypair {
  publicKey: Uint8Array;
  /** 32-byte seed. */
  privateKey: Uint8Array;
}

export async function generateKeypair(): Promise<Ed25519Keypair> {
  const generated = await subtle.generateKey(ED25519, true, ["sign", "verify"]);
  if (!("publicKey" in generated)) {
    throw new Error("generateKeypair: Ed25519 did not yield a key pair");
  }

  const [raw, pkcs8] = await Promise.all([
    subtle.exportKey("raw", generated.publicKey),
    subtle.exportKey("pkcs8", generated.privateKey),
  ]);

  return {
    publicKey: new Uint8Array(raw),
    privateKey: new Uint8Array(pkcs8).slice(-32),
  };
}

/** 64-byte signature over `message`. */
export async function ed25519Sign(seed: Uint8Array, message: Uint8Array): Promise<Uint8Array> {
  const key = await subtle.importKey(
    "pkcs8",
    concatBytes(PKCS8_SEED_PREFIX, seed),
    ED25519,
    false,
    ["sign"],
  );
  return new Uint8Array(await subtle.sign(ED25519, key, message));
}

/** False for a bad signature and for keys Web Crypto refuses to import. */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  try {
    const key = await subtle.importKey("raw", publicKey, ED25519, false, ["verify"]);
    return await subtle.verify(ED25519, key, signature, message);
  } catch {
    return false;
  }
}
