/**
 * Request signatures.
 *
 * Every mutating ledger request is signed by its caller:
 *   sig = Ed25519_sign(private_key, canonical(payload))
 *
 * The signature covers the canonical-encoded payload, not the JSON wire
 * format, so it is stable across serializations.
 */

import { canonicalEncode } from "./canonical.js";
import { ed25519Sign, ed25519Verify } from "./ed25519.js";
import { fromHex, isHex32 } from "./hex.js";

/**
 * Sign a request payload.
 *
 * @param privateKey - 32-byte Ed25519 seed
 * @returns Base64-encoded Ed25519 signature
 */
export async function signRequestPayload(
  privateKey: Uint8Array,
  payload: unknown,
): Promise<string> {
  const sig = await ed25519Sign(privateKey, canonicalEncode(payload));
  return Buffer.from(sig).toString("base64");
}

const SIGNATURE_BYTES = 64;

/**
 * Decode a base64 signature, accepting only the one canonical spelling of
 * 64 bytes (88 chars, "==" padding, zero trailing bits). Anything else
 * returns null.
 */
export function decodeSignature(sigBase64: string): Uint8Array | null {
  const bytes = new Uint8Array(Buffer.from(sigBase64, "base64"));
  if (bytes.length !== SIGNATURE_BYTES) return null;
  if (Buffer.from(bytes).toString("base64") !== sigBase64) return null;
  return bytes;
}

/**
 * Verify a request signature against a pubkey and payload.
 *
 * @param pubkeyHex - 64-char hex Ed25519 public key
 * @param sigBase64 - Base64-encoded Ed25519 signature, canonical spelling only
 */
export async function verifyRequestSignature(
  pubkeyHex: string,
  sigBase64: string,
  payload: unknown,
): Promise<boolean> {
  if (!pubkeyHex || !sigBase64) return false;
  if (!isHex32(pubkeyHex)) return false;

  const sigBytes = decodeSignature(sigBase64);
  if (!sigBytes) return false;

  return ed25519Verify(fromHex(pubkeyHex), sigBytes, canonicalEncode(payload));
}
