/**
 * Hex + digest helpers.
 *
 * Participant identities, roots and proof nodes are 32-byte values
 * represented as lowercase hex strings.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** 32-byte lowercase hex string. */
export type Hex32 = string;

/** Ed25519 public key identifying a donor, recipient or operator. */
export type ParticipantId = Hex32;

const HEX32_RE = /^[0-9a-f]{64}$/;

export function isHex32(value: string): value is Hex32 {
  return HEX32_RE.test(value);
}

/** SHA-256 of canonically-encoded object → hex. */
export function digestObject(obj: unknown): Hex32 {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
