/**
 * Bytes that get signed or hashed.
 *
 * A request payload and its signature travel as JSON, but what the signer
 * commits to is a CBOR rendering of the payload in which map keys are
 * sorted and every bigint has become its decimal string. A client that
 * only ever saw the JSON (where amounts are already strings) produces the
 * same bytes as the ledger holding bigints.
 */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function normalize(value: unknown): unknown {
  if (value === null || value === undefined) return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return value;
  if (Array.isArray(value)) return value.map(normalize);
  if (typeof value === "object") {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const out: Record<string, unknown> = {};
    for (const [key, inner] of entries) out[key] = normalize(inner);
    return out;
  }
  return value;
}

export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(normalize(obj));
}
