/**
 * Golden test vectors: merkle tree with positional proofs.
 * These vectors are FROZEN.
 */

import { describe, it, expect } from "vitest";
import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, concatBytes, hexToBytes } from "@noble/hashes/utils";
import { merkleProof, merkleRoot, verifyMerkleProof } from "../../src/merkle.js";

const leaf = (label: string) => bytesToHex(sha256(new TextEncoder().encode(label)));
const pair = (l: string, r: string) => bytesToHex(sha256(concatBytes(hexToBytes(l), hexToBytes(r))));

const A = leaf("a");
const B = leaf("b");
const C = leaf("c");
const D = leaf("d");

describe("merkleRoot", () => {
  it("single leaf → root is the leaf", () => {
    expect(merkleRoot([A])).toBe(A);
  });

  it("two leaves → H(left || right)", () => {
    expect(merkleRoot([A, B])).toBe(pair(A, B));
  });

  it("order matters", () => {
    expect(merkleRoot([A, B])).not.toBe(merkleRoot([B, A]));
  });

  it("odd leaf is promoted unchanged", () => {
    expect(merkleRoot([A, B, C])).toBe(pair(pair(A, B), C));
  });

  it("four leaves → balanced tree", () => {
    expect(merkleRoot([A, B, C, D])).toBe(pair(pair(A, B), pair(C, D)));
  });

  it("empty list throws", () => {
    expect(() => merkleRoot([])).toThrow("empty leaf list");
  });
});

describe("merkleProof", () => {
  it("siblings carry their side", () => {
    expect(merkleProof([A, B, C, D], 0)).toEqual([
      { hash: B, position: "right" },
      { hash: pair(C, D), position: "right" },
    ]);
    expect(merkleProof([A, B, C, D], 3)).toEqual([
      { hash: C, position: "left" },
      { hash: pair(A, B), position: "left" },
    ]);
  });

  it("promoted node contributes no step", () => {
    expect(merkleProof([A, B, C], 2)).toEqual([{ hash: pair(A, B), position: "left" }]);
  });

  it("single leaf → empty proof", () => {
    expect(merkleProof([A], 0)).toEqual([]);
  });

  it("every leaf of a 7-leaf tree verifies", () => {
    const leaves = Array.from({ length: 7 }, (_, i) => leaf(`block_${i}`));
    const root = merkleRoot(leaves);

    leaves.forEach((l, i) => {
      expect(verifyMerkleProof(l, merkleProof(leaves, i), root)).toBe(true);
    });
  });

  it("out-of-range index throws", () => {
    expect(() => merkleProof([A, B], 2)).toThrow(RangeError);
    expect(() => merkleProof([A, B], -1)).toThrow(RangeError);
  });
});

describe("verifyMerkleProof", () => {
  const root = merkleRoot([A, B, C, D]);

  it("rejects a flipped position", () => {
    const proof = merkleProof([A, B, C, D], 0).map((s) => ({ ...s, position: "left" as const }));
    expect(verifyMerkleProof(A, proof, root)).toBe(false);
  });

  it("rejects the wrong leaf", () => {
    expect(verifyMerkleProof(B, merkleProof([A, B, C, D], 0), root)).toBe(false);
  });

  it("rejects a truncated proof", () => {
    expect(verifyMerkleProof(A, merkleProof([A, B, C, D], 0).slice(0, 1), root)).toBe(false);
  });
});
