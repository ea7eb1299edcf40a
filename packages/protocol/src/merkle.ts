/**
 * Binary merkle tree over 32-byte leaves.
 *
 * node = SHA256(left || right). Odd leaf is promoted unchanged.
 * Proof steps are positional: each sibling says which side it sits on,
 * so concatenation order is fixed per level.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { fromHex, type Hex32 } from "./hex.js";

export interface MerkleProofStep {
  hash: Hex32;
  position: "left" | "right";
}

export type MerkleProof = readonly MerkleProofStep[];

function hashPair(left: Uint8Array, right: Uint8Array): Uint8Array {
  const combined = new Uint8Array(left.length + right.length);
  combined.set(left, 0);
  combined.set(right, left.length);
  return sha256(combined);
}

/** All levels of the tree, leaves first, root level last. */
function buildLevels(leaves: readonly Hex32[]): Uint8Array[][] {
  if (leaves.length === 0) {
    throw new Error("merkleRoot: empty leaf list");
  }

  const levels: Uint8Array[][] = [leaves.map((leaf) => fromHex(leaf))];
  let level = levels[0]!;

  while (level.length > 1) {
    const next: Uint8Array[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i]!;
      const right = level[i + 1];
      next.push(right ? hashPair(left, right) : left);
    }
    levels.push(next);
    level = next;
  }

  return levels;
}

/**
 * Compute merkle root from an ordered list of leaves.
 * Returns the hex-encoded root hash.
 */
export function merkleRoot(leaves: readonly Hex32[]): Hex32 {
  const levels = buildLevels(leaves);
  return bytesToHex(levels[levels.length - 1]![0]!);
}

/**
 * Build the inclusion proof for the leaf at `index`.
 * Promoted nodes contribute no step.
 */
export function merkleProof(leaves: readonly Hex32[], index: number): MerkleProofStep[] {
  if (!Number.isInteger(index) || index < 0 || index >= leaves.length) {
    throw new RangeError(`merkleProof: index ${index} out of range`);
  }

  const levels = buildLevels(leaves);
  const proof: MerkleProofStep[] = [];
  let i = index;

  for (const level of levels.slice(0, -1)) {
    const isRight = i % 2 === 1;
    const sibling = level[isRight ? i - 1 : i + 1];
    if (sibling) {
      proof.push({ hash: bytesToHex(sibling), position: isRight ? "left" : "right" });
    }
    i = Math.floor(i / 2);
  }

  return proof;
}

/**
 * Verify a merkle proof for a given leaf.
 */
export function verifyMerkleProof(leaf: Hex32, proof: MerkleProof, root: Hex32): boolean {
  let current = fromHex(leaf);

  for (const step of proof) {
    const sibling = fromHex(step.hash);
    current = step.position === "left" ? hashPair(sibling, current) : hashPair(current, sibling);
  }

  return bytesToHex(current) === root;
}
