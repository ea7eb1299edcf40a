/**
 * Claim commitments.
 *
 *   leaf = SHA256(participant_pubkey[32] || amount_uint256_be[32])
 *
 * The root over all leaves of a distribution is published to the ledger by
 * the (trusted, external) root publisher; participants present the proof for
 * their own (pubkey, amount) pair.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import {
  CLAIM_AMOUNT_BYTES,
  MAX_CLAIM_AMOUNT,
  PARTICIPANT_ID_BYTES,
} from "./constants.js";
import { fromHex, isHex32, type Hex32, type ParticipantId } from "./hex.js";
import {
  merkleProof,
  merkleRoot,
  verifyMerkleProof,
  type MerkleProof,
  type MerkleProofStep,
} from "./merkle.js";

function amountToBytes(amount: bigint): Uint8Array {
  if (amount < 0n || amount > MAX_CLAIM_AMOUNT) {
    throw new RangeError(`claim amount out of uint256 range: ${amount}`);
  }
  const out = new Uint8Array(CLAIM_AMOUNT_BYTES);
  let rest = amount;
  for (let i = CLAIM_AMOUNT_BYTES - 1; i >= 0 && rest > 0n; i--) {
    out[i] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return out;
}

/** Commitment leaf for a (participant, amount) entitlement. */
export function claimLeaf(participant: ParticipantId, amount: bigint): Hex32 {
  if (!isHex32(participant)) {
    throw new Error(`claimLeaf: participant must be 64 hex chars`);
  }
  const message = new Uint8Array(PARTICIPANT_ID_BYTES + CLAIM_AMOUNT_BYTES);
  message.set(fromHex(participant), 0);
  message.set(amountToBytes(amount), PARTICIPANT_ID_BYTES);
  return bytesToHex(sha256(message));
}

/**
 * Check a claim against a published root.
 * Out-of-range inputs never verify.
 */
export function verifyClaim(
  participant: ParticipantId,
  amount: bigint,
  proof: MerkleProof,
  root: Hex32,
): boolean {
  if (!isHex32(participant) || amount < 0n || amount > MAX_CLAIM_AMOUNT) return false;
  if (!proof.every((step) => isHex32(step.hash))) return false;
  return verifyMerkleProof(claimLeaf(participant, amount), proof, root);
}

// ── Distribution tree (root publisher side) ────────────────────────

export interface Entitlement {
  participant: ParticipantId;
  amount: bigint;
}

export interface ClaimTree {
  root: Hex32;
  /** Proof per entitlement, same order as the input. */
  proofs: MerkleProofStep[][];
}

/** Build root + proofs for an ordered list of entitlements. */
export function buildClaimTree(entitlements: readonly Entitlement[]): ClaimTree {
  const leaves = entitlements.map((e) => claimLeaf(e.participant, e.amount));
  return {
    root: merkleRoot(leaves),
    proofs: leaves.map((_, i) => merkleProof(leaves, i)),
  };
}
