/**
 * Claim gate: proof-gated payouts, at most once per (epoch, participant).
 *
 * leaf = SHA256(pubkey || uint256_be(amount)); the proof must lead from the
 * leaf to the published commitment root. The gate does not check the
 * amount against accrued yield: the root publisher is trusted for that.
 */

import {
  isHex32,
  verifyClaim,
  type Hex32,
  type MerkleProof,
  type ParticipantId,
} from "@givepool/protocol";
import { CLAIM_PAID_EVENT, COMMITMENT_ROOT_EVENT } from "../event-log/schemas.js";
import { assertAdministrator, type LedgerContext } from "./context.js";
import { alreadyClaimed, amountZero, invalidProof, invalidRoot } from "./errors.js";

export interface ClaimReceipt {
  participant: ParticipantId;
  amount: bigint;
  epoch: number;
  timestamp: number;
}

export function setCommitmentRoot(
  ctx: LedgerContext,
  caller: ParticipantId,
  root: Hex32,
): void {
  assertAdministrator(ctx.settings, caller);
  if (!isHex32(root)) throw invalidRoot(root);

  const { draft } = ctx;
  const previous = draft.commitmentRoot;
  draft.commitmentRoot = root;

  ctx.emit(COMMITMENT_ROOT_EVENT, { root, previous, epoch: draft.currentEpoch });
}

export async function claim(
  ctx: LedgerContext,
  caller: ParticipantId,
  amount: bigint,
  proof: MerkleProof,
): Promise<ClaimReceipt> {
  if (amount <= 0n) throw amountZero("amount");

  const { draft } = ctx;
  const epoch = draft.currentEpoch;
  if (draft.peekShareEntry(epoch, caller)?.claimed) {
    throw alreadyClaimed(epoch, caller);
  }

  const root = draft.commitmentRoot;
  if (root === null || !verifyClaim(caller, amount, proof, root)) {
    throw invalidProof(caller, amount);
  }

  const timestamp = ctx.now();
  const entry = draft.shareEntryAt(epoch, caller);
  entry.claimed = true;
  entry.claimedAmount += amount;

  const donor = draft.findDonor(caller);
  if (donor) donor.lastClaimedAt = timestamp;
  const recipient = draft.findRecipient(caller);
  if (recipient) recipient.lastClaimedAt = timestamp;

  draft.totalClaimed += amount;

  await ctx.tokens.transfer(caller, amount);

  ctx.emit(CLAIM_PAID_EVENT, {
    participant: caller,
    epoch,
    amount: amount.toString(),
  });

  return { participant: caller, amount, epoch, timestamp };
}
