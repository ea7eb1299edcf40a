/**
 * Ledger records → JSON wire views (bigint → decimal string).
 */

import type {
  BatchV1,
  DonorRecordV1,
  LedgerStatsV1,
  RecipientRecordV1,
  ShareEntryV1,
} from "@givepool/protocol";
import type {
  Batch,
  DonationReceipt,
  DonorRecord,
  ErrorDetail,
  LedgerStats,
  ParticipantShareEntry,
  RecipientRecord,
} from "./ledger/index.js";

export function donorToWire(donor: string, r: Readonly<DonorRecord>): DonorRecordV1 {
  return {
    donor,
    total_gross: r.totalGross.toString(),
    net_contributed: r.netContributed.toString(),
    total_shares: r.totalShares.toString(),
    last_claimed_at: r.lastClaimedAt,
  };
}

export function recipientToWire(recipient: string, r: Readonly<RecipientRecord>): RecipientRecordV1 {
  return {
    recipient,
    total_received: r.totalReceived.toString(),
    claimable_shares: r.claimableShares.toString(),
    last_claimed_at: r.lastClaimedAt,
  };
}

export function batchToWire(epoch: number, b: Readonly<Batch>): BatchV1 {
  return {
    epoch,
    queued_amount: b.queuedAmount.toString(),
    cooldown_started_at: b.cooldownStartedAt,
    in_cooldown: b.inCooldown,
  };
}

export function shareEntryToWire(
  epoch: number,
  participant: string,
  e: Readonly<ParticipantShareEntry>,
): ShareEntryV1 {
  return {
    epoch,
    participant,
    shares: e.shares.toString(),
    claimed_amount: e.claimedAmount.toString(),
    yield_basis_amount: e.yieldBasisAmount.toString(),
    claimed: e.claimed,
  };
}

export function statsToWire(s: LedgerStats): LedgerStatsV1 {
  return {
    current_epoch: s.currentEpoch,
    total_donations_gross: s.totalDonationsGross.toString(),
    total_claimed: s.totalClaimed.toString(),
    commitment_root: s.commitmentRoot,
    minimum_batch_threshold: s.minimumBatchThreshold.toString(),
  };
}

export function donationToWire(r: DonationReceipt) {
  return {
    epoch: r.epoch,
    gross: r.gross.toString(),
    fee: r.fee.toString(),
    net: r.net.toString(),
    donor_portion: r.donorPortion.toString(),
    recipient_portion: r.recipientPortion.toString(),
    donor_shares: r.donorShares.toString(),
    recipient_shares: r.recipientShares.toString(),
  };
}

export function detailToWire(detail: ErrorDetail): Record<string, string | number | null> {
  const out: Record<string, string | number | null> = {};
  for (const [key, value] of Object.entries(detail)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}
