/**
 * Ledger tables: the complete persisted state.
 *
 * Four keyed tables plus scalar counters. Batches and share entries are
 * sparse maps keyed by epoch (and participant); they materialize on first
 * touch and are never deleted. Only LedgerDraft.commit() writes here.
 */

import type { Hex32, ParticipantId } from "@givepool/protocol";

export interface DonorRecord {
  totalGross: bigint;
  netContributed: bigint;
  /** Donor-yield-basis shares across all donations. */
  totalShares: bigint;
  lastClaimedAt: number | null;
}

export interface RecipientRecord {
  totalReceived: bigint;
  /** Never negative; withdrawals are checked against it before debit. */
  claimableShares: bigint;
  lastClaimedAt: number | null;
}

export interface Batch {
  /** Shares queued for unstake. Frozen once inCooldown. */
  queuedAmount: bigint;
  /** Time of the first withdrawal queued into this batch. */
  cooldownStartedAt: number | null;
  inCooldown: boolean;
}

export interface ParticipantShareEntry {
  shares: bigint;
  /** Non-decreasing. */
  claimedAmount: bigint;
  yieldBasisAmount: bigint;
  /** Set once, on the first successful claim for this (epoch, participant). */
  claimed: boolean;
}

export interface LedgerTables {
  donors: Map<ParticipantId, DonorRecord>;
  recipients: Map<ParticipantId, RecipientRecord>;
  batches: Map<number, Batch>;
  shareEntries: Map<number, Map<ParticipantId, ParticipantShareEntry>>;
  currentEpoch: number;
  totalDonationsGross: bigint;
  totalClaimed: bigint;
  commitmentRoot: Hex32 | null;
}

export function createLedgerTables(): LedgerTables {
  return {
    donors: new Map(),
    recipients: new Map(),
    batches: new Map([[0, emptyBatch()]]),
    shareEntries: new Map(),
    currentEpoch: 0,
    totalDonationsGross: 0n,
    totalClaimed: 0n,
    commitmentRoot: null,
  };
}

function emptyBatch(): Batch {
  return { queuedAmount: 0n, cooldownStartedAt: null, inCooldown: false };
}

// ── Committed reads (never materialize) ────────────────────────────

export function peekBatch(tables: LedgerTables, epoch: number): Readonly<Batch> {
  return tables.batches.get(epoch) ?? emptyBatch();
}

export function peekShareEntry(
  tables: LedgerTables,
  epoch: number,
  participant: ParticipantId,
): Readonly<ParticipantShareEntry> | undefined {
  return tables.shareEntries.get(epoch)?.get(participant);
}
