/**
 * Ledger draft: the working copy of one operation.
 *
 * Writes land in overlay maps holding copies of the rows the operation
 * touches; committed rows are never mutated. commit() folds the overlay
 * into the committed tables in one synchronous step, so readers see the
 * whole operation or none of it. An uncommitted draft is simply dropped.
 */

import type { Hex32, ParticipantId } from "@givepool/protocol";
import type {
  Batch,
  DonorRecord,
  LedgerTables,
  ParticipantShareEntry,
  RecipientRecord,
} from "./state.js";

function entryKey(epoch: number, participant: ParticipantId): string {
  return `${epoch}:${participant}`;
}

export class LedgerDraft {
  currentEpoch: number;
  totalDonationsGross: bigint;
  totalClaimed: bigint;
  commitmentRoot: Hex32 | null;

  private readonly donors = new Map<ParticipantId, DonorRecord>();
  private readonly recipients = new Map<ParticipantId, RecipientRecord>();
  private readonly batches = new Map<number, Batch>();
  private readonly entries = new Map<
    string,
    { epoch: number; participant: ParticipantId; entry: ParticipantShareEntry }
  >();

  constructor(private readonly base: LedgerTables) {
    this.currentEpoch = base.currentEpoch;
    this.totalDonationsGross = base.totalDonationsGross;
    this.totalClaimed = base.totalClaimed;
    this.commitmentRoot = base.commitmentRoot;
  }

  // ── Rows, writable (copied on first touch) ──────────────────────

  /** Writable donor row, created if missing. */
  donorAt(donor: ParticipantId): DonorRecord {
    return (
      this.findDonor(donor) ??
      this.ownDonor(donor, { totalGross: 0n, netContributed: 0n, totalShares: 0n, lastClaimedAt: null })
    );
  }

  /** Writable donor row, or undefined when the participant never donated. */
  findDonor(donor: ParticipantId): DonorRecord | undefined {
    const owned = this.donors.get(donor);
    if (owned) return owned;
    const committed = this.base.donors.get(donor);
    return committed ? this.ownDonor(donor, { ...committed }) : undefined;
  }

  recipientAt(recipient: ParticipantId): RecipientRecord {
    return (
      this.findRecipient(recipient) ??
      this.ownRecipient(recipient, { totalReceived: 0n, claimableShares: 0n, lastClaimedAt: null })
    );
  }

  findRecipient(recipient: ParticipantId): RecipientRecord | undefined {
    const owned = this.recipients.get(recipient);
    if (owned) return owned;
    const committed = this.base.recipients.get(recipient);
    return committed ? this.ownRecipient(recipient, { ...committed }) : undefined;
  }

  batchAt(epoch: number): Batch {
    let batch = this.batches.get(epoch);
    if (!batch) {
      const committed = this.base.batches.get(epoch);
      batch = committed
        ? { ...committed }
        : { queuedAmount: 0n, cooldownStartedAt: null, inCooldown: false };
      this.batches.set(epoch, batch);
    }
    return batch;
  }

  shareEntryAt(epoch: number, participant: ParticipantId): ParticipantShareEntry {
    const key = entryKey(epoch, participant);
    const owned = this.entries.get(key);
    if (owned) return owned.entry;

    const committed = this.base.shareEntries.get(epoch)?.get(participant);
    const entry: ParticipantShareEntry = committed
      ? { ...committed }
      : { shares: 0n, claimedAmount: 0n, yieldBasisAmount: 0n, claimed: false };
    this.entries.set(key, { epoch, participant, entry });
    return entry;
  }

  /** Read-only view of a share entry as this draft currently sees it. */
  peekShareEntry(
    epoch: number,
    participant: ParticipantId,
  ): Readonly<ParticipantShareEntry> | undefined {
    return (
      this.entries.get(entryKey(epoch, participant))?.entry ??
      this.base.shareEntries.get(epoch)?.get(participant)
    );
  }

  // ── Commit ───────────────────────────────────────────────────────

  commit(): void {
    const { base } = this;
    for (const [id, record] of this.donors) base.donors.set(id, record);
    for (const [id, record] of this.recipients) base.recipients.set(id, record);
    for (const [epoch, batch] of this.batches) base.batches.set(epoch, batch);
    for (const { epoch, participant, entry } of this.entries.values()) {
      let byParticipant = base.shareEntries.get(epoch);
      if (!byParticipant) {
        byParticipant = new Map();
        base.shareEntries.set(epoch, byParticipant);
      }
      byParticipant.set(participant, entry);
    }
    base.currentEpoch = this.currentEpoch;
    base.totalDonationsGross = this.totalDonationsGross;
    base.totalClaimed = this.totalClaimed;
    base.commitmentRoot = this.commitmentRoot;
  }

  private ownDonor(donor: ParticipantId, record: DonorRecord): DonorRecord {
    this.donors.set(donor, record);
    return record;
  }

  private ownRecipient(recipient: ParticipantId, record: RecipientRecord): RecipientRecord {
    this.recipients.set(recipient, record);
    return record;
  }
}
