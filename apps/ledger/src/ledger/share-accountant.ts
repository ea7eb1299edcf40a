/**
 * Share accountant: per-epoch, per-participant share and yield basis.
 *
 * Both sides of a donation are recorded against the epoch active at
 * donation time. Yield is what the recorded shares are worth (or were
 * paid out, once claimed) minus the currency amount they were bought with.
 */

import type { ParticipantId } from "@givepool/protocol";
import type { VaultAdapter } from "@givepool/vault-client";
import type { LedgerDraft } from "./draft.js";
import { peekShareEntry, type LedgerTables } from "./state.js";

export function creditShares(
  draft: LedgerDraft,
  epoch: number,
  participant: ParticipantId,
  shares: bigint,
  yieldBasis: bigint,
): void {
  const entry = draft.shareEntryAt(epoch, participant);
  entry.shares += shares;
  entry.yieldBasisAmount += yieldBasis;
}

/**
 * Signed yield for (epoch, participant).
 *
 *   claimed   → claimedAmount − yieldBasisAmount
 *   unclaimed → previewRedeem(shares) − yieldBasisAmount
 *
 * Negative when the vault lost value. Read-only; unknown entries are 0.
 */
export async function getYield(
  tables: LedgerTables,
  vault: VaultAdapter,
  epoch: number,
  participant: ParticipantId,
): Promise<bigint> {
  const entry = peekShareEntry(tables, epoch, participant);
  if (!entry) return 0n;

  const realized = entry.claimed
    ? entry.claimedAmount
    : await vault.previewRedeem(entry.shares);

  return realized - entry.yieldBasisAmount;
}
