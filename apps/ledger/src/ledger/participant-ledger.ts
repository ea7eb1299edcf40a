/**
 * Participant ledger: donations into donor/recipient records.
 *
 * One donation, in order:
 *   1. reject zero amounts and donors who cannot cover the gross
 *   2. split gross → fee / donor portion / recipient portion
 *   3. convert donor portion and net to vault shares (recipient shares are
 *      the difference, so the two sides always add up to the net shares)
 *   4. bookkeeping: donor + recipient records, per-epoch share entries
 *   5. transfers: gross into custody, fee to operations, net into the vault;
 *      if one fails, the ones already made are reversed before the error
 *      propagates
 */

import {
  splitDonation,
  recipientShares,
  type DonationSplit,
  type ParticipantId,
} from "@givepool/protocol";
import { DONATION_RECORDED_EVENT } from "../event-log/schemas.js";
import type { LedgerContext } from "./context.js";
import { amountZero, insufficientBalance } from "./errors.js";
import { creditShares } from "./share-accountant.js";

export interface DonationReceipt {
  epoch: number;
  donor: ParticipantId;
  recipient: ParticipantId;
  gross: bigint;
  fee: bigint;
  net: bigint;
  donorPortion: bigint;
  recipientPortion: bigint;
  donorShares: bigint;
  recipientShares: bigint;
  timestamp: number;
}

export async function recordDonation(
  ctx: LedgerContext,
  donor: ParticipantId,
  recipient: ParticipantId,
  gross: bigint,
): Promise<DonationReceipt> {
  if (gross <= 0n) throw amountZero("amount");

  const available = await ctx.tokens.balanceOf(donor);
  if (available < gross) throw insufficientBalance(donor, available, gross);

  const split = splitDonation(gross);
  const donorShares = await ctx.vault.convertToShares(split.donorPortion);
  const netShares = await ctx.vault.convertToShares(split.net);
  const creatorShares = recipientShares(netShares, donorShares);

  const { draft } = ctx;
  const epoch = draft.currentEpoch;
  const timestamp = ctx.now();

  const donorRecord = draft.donorAt(donor);
  donorRecord.totalGross += gross;
  donorRecord.netContributed += split.net;
  donorRecord.totalShares += donorShares;

  const recipientRecord = draft.recipientAt(recipient);
  recipientRecord.totalReceived += split.net;
  recipientRecord.claimableShares += creatorShares;

  creditShares(draft, epoch, donor, donorShares, split.donorPortion);
  creditShares(draft, epoch, recipient, creatorShares, split.recipientPortion);
  draft.totalDonationsGross += gross;

  await moveDonationFunds(ctx, donor, split);

  ctx.emit(DONATION_RECORDED_EVENT, {
    donor,
    recipient,
    epoch,
    gross: gross.toString(),
    net: split.net.toString(),
    fee: split.fee.toString(),
    donor_shares: donorShares.toString(),
    recipient_shares: creatorShares.toString(),
  });

  return {
    epoch,
    donor,
    recipient,
    gross,
    fee: split.fee,
    net: split.net,
    donorPortion: split.donorPortion,
    recipientPortion: split.recipientPortion,
    donorShares,
    recipientShares: creatorShares,
    timestamp,
  };
}

/**
 * gross: donor → custody, fee: custody → operations, net: custody → vault.
 * A failing step reverses the completed ones, newest first.
 */
async function moveDonationFunds(
  ctx: LedgerContext,
  donor: ParticipantId,
  split: DonationSplit,
): Promise<void> {
  const { tokens, vault, settings } = ctx;
  const reversals: Array<() => Promise<void>> = [];

  try {
    await tokens.transferFrom(donor, split.gross);
    reversals.push(() => tokens.transfer(donor, split.gross));

    if (split.fee > 0n) {
      await tokens.transfer(settings.operatingAddress, split.fee);
      reversals.push(() => tokens.transferFrom(settings.operatingAddress, split.fee));
    }

    await vault.deposit(split.net);
  } catch (err) {
    for (const reverse of reversals.reverse()) {
      await reverse();
    }
    throw err;
  }
}
