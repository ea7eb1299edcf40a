/**
 * Epoch batch manager: withdrawal batching and the unstake lifecycle.
 *
 *   Idle ──startCooldown──▶ Cooldown ──completeUnstake──▶ retired
 *
 * Idle batches take new withdrawal requests. While the current batch is
 * cooling down its amount is frozen and requests go to epoch + 1.
 * completeUnstake is the only thing that advances the epoch, by exactly one.
 */

import type { ParticipantId } from "@givepool/protocol";
import {
  BATCH_COOLDOWN_EVENT,
  BATCH_UNSTAKED_EVENT,
  WITHDRAWAL_QUEUED_EVENT,
} from "../event-log/schemas.js";
import { assertAdministrator, type LedgerContext } from "./context.js";
import {
  amountZero,
  batchMinimumNotReached,
  cooldownAlreadyStarted,
  insufficientBalance,
} from "./errors.js";

export interface WithdrawalReceipt {
  recipient: ParticipantId;
  shares: bigint;
  /** Batch the request landed in. */
  epoch: number;
  remainingShares: bigint;
  timestamp: number;
}

export interface CooldownReceipt {
  epoch: number;
  shares: bigint;
  /** Assets the vault locked for the cooldown. */
  assets: bigint;
  timestamp: number;
}

export interface UnstakeReceipt {
  /** Epoch that was retired. */
  epoch: number;
  nextEpoch: number;
  releasedAssets: bigint;
  timestamp: number;
}

export function queueWithdrawal(
  ctx: LedgerContext,
  recipient: ParticipantId,
  shares: bigint,
): WithdrawalReceipt {
  if (shares <= 0n) throw amountZero("shares");

  const { draft } = ctx;
  const record = draft.findRecipient(recipient);
  const available = record?.claimableShares ?? 0n;
  if (!record || shares > available) {
    throw insufficientBalance(recipient, available, shares);
  }

  const current = draft.currentEpoch;
  const epoch = draft.batchAt(current).inCooldown ? current + 1 : current;
  const batch = draft.batchAt(epoch);
  const timestamp = ctx.now();

  batch.queuedAmount += shares;
  if (batch.cooldownStartedAt === null) batch.cooldownStartedAt = timestamp;
  record.claimableShares -= shares;

  ctx.emit(WITHDRAWAL_QUEUED_EVENT, {
    recipient,
    epoch,
    shares: shares.toString(),
  });

  return { recipient, shares, epoch, remainingShares: record.claimableShares, timestamp };
}

export async function startCooldown(
  ctx: LedgerContext,
  caller: ParticipantId,
): Promise<CooldownReceipt> {
  assertAdministrator(ctx.settings, caller);

  const { draft } = ctx;
  const epoch = draft.currentEpoch;
  const batch = draft.batchAt(epoch);
  if (batch.inCooldown) throw cooldownAlreadyStarted(epoch);

  const minimum = ctx.settings.minimumBatchThreshold;
  if (batch.queuedAmount < minimum) {
    throw batchMinimumNotReached(epoch, batch.queuedAmount, minimum);
  }

  batch.inCooldown = true;
  const assets = await ctx.vault.cooldownShares(batch.queuedAmount);

  ctx.emit(BATCH_COOLDOWN_EVENT, {
    epoch,
    shares: batch.queuedAmount.toString(),
    assets: assets.toString(),
  });

  return { epoch, shares: batch.queuedAmount, assets, timestamp: ctx.now() };
}

export async function completeUnstake(
  ctx: LedgerContext,
  caller: ParticipantId,
): Promise<UnstakeReceipt> {
  assertAdministrator(ctx.settings, caller);

  const { draft } = ctx;
  const epoch = draft.currentEpoch;
  const nextEpoch = epoch + 1;
  draft.currentEpoch = nextEpoch;
  draft.batchAt(nextEpoch);

  const releasedAssets = await ctx.vault.unstake();

  ctx.emit(BATCH_UNSTAKED_EVENT, {
    epoch,
    next_epoch: nextEpoch,
    released_assets: releasedAssets.toString(),
  });

  return { epoch, nextEpoch, releasedAssets, timestamp: ctx.now() };
}
