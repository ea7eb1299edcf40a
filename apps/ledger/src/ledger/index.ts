/**
 * Donation ledger: the engine behind the HTTP surface.
 *
 * Composes the participant ledger, epoch batch manager, share accountant
 * and claim gate over one set of tables. Every mutating operation:
 *   - runs alone (serial queue), so collaborators cannot interleave or re-enter
 *   - checks, then books, then calls the vault/token collaborators
 *   - writes into a draft that readers never see; on any throw the draft
 *     and its events are dropped
 *   - on success commits the draft and appends its events in one step
 */

import type { Hex32, MerkleProof, ParticipantId } from "@givepool/protocol";
import type { TokenMover, VaultAdapter } from "@givepool/vault-client";
import type { EventPayload } from "../event-log/schemas.js";
import type { EventLog } from "../event-log/writer.js";
import { claim, setCommitmentRoot, type ClaimReceipt } from "./claim-gate.js";
import type { LedgerContext, LedgerSettings } from "./context.js";
import { LedgerDraft } from "./draft.js";
import {
  completeUnstake,
  queueWithdrawal,
  startCooldown,
  type CooldownReceipt,
  type UnstakeReceipt,
  type WithdrawalReceipt,
} from "./epoch-batches.js";
import { recordDonation, type DonationReceipt } from "./participant-ledger.js";
import { createSerialQueue } from "./serial.js";
import { getYield } from "./share-accountant.js";
import {
  createLedgerTables,
  peekBatch,
  peekShareEntry,
  type Batch,
  type DonorRecord,
  type LedgerTables,
  type ParticipantShareEntry,
  type RecipientRecord,
} from "./state.js";

export interface LedgerDeps {
  vault: VaultAdapter;
  tokens: TokenMover;
  events: EventLog;
  settings: LedgerSettings;
  now?: () => number;
}

export interface LedgerStats {
  currentEpoch: number;
  totalDonationsGross: bigint;
  totalClaimed: bigint;
  commitmentRoot: Hex32 | null;
  minimumBatchThreshold: bigint;
}

export interface DonationLedger {
  donate(donor: ParticipantId, recipient: ParticipantId, amount: bigint): Promise<DonationReceipt>;
  queueWithdrawal(recipient: ParticipantId, shares: bigint): Promise<WithdrawalReceipt>;
  startCooldown(caller: ParticipantId): Promise<CooldownReceipt>;
  completeUnstake(caller: ParticipantId): Promise<UnstakeReceipt>;
  setCommitmentRoot(caller: ParticipantId, root: Hex32): Promise<void>;
  claim(caller: ParticipantId, amount: bigint, proof: MerkleProof): Promise<ClaimReceipt>;

  getYield(epoch: number, participant: ParticipantId): Promise<bigint>;
  getBatch(epoch: number): Readonly<Batch>;
  getBatchQueuedAmount(epoch: number): bigint;
  getBatchCooldownStart(epoch: number): number | null;
  getDonor(donor: ParticipantId): Readonly<DonorRecord> | undefined;
  getRecipient(recipient: ParticipantId): Readonly<RecipientRecord> | undefined;
  getShareEntry(epoch: number, participant: ParticipantId): Readonly<ParticipantShareEntry> | undefined;
  currentEpoch(): number;
  stats(): LedgerStats;
}

interface PendingEvent {
  type: string;
  payload: EventPayload;
}

export function createLedger(deps: LedgerDeps): DonationLedger {
  const now = deps.now ?? Date.now;
  const queue = createSerialQueue();
  const tables: LedgerTables = createLedgerTables();

  function mutate<T>(operation: (ctx: LedgerContext) => T | Promise<T>): Promise<T> {
    return queue.run(async () => {
      const draft = new LedgerDraft(tables);
      const pending: PendingEvent[] = [];
      const ctx: LedgerContext = {
        draft,
        vault: deps.vault,
        tokens: deps.tokens,
        settings: deps.settings,
        now,
        emit: (type, payload) => {
          pending.push({ type, payload });
        },
      };

      const result = await operation(ctx);

      draft.commit();
      const committedAt = now();
      for (const event of pending) {
        deps.events.append(event.type, committedAt, event.payload);
      }
      return result;
    });
  }

  return {
    donate: (donor, recipient, amount) =>
      mutate((ctx) => recordDonation(ctx, donor, recipient, amount)),
    queueWithdrawal: (recipient, shares) =>
      mutate((ctx) => queueWithdrawal(ctx, recipient, shares)),
    startCooldown: (caller) => mutate((ctx) => startCooldown(ctx, caller)),
    completeUnstake: (caller) => mutate((ctx) => completeUnstake(ctx, caller)),
    setCommitmentRoot: (caller, root) =>
      mutate((ctx) => setCommitmentRoot(ctx, caller, root)),
    claim: (caller, amount, proof) => mutate((ctx) => claim(ctx, caller, amount, proof)),

    getYield: (epoch, participant) => getYield(tables, deps.vault, epoch, participant),
    getBatch: (epoch) => peekBatch(tables, epoch),
    getBatchQueuedAmount: (epoch) => peekBatch(tables, epoch).queuedAmount,
    getBatchCooldownStart: (epoch) => peekBatch(tables, epoch).cooldownStartedAt,
    getDonor: (donor) => tables.donors.get(donor),
    getRecipient: (recipient) => tables.recipients.get(recipient),
    getShareEntry: (epoch, participant) => peekShareEntry(tables, epoch, participant),
    currentEpoch: () => tables.currentEpoch,
    stats: () => ({
      currentEpoch: tables.currentEpoch,
      totalDonationsGross: tables.totalDonationsGross,
      totalClaimed: tables.totalClaimed,
      commitmentRoot: tables.commitmentRoot,
      minimumBatchThreshold: deps.settings.minimumBatchThreshold,
    }),
  };
}

export type { LedgerSettings } from "./context.js";
export type { DonationReceipt } from "./participant-ledger.js";
export type { WithdrawalReceipt, CooldownReceipt, UnstakeReceipt } from "./epoch-batches.js";
export type { ClaimReceipt } from "./claim-gate.js";
export type {
  Batch,
  DonorRecord,
  RecipientRecord,
  ParticipantShareEntry,
} from "./state.js";
export {
  LedgerError,
  ValidationError,
  LifecycleError,
  AuthorizationError,
  type LedgerErrorCategory,
  type LedgerErrorCode,
  type ErrorDetail,
} from "./errors.js";
