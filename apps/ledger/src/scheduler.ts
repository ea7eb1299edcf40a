/**
 * Batch scheduler: drives the withdrawal batch through its lifecycle.
 *
 * Each tick looks at the current epoch's batch:
 *   - Idle and queued ≥ minimum      → startCooldown
 *   - Cooldown and vault says matured → completeUnstake (epoch + 1)
 *   - otherwise                       → nothing
 *
 * Runs as the administrator. Ledger operations are serialized, so a tick
 * racing a manual admin call just fails with a lifecycle error (reported
 * through onError) and the next tick re-reads state.
 */

import type { ParticipantId } from "@givepool/protocol";
import type { VaultAdapter } from "@givepool/vault-client";
import type { CooldownReceipt, DonationLedger, UnstakeReceipt } from "./ledger/index.js";

export type BatchTransition =
  | { kind: "cooldown"; receipt: CooldownReceipt }
  | { kind: "unstake"; receipt: UnstakeReceipt };

export interface BatchSchedulerOptions {
  /** Administrator identity the scheduler acts as. */
  operator: ParticipantId;
  /** How often to check the batch (ms). Default: 60_000 (1 min). */
  checkIntervalMs?: number;
  now?: () => number;
  /** Callback for lifecycle transitions (for logging/monitoring). */
  onAdvance?: (transition: BatchTransition) => void;
  /** Callback for errors. */
  onError?: (error: unknown) => void;
}

export interface BatchScheduler {
  start(): void;
  stop(): void;
  /** Manually trigger a check (useful for testing). */
  tick(): Promise<BatchTransition | null>;
}

const DEFAULT_CHECK_INTERVAL_MS = 60_000;

export function createBatchScheduler(
  ledger: DonationLedger,
  vault: VaultAdapter,
  options: BatchSchedulerOptions,
): BatchScheduler {
  const checkIntervalMs = options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const onError = options.onError ?? ((err) => console.error("[scheduler] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;

  async function advance(): Promise<BatchTransition | null> {
    const batch = ledger.getBatch(ledger.currentEpoch());

    if (!batch.inCooldown) {
      const minimum = ledger.stats().minimumBatchThreshold;
      if (batch.queuedAmount === 0n || batch.queuedAmount < minimum) return null;
      const receipt = await ledger.startCooldown(options.operator);
      return { kind: "cooldown", receipt };
    }

    const status = await vault.cooldownStatus();
    if (!status || now() < status.maturesAt) return null;
    const receipt = await ledger.completeUnstake(options.operator);
    return { kind: "unstake", receipt };
  }

  async function tick(): Promise<BatchTransition | null> {
    try {
      const transition = await advance();
      if (transition && options.onAdvance) options.onAdvance(transition);
      return transition;
    } catch (err) {
      onError(err);
      return null;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(() => {
        void tick();
      }, checkIntervalMs);
      void tick();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,
  };
}
