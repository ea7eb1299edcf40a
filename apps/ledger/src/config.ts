/**
 * Ledger configuration.
 */

import {
  COOLDOWN_DURATION_MS_DEFAULT,
  MIN_BATCH_SHARES_DEFAULT,
  REQUEST_MAX_AGE_MS_DEFAULT,
} from "@givepool/protocol";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

function bigintEnv(key: string, fallback: bigint): bigint {
  const raw = env(key, fallback.toString());
  if (!/^[0-9]+$/.test(raw)) throw new Error(`Invalid env ${key}: expected a non-negative integer`);
  return BigInt(raw);
}

export const config = {
  port: parseInt(env("LEDGER_PORT", "3110"), 10),
  host: env("LEDGER_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Hex Ed25519 pubkey allowed to run batch + root operations. Empty = none. */
  adminPubkey: env("ADMIN_PUBKEY", ""),
  /** Receives the 5% operating fee. */
  operatingAddress: env("OPERATING_ADDRESS", "fe".repeat(32)),
  /** Ledger custody account in the settlement token. */
  custodyAddress: env("CUSTODY_ADDRESS", "cc".repeat(32)),
  /** Dev-mode vault account. */
  vaultAddress: env("VAULT_ADDRESS", "ab".repeat(32)),
  minBatchShares: bigintEnv("MIN_BATCH_SHARES", MIN_BATCH_SHARES_DEFAULT),
  cooldownDurationMs: parseInt(env("COOLDOWN_DURATION_MS", String(COOLDOWN_DURATION_MS_DEFAULT)), 10),
  /** Batch scheduler check interval (ms). 0 = disabled. Default: 60000. */
  batchSchedulerIntervalMs: parseInt(env("BATCH_SCHEDULER_INTERVAL_MS", "60000"), 10),
  /** Signed requests older (or newer) than this are refused. */
  requestMaxAgeMs: parseInt(env("REQUEST_MAX_AGE_MS", String(REQUEST_MAX_AGE_MS_DEFAULT)), 10),
} as const;
