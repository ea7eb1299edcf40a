/**
 * Shared test harness: ledger over an in-memory token + vault with a
 * hand-driven clock.
 */

import { MockToken, MockVault } from "@givepool/vault-client";
import { EventLog } from "../src/event-log/writer.js";
import { createLedger, type DonationLedger } from "../src/ledger/index.js";

export const ADMIN = "ad".repeat(32);
export const DONOR = "d0".repeat(32);
export const DONOR_B = "d1".repeat(32);
export const CREATOR = "c0".repeat(32);
export const OPERATING = "fe".repeat(32);
export const CUSTODY = "cc".repeat(32);
export const VAULT = "ab".repeat(32);
export const COOLDOWN_MS = 1_000;
export const GENESIS_MS = 1_700_000_000_000;

export interface Harness {
  ledger: DonationLedger;
  token: MockToken;
  vault: MockVault;
  events: EventLog;
  clock: { now: number };
}

export function createHarness(minimumBatchThreshold: bigint = 500n): Harness {
  const clock = { now: GENESIS_MS };
  const now = () => clock.now;
  const token = new MockToken(CUSTODY);
  const vault = new MockVault(token, { address: VAULT, cooldownDurationMs: COOLDOWN_MS, now });
  const events = new EventLog();
  const ledger = createLedger({
    vault,
    tokens: token,
    events,
    settings: { administrator: ADMIN, operatingAddress: OPERATING, minimumBatchThreshold },
    now,
  });
  return { ledger, token, vault, events, clock };
}
