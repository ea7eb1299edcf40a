/**
 * Share accountant: per-epoch share entries and signed yield.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ADMIN, COOLDOWN_MS, CREATOR, DONOR, createHarness, type Harness } from "./helpers.js";

describe("getYield", () => {
  let h: Harness;

  beforeEach(async () => {
    h = createHarness();
    h.token.mint(DONOR, 10_000n);
    // donor basis 665 / 665 shares, creator basis 285 / 285 shares
    await h.ledger.donate(DONOR, CREATOR, 1000n);
  });

  it("is zero while the share price is unchanged", async () => {
    expect(await h.ledger.getYield(0, DONOR)).toBe(0n);
    expect(await h.ledger.getYield(0, CREATOR)).toBe(0n);
  });

  it("is positive after the vault accrues", async () => {
    h.vault.accrue(95n); // 1045 assets / 950 shares

    expect(await h.ledger.getYield(0, DONOR)).toBe(66n); // floor(665 × 1045 / 950) = 731
    expect(await h.ledger.getYield(0, CREATOR)).toBe(28n); // 313 − 285
  });

  it("goes negative when the vault loses value", async () => {
    h.vault.slash(95n); // 855 assets / 950 shares

    expect(await h.ledger.getYield(0, DONOR)).toBe(-67n); // 598 − 665
    expect(await h.ledger.getYield(0, CREATOR)).toBe(-29n); // 256 − 285
  });

  it("is zero for unknown participants and epochs", async () => {
    expect(await h.ledger.getYield(0, ADMIN)).toBe(0n);
    expect(await h.ledger.getYield(7, DONOR)).toBe(0n);
    expect(h.ledger.getShareEntry(7, DONOR)).toBeUndefined();
  });

  it("does not change state", async () => {
    h.vault.accrue(95n);
    const before = h.ledger.getShareEntry(0, DONOR);

    await h.ledger.getYield(0, DONOR);
    await h.ledger.getYield(3, CREATOR);

    expect(h.ledger.getShareEntry(0, DONOR)).toEqual(before);
    expect(h.ledger.getShareEntry(3, CREATOR)).toBeUndefined();
    expect(h.events.getEventCount()).toBe(1);
  });

  it("keeps entries keyed by the epoch active at donation time", async () => {
    await h.ledger.queueWithdrawal(CREATOR, 285n);
    await h.ledger.donate(DONOR, CREATOR, 1000n);
    // second donation lands in epoch 0 too (epoch only moves on unstake)
    expect(h.ledger.getShareEntry(0, DONOR)?.yieldBasisAmount).toBe(1330n);

    const h2 = createHarness(100n);
    h2.token.mint(DONOR, 10_000n);
    await h2.ledger.donate(DONOR, CREATOR, 1000n);
    await h2.ledger.queueWithdrawal(CREATOR, 285n);
    await h2.ledger.startCooldown(ADMIN);
    h2.clock.now += COOLDOWN_MS;
    await h2.ledger.completeUnstake(ADMIN);
    await h2.ledger.donate(DONOR, CREATOR, 1000n);

    expect(h2.ledger.getShareEntry(0, DONOR)?.yieldBasisAmount).toBe(665n);
    expect(h2.ledger.getShareEntry(1, DONOR)?.yieldBasisAmount).toBe(665n);
  });
});
