/**
 * Participant ledger: donation split, records, transfers, events.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { VaultError } from "@givepool/vault-client";
import { DONATION_RECORDED_EVENT } from "../src/event-log/schemas.js";
import {
  createHarness,
  CREATOR,
  CUSTODY,
  DONOR,
  DONOR_B,
  OPERATING,
  VAULT,
  type Harness,
} from "./helpers.js";

describe("donate", () => {
  let h: Harness;

  beforeEach(() => {
    h = createHarness();
    h.token.mint(DONOR, 10_000n);
  });

  it("splits 1000 into fee 50, donor 665, creator 285", async () => {
    const receipt = await h.ledger.donate(DONOR, CREATOR, 1000n);

    expect(receipt.fee).toBe(50n);
    expect(receipt.net).toBe(950n);
    expect(receipt.donorPortion).toBe(665n);
    expect(receipt.recipientPortion).toBe(285n);
    expect(receipt.fee + receipt.donorPortion + receipt.recipientPortion).toBe(1000n);
  });

  it("credits donor and recipient records", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);

    expect(h.ledger.getDonor(DONOR)).toEqual({
      totalGross: 1000n,
      netContributed: 950n,
      totalShares: 665n,
      lastClaimedAt: null,
    });
    expect(h.ledger.getRecipient(CREATOR)).toEqual({
      totalReceived: 950n,
      claimableShares: 285n,
      lastClaimedAt: null,
    });
    expect(h.ledger.stats().totalDonationsGross).toBe(1000n);
  });

  it("accumulates across donations", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);
    await h.ledger.donate(DONOR, CREATOR, 1000n);

    expect(h.ledger.getDonor(DONOR)?.totalGross).toBe(2000n);
    expect(h.ledger.getDonor(DONOR)?.totalShares).toBe(1330n);
    expect(h.ledger.getRecipient(CREATOR)?.claimableShares).toBe(570n);
  });

  it("records both sides against the current epoch", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);

    expect(h.ledger.getShareEntry(0, DONOR)).toEqual({
      shares: 665n,
      claimedAmount: 0n,
      yieldBasisAmount: 665n,
      claimed: false,
    });
    expect(h.ledger.getShareEntry(0, CREATOR)).toEqual({
      shares: 285n,
      claimedAmount: 0n,
      yieldBasisAmount: 285n,
      claimed: false,
    });
  });

  it("moves gross from donor, fee to operations, net into the vault", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);

    expect(h.token.holding(DONOR)).toBe(9_000n);
    expect(h.token.holding(OPERATING)).toBe(50n);
    expect(h.token.holding(VAULT)).toBe(950n);
    expect(h.token.holding(CUSTODY)).toBe(0n);
    expect(h.vault.shareSupply()).toBe(950n);
  });

  it("recipient shares are net shares minus donor shares after the price moves", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);
    h.vault.accrue(950n); // price 2 assets/share

    const receipt = await h.ledger.donate(DONOR, CREATOR, 1000n);

    // donor 665 → floor(665 × 950 / 1900) = 332; net 950 → 475
    expect(receipt.donorShares).toBe(332n);
    expect(receipt.recipientShares).toBe(143n);
    expect(receipt.donorShares + receipt.recipientShares).toBe(475n);
  });

  it("small gross: fee rounds to zero, creator absorbs remainder", async () => {
    const receipt = await h.ledger.donate(DONOR, CREATOR, 19n);

    expect(receipt.fee).toBe(0n);
    expect(receipt.donorPortion).toBe(13n); // floor(19 × 0.7)
    expect(receipt.recipientPortion).toBe(6n);
    expect(h.token.holding(OPERATING)).toBe(0n);
  });

  it("rejects zero with amount_zero and changes nothing", async () => {
    await expect(h.ledger.donate(DONOR, CREATOR, 0n)).rejects.toMatchObject({
      category: "validation",
      code: "amount_zero",
    });
    expect(h.ledger.getDonor(DONOR)).toBeUndefined();
    expect(h.events.getEventCount()).toBe(0);
  });

  it("rejects when donor balance is short", async () => {
    await expect(h.ledger.donate(DONOR_B, CREATOR, 1n)).rejects.toMatchObject({
      code: "insufficient_balance",
      detail: { holder: DONOR_B, available: 0n, requested: 1n },
    });
    expect(h.ledger.getRecipient(CREATOR)).toBeUndefined();
    expect(h.ledger.stats().totalDonationsGross).toBe(0n);
  });

  it("emits a donation event with amounts as strings", async () => {
    await h.ledger.donate(DONOR, CREATOR, 1000n);

    const [event] = h.events.getEventsByType(DONATION_RECORDED_EVENT);
    expect(event?.payload).toEqual({
      donor: DONOR,
      recipient: CREATOR,
      epoch: 0,
      gross: "1000",
      net: "950",
      fee: "50",
      donor_shares: "665",
      recipient_shares: "285",
    });
    expect(event?.timestamp).toBe(h.clock.now);
    expect(event?.id).toMatch(/^[0-9a-f]{64}$/);
  });

  it("serializes concurrent donations against the same balance", async () => {
    const h2 = createHarness();
    h2.token.mint(DONOR, 1_500n);

    const results = await Promise.allSettled([
      h2.ledger.donate(DONOR, CREATOR, 1000n),
      h2.ledger.donate(DONOR, CREATOR, 1000n),
    ]);

    expect(results[0]?.status).toBe("fulfilled");
    expect(results[1]).toMatchObject({
      status: "rejected",
      reason: { code: "insufficient_balance", detail: { available: 500n } },
    });
    expect(h2.ledger.getDonor(DONOR)?.totalGross).toBe(1000n);
  });

  describe("when a transfer fails", () => {
    it("reverses the gross and the fee when the vault deposit fails", async () => {
      vi.spyOn(h.vault, "deposit").mockRejectedValueOnce(new VaultError("vault paused"));

      await expect(h.ledger.donate(DONOR, CREATOR, 1000n)).rejects.toBeInstanceOf(VaultError);

      expect(h.token.holding(DONOR)).toBe(10_000n);
      expect(h.token.holding(CUSTODY)).toBe(0n);
      expect(h.token.holding(OPERATING)).toBe(0n);
      expect(h.token.holding(VAULT)).toBe(0n);
      expect(h.vault.shareSupply()).toBe(0n);
      expect(h.ledger.getDonor(DONOR)).toBeUndefined();
      expect(h.ledger.getRecipient(CREATOR)).toBeUndefined();
      expect(h.ledger.getShareEntry(0, DONOR)).toBeUndefined();
      expect(h.ledger.stats().totalDonationsGross).toBe(0n);
      expect(h.events.getEventCount()).toBe(0);
    });

    it("returns the gross to the donor when the fee transfer fails", async () => {
      vi.spyOn(h.token, "transfer").mockRejectedValueOnce(new Error("token paused"));

      await expect(h.ledger.donate(DONOR, CREATOR, 1000n)).rejects.toThrow("token paused");

      expect(h.token.holding(DONOR)).toBe(10_000n);
      expect(h.token.holding(CUSTODY)).toBe(0n);
      expect(h.token.holding(OPERATING)).toBe(0n);
      expect(h.ledger.getDonor(DONOR)).toBeUndefined();
    });

    it("accepts the next donation after a reversed one", async () => {
      vi.spyOn(h.vault, "deposit").mockRejectedValueOnce(new VaultError("vault paused"));
      await expect(h.ledger.donate(DONOR, CREATOR, 1000n)).rejects.toBeInstanceOf(VaultError);

      await h.ledger.donate(DONOR, CREATOR, 1000n);

      expect(h.token.holding(DONOR)).toBe(9_000n);
      expect(h.token.holding(OPERATING)).toBe(50n);
      expect(h.token.holding(VAULT)).toBe(950n);
      expect(h.ledger.getDonor(DONOR)?.totalGross).toBe(1000n);
      expect(h.events.getEventCount()).toBe(1);
    });
  });

  describe("reads during a donation", () => {
    /** Holds the donor's transferFrom until release() is called. */
    function holdTransferFrom(fail = false) {
      let release: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const spy = vi.spyOn(h.token, "transferFrom").mockImplementationOnce(async (from, amount) => {
        await gate;
        if (fail) throw new Error("token paused");
        h.token.move(from, CUSTODY, amount);
      });
      return { spy, release: () => release() };
    }

    it("see nothing until the donation commits", async () => {
      const held = holdTransferFrom();

      const pending = h.ledger.donate(DONOR, CREATOR, 1000n);
      await vi.waitFor(() => expect(held.spy).toHaveBeenCalled());

      expect(h.ledger.getDonor(DONOR)).toBeUndefined();
      expect(h.ledger.getRecipient(CREATOR)).toBeUndefined();
      expect(h.ledger.getShareEntry(0, CREATOR)).toBeUndefined();
      expect(h.ledger.stats().totalDonationsGross).toBe(0n);

      held.release();
      await pending;

      expect(h.ledger.getRecipient(CREATOR)?.claimableShares).toBe(285n);
      expect(h.ledger.stats().totalDonationsGross).toBe(1000n);
    });

    it("see the previous totals while a second donation is in flight", async () => {
      await h.ledger.donate(DONOR, CREATOR, 1000n);
      const before = h.ledger.getDonor(DONOR);
      const held = holdTransferFrom();

      const pending = h.ledger.donate(DONOR, CREATOR, 1000n);
      await vi.waitFor(() => expect(held.spy).toHaveBeenCalled());

      expect(h.ledger.getDonor(DONOR)?.totalGross).toBe(1000n);
      expect(h.ledger.getShareEntry(0, DONOR)?.shares).toBe(665n);

      held.release();
      await pending;

      expect(h.ledger.getDonor(DONOR)?.totalGross).toBe(2000n);
      expect(before?.totalGross).toBe(1000n);
    });

    it("never see a donation that fails", async () => {
      const held = holdTransferFrom(true);

      const pending = h.ledger.donate(DONOR, CREATOR, 1000n);
      await vi.waitFor(() => expect(held.spy).toHaveBeenCalled());
      held.release();

      await expect(pending).rejects.toThrow("token paused");
      expect(h.ledger.getRecipient(CREATOR)).toBeUndefined();
      expect(h.ledger.stats().totalDonationsGross).toBe(0n);
      expect(h.token.holding(DONOR)).toBe(10_000n);
    });
  });
});
