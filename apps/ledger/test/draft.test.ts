/**
 * Ledger draft: copy-on-write overlay over the committed tables.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { LedgerDraft } from "../src/ledger/draft.js";
import { createLedgerTables, peekShareEntry, type LedgerTables } from "../src/ledger/state.js";
import { CREATOR, DONOR, DONOR_B } from "./helpers.js";

describe("LedgerDraft", () => {
  let tables: LedgerTables;

  beforeEach(() => {
    tables = createLedgerTables();
    tables.donors.set(DONOR, { totalGross: 100n, netContributed: 95n, totalShares: 66n, lastClaimedAt: null });
    tables.donors.set(DONOR_B, { totalGross: 7n, netContributed: 7n, totalShares: 4n, lastClaimedAt: null });
  });

  it("writes stay out of the tables until commit", () => {
    const draft = new LedgerDraft(tables);
    draft.donorAt(DONOR).totalGross += 50n;
    draft.recipientAt(CREATOR).claimableShares += 10n;
    draft.shareEntryAt(0, CREATOR).shares += 10n;
    draft.totalDonationsGross += 50n;

    expect(tables.donors.get(DONOR)?.totalGross).toBe(100n);
    expect(tables.recipients.has(CREATOR)).toBe(false);
    expect(peekShareEntry(tables, 0, CREATOR)).toBeUndefined();
    expect(tables.totalDonationsGross).toBe(0n);

    draft.commit();

    expect(tables.donors.get(DONOR)?.totalGross).toBe(150n);
    expect(tables.recipients.get(CREATOR)?.claimableShares).toBe(10n);
    expect(peekShareEntry(tables, 0, CREATOR)?.shares).toBe(10n);
    expect(tables.totalDonationsGross).toBe(50n);
  });

  it("a dropped draft leaves the tables as they were", () => {
    const draft = new LedgerDraft(tables);
    draft.donorAt(DONOR).totalGross = 0n;
    draft.currentEpoch = 3;

    expect(tables.donors.get(DONOR)?.totalGross).toBe(100n);
    expect(tables.currentEpoch).toBe(0);
  });

  it("only copies the rows it touches", () => {
    const untouched = tables.donors.get(DONOR_B);
    const replaced = tables.donors.get(DONOR);

    const draft = new LedgerDraft(tables);
    draft.donorAt(DONOR).totalShares += 1n;
    draft.commit();

    expect(tables.donors.get(DONOR_B)).toBe(untouched);
    expect(tables.donors.get(DONOR)).not.toBe(replaced);
    expect(replaced?.totalShares).toBe(66n);
  });

  it("find* returns undefined without creating a row", () => {
    const draft = new LedgerDraft(tables);

    expect(draft.findDonor(CREATOR)).toBeUndefined();
    expect(draft.findRecipient(CREATOR)).toBeUndefined();
    draft.commit();

    expect(tables.donors.has(CREATOR)).toBe(false);
    expect(tables.recipients.has(CREATOR)).toBe(false);
  });

  it("peekShareEntry sees the draft's own writes", () => {
    const draft = new LedgerDraft(tables);
    draft.shareEntryAt(2, DONOR).claimed = true;

    expect(draft.peekShareEntry(2, DONOR)?.claimed).toBe(true);
    expect(peekShareEntry(tables, 2, DONOR)).toBeUndefined();
  });
});
