/**
 * Wire views of ledger records. Amounts are decimal strings.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AmountString, Hex32 } from "./common.js";

const Timestamp = Type.Union([Type.Integer({ minimum: 0 }), Type.Null()]);

export const DonorRecordV1 = Type.Object(
  {
    donor: Hex32,
    total_gross: AmountString,
    net_contributed: AmountString,
    total_shares: AmountString,
    last_claimed_at: Timestamp,
  },
  { additionalProperties: false },
);

export type DonorRecordV1 = Static<typeof DonorRecordV1>;

export const RecipientRecordV1 = Type.Object(
  {
    recipient: Hex32,
    total_received: AmountString,
    claimable_shares: AmountString,
    last_claimed_at: Timestamp,
  },
  { additionalProperties: false },
);

export type RecipientRecordV1 = Static<typeof RecipientRecordV1>;

export const BatchV1 = Type.Object(
  {
    epoch: Type.Integer({ minimum: 0 }),
    queued_amount: AmountString,
    cooldown_started_at: Timestamp,
    in_cooldown: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type BatchV1 = Static<typeof BatchV1>;

export const ShareEntryV1 = Type.Object(
  {
    epoch: Type.Integer({ minimum: 0 }),
    participant: Hex32,
    shares: AmountString,
    claimed_amount: AmountString,
    yield_basis_amount: AmountString,
    claimed: Type.Boolean(),
  },
  { additionalProperties: false },
);

export type ShareEntryV1 = Static<typeof ShareEntryV1>;

export const LedgerStatsV1 = Type.Object(
  {
    current_epoch: Type.Integer({ minimum: 0 }),
    total_donations_gross: AmountString,
    total_claimed: AmountString,
    commitment_root: Type.Union([Hex32, Type.Null()]),
    minimum_batch_threshold: AmountString,
  },
  { additionalProperties: false },
);

export type LedgerStatsV1 = Static<typeof LedgerStatsV1>;
