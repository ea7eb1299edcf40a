/**
 * Event log schemas: append-only ledger events.
 *
 * Every committed mutation appends one event. Records and counters can be
 * audited by replaying the log; nothing is ever rewritten.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const EventPayload = Type.Record(
  Type.String(),
  Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()]),
);

export type EventPayload = Static<typeof EventPayload>;

/** Envelope for all ledger events. */
export const LedgerEvent = Type.Object({
  /** Monotonic sequence number within the log. */
  seq: Type.Integer({ minimum: 0 }),
  /** SHA256(canonical({ seq, type, timestamp, payload })). */
  id: Hex32,
  /** Event type discriminator. */
  type: Type.String(),
  /** Commit time (ms since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
  payload: EventPayload,
});

export type LedgerEvent = Static<typeof LedgerEvent>;

export const EventQuery = Type.Object(
  {
    type: Type.Optional(Type.String({ maxLength: 64 })),
    from: Type.Optional(Type.Integer({ minimum: 0 })),
  },
  { additionalProperties: false },
);

export type EventQuery = Static<typeof EventQuery>;

// ── Event types ────────────────────────────────────────────────────

export const DONATION_RECORDED_EVENT = "donation.recorded.v1" as const;
export const WITHDRAWAL_QUEUED_EVENT = "withdrawal.queued.v1" as const;
export const CLAIM_PAID_EVENT = "claim.paid.v1" as const;
export const BATCH_COOLDOWN_EVENT = "batch.cooldown.v1" as const;
export const BATCH_UNSTAKED_EVENT = "batch.unstaked.v1" as const;
export const COMMITMENT_ROOT_EVENT = "commitment.root.v1" as const;
