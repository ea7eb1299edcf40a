/**
 * Signed request envelopes for mutating ledger operations.
 *
 * sig = Ed25519(signer, canonical(payload)). Every payload carries the
 * client's timestamp (ms) so the ledger can refuse stale requests.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { AmountString, Hex32 } from "./common.js";

const Timestamp = Type.Integer({ minimum: 0 });

export const MerkleProofStepV1 = Type.Object(
  {
    hash: Hex32,
    position: Type.Union([Type.Literal("left"), Type.Literal("right")]),
  },
  { additionalProperties: false },
);

export type MerkleProofStepV1 = Static<typeof MerkleProofStepV1>;

export const DonatePayload = Type.Object(
  {
    recipient: Hex32,
    amount: AmountString,
    timestamp: Timestamp,
  },
  { additionalProperties: false },
);

export type DonatePayload = Static<typeof DonatePayload>;

export const WithdrawalPayload = Type.Object(
  {
    shares: AmountString,
    timestamp: Timestamp,
  },
  { additionalProperties: false },
);

export type WithdrawalPayload = Static<typeof WithdrawalPayload>;

export const ClaimPayload = Type.Object(
  {
    amount: AmountString,
    proof: Type.Array(MerkleProofStepV1, { maxItems: 256 }),
    timestamp: Timestamp,
  },
  { additionalProperties: false },
);

export type ClaimPayload = Static<typeof ClaimPayload>;

/** Administrator operations with no arguments (cooldown, unstake). */
export const AdminPayload = Type.Object(
  { timestamp: Timestamp },
  { additionalProperties: false },
);

export type AdminPayload = Static<typeof AdminPayload>;

export const CommitmentRootPayload = Type.Object(
  {
    root: Hex32,
    timestamp: Timestamp,
  },
  { additionalProperties: false },
);

export type CommitmentRootPayload = Static<typeof CommitmentRootPayload>;

/** Envelope schema for a given payload schema. */
export function SignedRequest<T extends TSchema>(payload: T) {
  return Type.Object(
    {
      signer: Hex32,
      /** Canonical base64 of a 64-byte Ed25519 signature. */
      sig: Type.String({ pattern: "^[A-Za-z0-9+/]{86}==$" }),
      payload,
    },
    { additionalProperties: false },
  );
}

export interface SignedRequestV1<P> {
  signer: string;
  sig: string;
  payload: P;
}
