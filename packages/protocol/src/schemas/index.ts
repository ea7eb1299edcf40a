/**
 * Schema barrel export.
 * All V1 wire types used across the ledger.
 */

export { AmountString } from "./common.js";

export {
  MerkleProofStepV1,
  DonatePayload,
  WithdrawalPayload,
  ClaimPayload,
  AdminPayload,
  CommitmentRootPayload,
  SignedRequest,
  type SignedRequestV1,
} from "./request.js";

export {
  DonorRecordV1,
  RecipientRecordV1,
  BatchV1,
  ShareEntryV1,
  LedgerStatsV1,
} from "./records.js";
