/**
 * @givepool/protocol: frozen ledger primitives.
 *
 * This package contains ONLY frozen arithmetic, commitments and versioned
 * schemas. It has no business logic, no I/O, no state.
 * Everything else in the monorepo imports from here, never the reverse.
 */

// Frozen primitives
export { canonicalEncode } from "./canonical.js";
export {
  digestObject,
  fromHex,
  toHex,
  isHex32,
  type Hex32,
  type ParticipantId,
} from "./hex.js";
export {
  merkleRoot,
  merkleProof,
  verifyMerkleProof,
  type MerkleProof,
  type MerkleProofStep,
} from "./merkle.js";

// Donation split
export { splitDonation, recipientShares, type DonationSplit } from "./fee-split.js";

// Claim commitments (leaf, verification, distribution tree)
export {
  claimLeaf,
  verifyClaim,
  buildClaimTree,
  type Entitlement,
  type ClaimTree,
} from "./claim-leaf.js";

// Ed25519 sign/verify (request signatures, key generation)
export {
  generateKeypair,
  ed25519Sign,
  ed25519Verify,
  type Ed25519Keypair,
} from "./ed25519.js";

// Request signature (sign/verify canonical-encoded payloads)
export {
  signRequestPayload,
  verifyRequestSignature,
  decodeSignature,
} from "./request-signature.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
