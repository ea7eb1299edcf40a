/**
 * Frozen protocol constants.
 *
 * FROZEN constants never change: a change is a new ledger, not a migration.
 * TUNABLE defaults may be overridden through ledger config.
 */

// ── Donation split (frozen, no setter) ─────────────────────────────
// fee     = floor(gross × FEE_RATE_PCT / 100)
// donor   = floor((gross − fee) × DONOR_RATE_PCT / 100)
// creator = (gross − fee) − donor   (absorbs truncation remainder)
export const RATE_BASE_PCT = 100n;
export const FEE_RATE_PCT = 5n;
export const DONOR_RATE_PCT = 70n;

// ── Claim leaf encoding (frozen) ───────────────────────────────────
export const PARTICIPANT_ID_BYTES = 32; // Ed25519 public key
export const CLAIM_AMOUNT_BYTES = 32; // uint256, big-endian
export const MAX_CLAIM_AMOUNT = 2n ** 256n - 1n;

// ── Tunable defaults ───────────────────────────────────────────────
export const MIN_BATCH_SHARES_DEFAULT = 500n;
export const COOLDOWN_DURATION_MS_DEFAULT = 7 * 24 * 60 * 60_000; // 7 days
export const REQUEST_MAX_AGE_MS_DEFAULT = 5 * 60_000; // 5 minutes
