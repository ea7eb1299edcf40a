/**
 * Donation fee split.
 *
 *   fee              = floor(gross × 5 / 100)
 *   net              = gross − fee
 *   donorPortion     = floor(net × 70 / 100)
 *   recipientPortion = net − donorPortion
 *
 * Truncation is rounded down and never refunded; the recipient portion
 * absorbs the remainder, so fee + donorPortion + recipientPortion == gross.
 */

import { FEE_RATE_PCT, DONOR_RATE_PCT, RATE_BASE_PCT } from "./constants.js";

export interface DonationSplit {
  gross: bigint;
  fee: bigint;
  net: bigint;
  /** Donor yield basis, settlement-currency units. */
  donorPortion: bigint;
  /** Recipient yield basis, settlement-currency units. */
  recipientPortion: bigint;
}

/**
 * Split a gross donation. Non-positive amounts split to all zeros;
 * the ledger rejects them before calling this.
 */
export function splitDonation(gross: bigint): DonationSplit {
  if (gross <= 0n) {
    return { gross: 0n, fee: 0n, net: 0n, donorPortion: 0n, recipientPortion: 0n };
  }
  const fee = (gross * FEE_RATE_PCT) / RATE_BASE_PCT;
  const net = gross - fee;
  const donorPortion = (net * DONOR_RATE_PCT) / RATE_BASE_PCT;
  return { gross, fee, net, donorPortion, recipientPortion: net - donorPortion };
}

/**
 * Split a share amount the same way the currency was split.
 * `netShares` and `donorShares` come from the vault's own conversion, so the
 * recipient side is a difference, never a second conversion.
 */
export function recipientShares(netShares: bigint, donorShares: bigint): bigint {
  const shares = netShares - donorShares;
  return shares > 0n ? shares : 0n;
}
