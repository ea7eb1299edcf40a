/**
 * Collaborator interfaces: the yield vault and the settlement token.
 *
 * The ledger never touches balances or vault shares directly; it goes
 * through these two interfaces so the on-chain (or simulated) impl can swap.
 * All amounts are integer base units.
 */

/** Holder identity in the token system (64-char hex). */
export type HolderId = string;

export interface CooldownStatus {
  /** Shares currently cooling down. */
  shares: bigint;
  /** Assets the cooled shares will release on unstake. */
  assets: bigint;
  /** Time (ms) at which unstake becomes possible. */
  maturesAt: number;
}

/**
 * Yield-bearing vault holding the reserve.
 * Shares are owned by the ledger's custody account.
 */
export interface VaultAdapter {
  /** Deposit assets from ledger custody; returns shares minted. */
  deposit(assets: bigint): Promise<bigint>;
  /** Shares that `assets` would mint right now (rounded down). */
  convertToShares(assets: bigint): Promise<bigint>;
  /** Assets that redeeming `shares` would yield right now (rounded down). */
  previewRedeem(shares: bigint): Promise<bigint>;
  /** Begin the cooldown for `shares`; returns the assets locked. */
  cooldownShares(shares: bigint): Promise<bigint>;
  /** Current cooldown, or null if nothing is cooling. */
  cooldownStatus(): Promise<CooldownStatus | null>;
  /** Release matured cooldown assets into ledger custody; returns assets. */
  unstake(): Promise<bigint>;
}

/**
 * Settlement-currency transfers, scoped to the ledger's custody account.
 */
export interface TokenMover {
  balanceOf(holder: HolderId): Promise<bigint>;
  /** Move `amount` from ledger custody to `to`. */
  transfer(to: HolderId, amount: bigint): Promise<void>;
  /** Pull `amount` from `from` into ledger custody (caller-approved). */
  transferFrom(from: HolderId, amount: bigint): Promise<void>;
}
