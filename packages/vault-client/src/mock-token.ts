/**
 * In-memory settlement token.
 *
 * Balances live in a Map. Use mint() to fund accounts in tests and dev mode.
 * Share one instance between the ledger and a MockVault so both see the
 * same balances.
 */

import type { HolderId, TokenMover } from "./types.js";

export class InsufficientFundsError extends Error {
  constructor(
    readonly holder: HolderId,
    readonly balance: bigint,
    readonly requested: bigint,
  ) {
    super(`MockToken: ${holder.slice(0, 12)}… has ${balance}, needs ${requested}`);
    this.name = "InsufficientFundsError";
  }
}

export class MockToken implements TokenMover {
  private readonly balances = new Map<HolderId, bigint>();

  constructor(readonly custody: HolderId) {}

  async balanceOf(holder: HolderId): Promise<bigint> {
    return this.holding(holder);
  }

  /** Synchronous balance read for in-process collaborators. */
  holding(holder: HolderId): bigint {
    return this.balances.get(holder) ?? 0n;
  }

  async transfer(to: HolderId, amount: bigint): Promise<void> {
    this.move(this.custody, to, amount);
  }

  async transferFrom(from: HolderId, amount: bigint): Promise<void> {
    this.move(from, this.custody, amount);
  }

  /** Move between any two holders. Used by MockVault for its own account. */
  move(from: HolderId, to: HolderId, amount: bigint): void {
    if (amount < 0n) throw new RangeError(`MockToken: negative amount ${amount}`);
    const balance = this.holding(from);
    if (balance < amount) throw new InsufficientFundsError(from, balance, amount);
    this.balances.set(from, balance - amount);
    this.balances.set(to, this.holding(to) + amount);
  }

  /** Test helper: create tokens out of thin air. */
  mint(holder: HolderId, amount: bigint): void {
    this.balances.set(holder, this.holding(holder) + amount);
  }

  /** Test helper: destroy tokens (simulate a vault loss). */
  burn(holder: HolderId, amount: bigint): void {
    this.move(holder, BURN_ADDRESS, amount);
  }
}

const BURN_ADDRESS: HolderId = "0".repeat(64);
