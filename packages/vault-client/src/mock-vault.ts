/**
 * In-memory yield vault.
 *
 * Share price = totalAssets / totalShares, where totalAssets is the vault
 * account's token balance minus assets already cooling down. accrue() and
 * slash() move the price for tests. Cooldowns accumulate and restart the
 * maturity clock, and unstake() refuses until they mature.
 */

import type { MockToken } from "./mock-token.js";
import type { CooldownStatus, HolderId, VaultAdapter } from "./types.js";

export class VaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultError";
  }
}

export interface MockVaultOptions {
  /** Token account holding the vault's assets. */
  address: HolderId;
  cooldownDurationMs: number;
  now?: () => number;
}

export class MockVault implements VaultAdapter {
  private totalShares = 0n;
  private cooling: CooldownStatus | null = null;
  private readonly address: HolderId;
  private readonly cooldownDurationMs: number;
  private readonly now: () => number;

  constructor(
    private readonly token: MockToken,
    opts: MockVaultOptions,
  ) {
    this.address = opts.address;
    this.cooldownDurationMs = opts.cooldownDurationMs;
    this.now = opts.now ?? Date.now;
  }

  private totalAssets(): bigint {
    return this.token.holding(this.address) - (this.cooling?.assets ?? 0n);
  }

  private toShares(assets: bigint): bigint {
    const total = this.totalAssets();
    if (this.totalShares === 0n || total <= 0n) return assets;
    return (assets * this.totalShares) / total;
  }

  private toAssets(shares: bigint): bigint {
    if (this.totalShares === 0n) return 0n;
    const total = this.totalAssets();
    if (total <= 0n) return 0n;
    return (shares * total) / this.totalShares;
  }

  async deposit(assets: bigint): Promise<bigint> {
    if (assets <= 0n) throw new VaultError(`deposit: amount must be positive`);
    const shares = this.toShares(assets);
    this.token.move(this.token.custody, this.address, assets);
    this.totalShares += shares;
    return shares;
  }

  async convertToShares(assets: bigint): Promise<bigint> {
    return this.toShares(assets);
  }

  async previewRedeem(shares: bigint): Promise<bigint> {
    return this.toAssets(shares);
  }

  async cooldownShares(shares: bigint): Promise<bigint> {
    if (shares <= 0n) throw new VaultError(`cooldown: amount must be positive`);
    if (shares > this.totalShares) {
      throw new VaultError(`cooldown: ${shares} shares exceeds supply ${this.totalShares}`);
    }
    const assets = this.toAssets(shares);
    this.totalShares -= shares;
    this.cooling = {
      shares: (this.cooling?.shares ?? 0n) + shares,
      assets: (this.cooling?.assets ?? 0n) + assets,
      maturesAt: this.now() + this.cooldownDurationMs,
    };
    return assets;
  }

  async cooldownStatus(): Promise<CooldownStatus | null> {
    return this.cooling ? { ...this.cooling } : null;
  }

  async unstake(): Promise<bigint> {
    const cooling = this.cooling;
    if (!cooling) throw new VaultError("unstake: nothing in cooldown");
    if (this.now() < cooling.maturesAt) {
      throw new VaultError(`unstake: cooldown matures at ${cooling.maturesAt}`);
    }
    this.token.move(this.address, this.token.custody, cooling.assets);
    this.cooling = null;
    return cooling.assets;
  }

  /** Test helper: add yield to the vault (share price rises). */
  accrue(assets: bigint): void {
    this.token.mint(this.address, assets);
  }

  /** Test helper: lose assets (share price falls). */
  slash(assets: bigint): void {
    this.token.burn(this.address, assets);
  }

  /** Test helper: outstanding (non-cooling) share supply. */
  shareSupply(): bigint {
    return this.totalShares;
  }
}
