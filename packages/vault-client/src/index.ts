/**
 * @givepool/vault-client: vault + settlement token abstraction.
 *
 * The ledger depends on VaultAdapter and TokenMover only.
 * Swap an on-chain adapter for MockVault / MockToken in tests and dev mode.
 */

export type {
  VaultAdapter,
  TokenMover,
  CooldownStatus,
  HolderId,
} from "./types.js";

export { MockToken, InsufficientFundsError } from "./mock-token.js";
export { MockVault, VaultError, type MockVaultOptions } from "./mock-vault.js";
