/**
 * Ledger error taxonomy.
 *
 *   validation    caller input (amount_zero, insufficient_balance, invalid_root)
 *   lifecycle     administrative precondition not met yet
 *   authorization claim integrity or caller not allowed
 *
 * Every error is raised before the operation commits; the ledger state is
 * untouched when one surfaces. Nothing is retried automatically.
 */

export type LedgerErrorCategory = "validation" | "lifecycle" | "authorization";

export type LedgerErrorCode =
  | "amount_zero"
  | "insufficient_balance"
  | "invalid_root"
  | "batch_minimum_not_reached"
  | "cooldown_already_started"
  | "already_claimed"
  | "invalid_proof"
  | "not_administrator";

export type ErrorDetail = Record<string, string | number | bigint | null>;

export class LedgerError extends Error {
  constructor(
    readonly category: LedgerErrorCategory,
    readonly code: LedgerErrorCode,
    message: string,
    readonly detail: ErrorDetail = {},
  ) {
    super(message);
    this.name = "LedgerError";
  }
}

export class ValidationError extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, detail?: ErrorDetail) {
    super("validation", code, message, detail);
    this.name = "ValidationError";
  }
}

export class LifecycleError extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, detail?: ErrorDetail) {
    super("lifecycle", code, message, detail);
    this.name = "LifecycleError";
  }
}

export class AuthorizationError extends LedgerError {
  constructor(code: LedgerErrorCode, message: string, detail?: ErrorDetail) {
    super("authorization", code, message, detail);
    this.name = "AuthorizationError";
  }
}

// ── Constructors ───────────────────────────────────────────────────

export function amountZero(field: string): ValidationError {
  return new ValidationError("amount_zero", `${field} must be greater than zero`, { field });
}

export function insufficientBalance(
  holder: string,
  available: bigint,
  requested: bigint,
): ValidationError {
  return new ValidationError(
    "insufficient_balance",
    `${holder.slice(0, 12)}… has ${available}, requested ${requested}`,
    { holder, available, requested },
  );
}

export function invalidRoot(root: string): ValidationError {
  return new ValidationError("invalid_root", "commitment root must be 64 hex chars", { root });
}

export function batchMinimumNotReached(
  epoch: number,
  queued: bigint,
  minimum: bigint,
): LifecycleError {
  return new LifecycleError(
    "batch_minimum_not_reached",
    `batch ${epoch} has ${queued} queued, minimum is ${minimum}`,
    { epoch, queued, minimum },
  );
}

export function cooldownAlreadyStarted(epoch: number): LifecycleError {
  return new LifecycleError(
    "cooldown_already_started",
    `batch ${epoch} is already in cooldown`,
    { epoch },
  );
}

export function alreadyClaimed(epoch: number, participant: string): AuthorizationError {
  return new AuthorizationError(
    "already_claimed",
    `${participant.slice(0, 12)}… already claimed in epoch ${epoch}`,
    { epoch, participant },
  );
}

export function invalidProof(participant: string, amount: bigint): AuthorizationError {
  return new AuthorizationError(
    "invalid_proof",
    `proof does not match the commitment root for ${participant.slice(0, 12)}…`,
    { participant, amount },
  );
}

export function notAdministrator(caller: string): AuthorizationError {
  return new AuthorizationError(
    "not_administrator",
    `${caller.slice(0, 12)}… is not the ledger administrator`,
    { caller },
  );
}
