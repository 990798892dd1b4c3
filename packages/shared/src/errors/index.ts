/**
 * Vault error taxonomy
 *
 * Every error aborts the current unit of work. Callers (scheduler, trader,
 * administrator) branch on `kind` to decide whether and when to retry.
 */

export type VaultErrorKind =
  | "InvalidAddress"
  | "InvalidAmount"
  | "InvalidConfig"
  | "Unauthorized"
  | "AlreadySet"
  | "NotPaused"
  | "TransferFailed"
  | "InsufficientOutput"
  | "InsufficientBalance"
  | "TradeBlocked"
  | "DuplicateVault"
  | "PoolAlreadyExists"
  | "PoolNotFound"
  | "VaultNotFound";

export class VaultError extends Error {
  constructor(
    public readonly kind: VaultErrorKind,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "VaultError";
  }
}

export class InvalidAddressError extends VaultError {
  constructor(public readonly field: string, value: string) {
    super("InvalidAddress", `Invalid address for ${field}: ${value}`, { field, value });
    this.name = "InvalidAddressError";
  }
}

export class InvalidAmountError extends VaultError {
  constructor(public readonly field: string, public readonly amount: bigint) {
    super("InvalidAmount", `Invalid amount for ${field}: ${amount}`, {
      field,
      amount: amount.toString(),
    });
    this.name = "InvalidAmountError";
  }
}

export class InvalidConfigError extends VaultError {
  constructor(message: string, public readonly issues: string[]) {
    super("InvalidConfig", message, { issues });
    this.name = "InvalidConfigError";
  }
}

export class UnauthorizedError extends VaultError {
  constructor(
    public readonly caller: string,
    public readonly expectedRole: string
  ) {
    super("Unauthorized", `${caller} is not the ${expectedRole}`, { caller, expectedRole });
    this.name = "UnauthorizedError";
  }
}

export class AlreadySetError extends VaultError {
  constructor(public readonly setting: string, value: unknown) {
    super("AlreadySet", `${setting} is already ${String(value)}`, { setting, value });
    this.name = "AlreadySetError";
  }
}

export class NotPausedError extends VaultError {
  constructor(public readonly component: string) {
    super("NotPaused", `${component} must be paused for this operation`, { component });
    this.name = "NotPausedError";
  }
}

export class TransferFailedError extends VaultError {
  constructor(
    public readonly recipient: string,
    public readonly amount: bigint
  ) {
    super("TransferFailed", `Native transfer of ${amount} to ${recipient} was rejected`, {
      recipient,
      amount: amount.toString(),
    });
    this.name = "TransferFailedError";
  }
}

export class InsufficientOutputError extends VaultError {
  constructor(
    public readonly amountOut: bigint,
    public readonly minAmountOut: bigint
  ) {
    super("InsufficientOutput", `Swap returned ${amountOut}, below minimum ${minAmountOut}`, {
      amountOut: amountOut.toString(),
      minAmountOut: minAmountOut.toString(),
    });
    this.name = "InsufficientOutputError";
  }
}

export class InsufficientBalanceError extends VaultError {
  constructor(
    public readonly account: string,
    public readonly available: bigint,
    public readonly requested: bigint
  ) {
    super(
      "InsufficientBalance",
      `Insufficient balance for ${account}: available=${available}, requested=${requested}`,
      { account, available: available.toString(), requested: requested.toString() }
    );
    this.name = "InsufficientBalanceError";
  }
}

export type TradeBlockReason = "hold-window" | "max-buy" | "cooldown";

export class TradeBlockedError extends VaultError {
  constructor(
    public readonly reason: TradeBlockReason,
    public readonly trader: string
  ) {
    super("TradeBlocked", `Buy by ${trader} blocked: ${reason}`, { reason, trader });
    this.name = "TradeBlockedError";
  }
}

export class DuplicateVaultError extends VaultError {
  constructor(public readonly owner: string) {
    super("DuplicateVault", `Vault already exists for owner ${owner}`, { owner });
    this.name = "DuplicateVaultError";
  }
}

export class PoolAlreadyExistsError extends VaultError {
  constructor(public readonly poolId: string) {
    super("PoolAlreadyExists", `Pool ${poolId} already exists`, { poolId });
    this.name = "PoolAlreadyExistsError";
  }
}

export class PoolNotFoundError extends VaultError {
  constructor(public readonly poolId: string) {
    super("PoolNotFound", `Pool ${poolId} not found`, { poolId });
    this.name = "PoolNotFoundError";
  }
}

export class VaultNotFoundError extends VaultError {
  constructor(public readonly owner: string) {
    super("VaultNotFound", `No vault registered for owner ${owner}`, { owner });
    this.name = "VaultNotFoundError";
  }
}

/**
 * Narrow an unknown thrown value to a VaultError, optionally of a given kind
 */
export function isVaultError(error: unknown, kind?: VaultErrorKind): error is VaultError {
  if (!(error instanceof VaultError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}
