export class AccountSuspendedError extends Error {
  constructor(
    public readonly accountId: string,
    public readonly reason: string | null,
  ) {
    super("account is suspended");
    this.name = "AccountSuspendedError";
  }
}

export class DepositClaimConflictError extends Error {
  constructor(
    public readonly txHash: string,
    public readonly accountId: string,
  ) {
    super("transaction hash is already claimed by another account");
    this.name = "DepositClaimConflictError";
  }
}

export class InvalidDepositClaimError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidDepositClaimError";
  }
}

export class BelowMinimumDepositError extends Error {
  constructor(
    public readonly amount: string,
    public readonly minimum: string,
  ) {
    super(`deposit amount ${amount} is below the minimum of ${minimum}`);
    this.name = "BelowMinimumDepositError";
  }
}

export class VerificationAbortedError extends Error {
  constructor(
    public readonly txHash: string,
    public readonly attempts: number,
  ) {
    super("deposit verification aborted");
    this.name = "VerificationAbortedError";
  }
}

export class ConversionRequestConflictError extends Error {
  constructor(public readonly requestId: string) {
    super("conversion request id belongs to another account");
    this.name = "ConversionRequestConflictError";
  }
}

export class UnknownPackageError extends Error {
  constructor(
    public readonly packageId: string,
    public readonly catalogVersion: number,
  ) {
    super(`unknown pricing package: ${packageId}`);
    this.name = "UnknownPackageError";
  }
}

export class InvalidVoucherCodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidVoucherCodeError";
  }
}

export class InvalidVoucherBatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidVoucherBatchError";
  }
}
