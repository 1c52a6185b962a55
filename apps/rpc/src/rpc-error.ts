import { InvalidInstallationIdError } from "@cid-ledger/conversion-adapter";
import {
  ConversionDebitNotFoundError,
  DepositClaimNotFoundError,
  InsufficientFundsError,
  InvalidAmountError,
  VoucherAlreadyUsedError,
  VoucherExpiredError,
  VoucherNotFoundError,
} from "@cid-ledger/db";
import {
  AccountSuspendedError,
  BelowMinimumDepositError,
  ConversionRequestConflictError,
  DepositClaimConflictError,
  InvalidDepositClaimError,
  InvalidVoucherCodeError,
  UnknownPackageError,
} from "@cid-ledger/ledger-core";
import { RpcErrorCode, type RpcId } from "./contracts";

export class RpcMethodError extends Error {
  constructor(
    public readonly code: RpcErrorCode,
    message: string,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = "RpcMethodError";
  }
}

/**
 * Maps a domain error to the error the caller sees. Returns null for anything
 * unexpected, which the transport reports as an internal error.
 */
export function toRpcMethodError(error: unknown): RpcMethodError | null {
  if (error instanceof RpcMethodError) {
    return error;
  }
  if (error instanceof InsufficientFundsError) {
    return new RpcMethodError(RpcErrorCode.INSUFFICIENT_FUNDS, "Insufficient balance", {
      required: error.amount,
      balance: error.balance,
    });
  }
  if (error instanceof AccountSuspendedError) {
    return new RpcMethodError(RpcErrorCode.ACCOUNT_SUSPENDED, "Account suspended");
  }
  if (
    error instanceof VoucherNotFoundError ||
    error instanceof VoucherAlreadyUsedError ||
    error instanceof VoucherExpiredError ||
    error instanceof InvalidVoucherCodeError
  ) {
    // The caller cannot tell a used code from one that never existed.
    return new RpcMethodError(RpcErrorCode.INVALID_VOUCHER, "Invalid code");
  }
  if (error instanceof DepositClaimNotFoundError) {
    return new RpcMethodError(RpcErrorCode.DEPOSIT_CLAIM_NOT_FOUND, "Deposit claim not found");
  }
  if (error instanceof DepositClaimConflictError) {
    return new RpcMethodError(RpcErrorCode.DEPOSIT_CLAIM_CONFLICT, "Transaction already claimed by another account");
  }
  if (error instanceof BelowMinimumDepositError) {
    return new RpcMethodError(RpcErrorCode.BELOW_MINIMUM_DEPOSIT, "Amount below the minimum deposit", {
      minimum: error.minimum,
    });
  }
  if (error instanceof InvalidDepositClaimError || error instanceof InvalidAmountError) {
    return new RpcMethodError(RpcErrorCode.INVALID_PARAMS, "Invalid params", { reason: error.message });
  }
  if (error instanceof UnknownPackageError) {
    return new RpcMethodError(RpcErrorCode.UNKNOWN_PACKAGE, "Unknown package", { packageId: error.packageId });
  }
  if (error instanceof InvalidInstallationIdError) {
    return new RpcMethodError(RpcErrorCode.INVALID_INSTALLATION_ID, "Invalid installation id", {
      reason: error.reason,
    });
  }
  if (error instanceof ConversionDebitNotFoundError) {
    return new RpcMethodError(RpcErrorCode.CONVERSION_NOT_FOUND, "Conversion not found");
  }
  if (error instanceof ConversionRequestConflictError) {
    return new RpcMethodError(RpcErrorCode.CONVERSION_REQUEST_CONFLICT, "Request id already used by another account");
  }
  return null;
}

export function rpcErrorResponse(id: RpcId, code: RpcErrorCode, message: string, data?: unknown) {
  return {
    jsonrpc: "2.0" as const,
    id,
    error: data === undefined ? { code, message } : { code, message, data },
  };
}

export function rpcResultResponse<T>(id: RpcId, result: T) {
  return {
    jsonrpc: "2.0" as const,
    id,
    result,
  };
}
