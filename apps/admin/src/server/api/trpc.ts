import { initTRPC, TRPCError } from "@trpc/server";
import {
  DepositClaimNotFoundError,
  DepositClaimTransitionError,
  DuplicateVoucherCodeError,
  InsufficientFundsError,
  InvalidAmountError,
  InvalidPricingCatalogError,
  PricingCatalogConflictError,
  type AdminRole,
} from "@cid-ledger/db";
import {
  InvalidVoucherBatchError,
  InvalidVoucherCodeError,
  type TransactionCoordinator,
} from "@cid-ledger/ledger-core";

export type AdminCoordinator = Pick<
  TransactionCoordinator,
  | "createVouchers"
  | "getVoucherStats"
  | "getBalance"
  | "listLedgerEvents"
  | "adjustBalance"
  | "suspendAccount"
  | "reactivateAccount"
  | "getPricingSnapshot"
  | "replacePricingCatalog"
  | "getDepositClaim"
  | "retryDepositCredit"
>;

export type TrpcContext = {
  role?: AdminRole;
  // Identity of the signed-in admin, recorded as the actor on every mutation.
  adminUserId?: string;
  coordinator?: AdminCoordinator;
};

export const t = initTRPC.context<TrpcContext>().create();

export function requireCoordinator(ctx: TrpcContext): AdminCoordinator {
  if (!ctx.coordinator) {
    throw new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: "Ledger services not configured" });
  }
  return ctx.coordinator;
}

export function requireActor(ctx: TrpcContext): string {
  if (!ctx.adminUserId) {
    throw new TRPCError({ code: "INTERNAL_SERVER_ERROR", message: "Admin identity not configured" });
  }
  return ctx.adminUserId;
}

function toTrpcError(error: unknown): TRPCError | null {
  if (
    error instanceof InvalidAmountError ||
    error instanceof InvalidVoucherBatchError ||
    error instanceof InvalidVoucherCodeError ||
    error instanceof InvalidPricingCatalogError
  ) {
    return new TRPCError({ code: "BAD_REQUEST", message: error.message, cause: error });
  }
  if (error instanceof InsufficientFundsError) {
    return new TRPCError({
      code: "PRECONDITION_FAILED",
      message: `balance ${error.balance} cannot cover ${error.amount}`,
      cause: error,
    });
  }
  if (error instanceof DepositClaimNotFoundError) {
    return new TRPCError({ code: "NOT_FOUND", message: error.message, cause: error });
  }
  if (
    error instanceof DuplicateVoucherCodeError ||
    error instanceof DepositClaimTransitionError ||
    error instanceof PricingCatalogConflictError
  ) {
    return new TRPCError({ code: "CONFLICT", message: error.message, cause: error });
  }
  return null;
}

/** Runs a ledger operation and rethrows domain failures as tRPC errors. */
export async function withLedgerErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw toTrpcError(error) ?? error;
  }
}
