import { setTimeout as sleep } from "timers/promises";
import {
  ConversionProviderUnavailableError,
  InvalidInstallationIdError,
  normalizeInstallationId,
  type ConversionProvider,
} from "@cid-ledger/conversion-adapter";
import {
  ConversionDebitTransitionError,
  DepositClaimTransitionError,
  DuplicateVoucherCodeError,
  InvalidAmountError,
  adjustmentIdempotencyKey,
  assertPositiveAmount,
  compareDecimalStrings,
  conversionReleaseIdempotencyKey,
  negateDecimalString,
  normalizeDecimal,
  parseDecimal,
  voucherCreditIdempotencyKey,
  type AccountRecord,
  type ConversionDebitRecord,
  type ConversionDebitRepo,
  type ConversionReleaseReason,
  type DepositClaimRecord,
  type DepositClaimRepo,
  type LedgerEventRecord,
  type LedgerRepo,
  type LedgerWriteResult,
  type PricingCatalogRepo,
  type PricingPackageInput,
  type PricingSnapshot,
  type VoucherRecord,
  type VoucherRepo,
  type VoucherStats,
} from "@cid-ledger/db";
import type { LedgerConfig } from "./config";
import type { DepositVerifier, VerificationVerdict } from "./deposit-verifier";
import {
  AccountSuspendedError,
  BelowMinimumDepositError,
  ConversionRequestConflictError,
  DepositClaimConflictError,
  InvalidDepositClaimError,
} from "./errors";
import { createComponentLogger, errorMessage, type ComponentLogger } from "./logger";
import { listActivePackages, priceOf, type PackageQuote } from "./pricing";
import { computeBackoffDelayMs } from "./retry-policy";
import { buildVoucherBatch, normalizeVoucherCode } from "./vouchers";

const VOUCHER_CODE_ATTEMPTS = 3;
const REPAIR_PAGE_SIZE = 200;

export type CoordinatorConfig = Pick<
  LedgerConfig,
  | "depositAddress"
  | "minimumDepositAmount"
  | "underpaymentPolicy"
  | "depositRecheckDelayMs"
  | "verifyRetry"
  | "creditRetryAttempts"
  | "defaultPackageId"
>;

export type TransactionCoordinatorDeps = {
  ledgerRepo: LedgerRepo;
  depositClaimRepo: DepositClaimRepo;
  voucherRepo: VoucherRepo;
  conversionDebitRepo: ConversionDebitRepo;
  pricingCatalogRepo: PricingCatalogRepo;
  verifier: DepositVerifier;
  conversionProvider: ConversionProvider;
  config: CoordinatorConfig;
  nowFn?: () => Date;
  sleepFn?: (ms: number) => Promise<void>;
  logger?: ComponentLogger;
};

export type SubmitDepositClaimInput = {
  accountId: string;
  txHash: string;
  expectedAmount?: string;
  packageId?: string;
};

export type DepositClaimSubmission = {
  created: boolean;
  claim: DepositClaimRecord;
  quote: PackageQuote | null;
};

export type DepositProcessOutcome =
  | { status: "credited"; claim: DepositClaimRecord; ledger: LedgerWriteResult }
  | { status: "credit_deferred"; claim: DepositClaimRecord; error: string }
  | { status: "rejected"; claim: DepositClaimRecord; verdict: VerificationVerdict }
  | { status: "pending"; claim: DepositClaimRecord; verdict: VerificationVerdict }
  | { status: "already_final"; claim: DepositClaimRecord };

export type RequestConversionInput = {
  accountId: string;
  requestId: string;
  installationId: string;
  packageId?: string;
};

export type ConversionOutcome =
  | { status: "finalized"; debit: ConversionDebitRecord; confirmationId: string | null; reconciliationRequired: boolean }
  | { status: "released"; debit: ConversionDebitRecord; reason: string | null; error: string | null }
  | { status: "reserved"; debit: ConversionDebitRecord };

export type StaleReservationSweep = {
  released: string[];
  skipped: string[];
  failed: string[];
};

export type VoucherRedemption = {
  voucher: VoucherRecord;
  ledger: LedgerWriteResult;
};

export type CreateVouchersInput = {
  count: number;
  value: string;
  createdBy: string;
  prefix?: string;
  customCode?: string;
  expiresInDays?: number | null;
};

export type AdjustBalanceInput = {
  accountId: string;
  adjustmentId: string;
  amount: string;
  actor: string;
  note: string;
};

export type AccountBalance = {
  accountId: string;
  balance: string;
  status: AccountRecord["status"];
};

export type RepairSummary = {
  checked: number;
  repaired: string[];
};

function describeVerdict(verdict: VerificationVerdict): string {
  switch (verdict.kind) {
    case "confirmed":
      return `confirmed:${verdict.actualAmount}`;
    case "underpaid":
      return `underpaid:${verdict.actualAmount}/${verdict.expectedAmount}`;
    case "not_found":
      return `not_found:${verdict.reason}`;
    case "pending":
      return `pending:${verdict.confirmations}/${verdict.required}`;
    case "provider_error":
      return `provider_error:${verdict.attempts}`;
  }
}

function releaseReasonFor(error: unknown): ConversionReleaseReason {
  if (error instanceof InvalidInstallationIdError) {
    return "provider_rejected";
  }
  if (error instanceof ConversionProviderUnavailableError && error.reason === "timeout") {
    return "provider_timeout";
  }
  return "provider_failure";
}

function outcomeFromRecord(debit: ConversionDebitRecord): ConversionOutcome {
  if (debit.status === "finalized") {
    return { status: "finalized", debit, confirmationId: debit.confirmationId, reconciliationRequired: false };
  }
  if (debit.status === "released") {
    return { status: "released", debit, reason: debit.releaseReason, error: debit.lastError };
  }
  return { status: "reserved", debit };
}

function normalizeTxHash(raw: string): string {
  const txHash = raw.trim().toLowerCase();
  if (!/^[0-9a-z]{1,128}$/.test(txHash)) {
    throw new InvalidDepositClaimError("transaction hash must be 1-128 letters or digits");
  }
  return txHash;
}

async function defaultSleep(ms: number): Promise<void> {
  await sleep(ms);
}

export function createTransactionCoordinator(deps: TransactionCoordinatorDeps) {
  const nowFn = deps.nowFn ?? (() => new Date());
  const sleepFn = deps.sleepFn ?? defaultSleep;
  const logger = deps.logger ?? createComponentLogger("coordinator");
  const { config } = deps;

  async function assertActive(accountId: string): Promise<AccountRecord> {
    const account = await deps.ledgerRepo.ensureAccount(accountId, nowFn());
    if (account.status === "suspended") {
      throw new AccountSuspendedError(accountId, account.suspendedReason);
    }
    return account;
  }

  function nextAttemptAt(now: Date): Date {
    return new Date(now.getTime() + config.depositRecheckDelayMs);
  }

  /** Runs a ledger write with the same idempotency key until it lands or attempts run out. */
  async function withCreditRetry<T>(
    write: () => Promise<T>,
    context: { event: string; reference: Record<string, string> },
  ): Promise<T> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= config.creditRetryAttempts; attempt += 1) {
      try {
        return await write();
      } catch (error) {
        if (error instanceof DepositClaimTransitionError || error instanceof ConversionDebitTransitionError) {
          throw error;
        }
        lastError = error;
        logger.warn(`${context.event}.retry`, { ...context.reference, attempt, error });
        if (attempt < config.creditRetryAttempts) {
          await sleepFn(computeBackoffDelayMs(config.verifyRetry, attempt));
        }
      }
    }
    throw lastError;
  }

  async function reloadFinalClaim(txHash: string, error: DepositClaimTransitionError): Promise<DepositProcessOutcome> {
    const current = await deps.depositClaimRepo.findByTxHashOrThrow(txHash);
    if (current.status === "credited" || current.status === "rejected") {
      return { status: "already_final", claim: current };
    }
    if (current.status === "verified") {
      return creditVerifiedClaim(current);
    }
    throw error;
  }

  async function creditVerifiedClaim(claim: DepositClaimRecord): Promise<DepositProcessOutcome> {
    try {
      const result = await withCreditRetry(() => deps.depositClaimRepo.markCredited(claim.txHash, { now: nowFn() }), {
        event: "deposit.credit",
        reference: { txHash: claim.txHash, accountId: claim.accountId },
      });
      logger.info("deposit.credited", {
        txHash: claim.txHash,
        accountId: claim.accountId,
        amount: result.ledger.event.amount,
        applied: result.ledger.applied,
      });
      return { status: "credited", claim: result.claim, ledger: result.ledger };
    } catch (error) {
      if (error instanceof DepositClaimTransitionError) {
        const current = await deps.depositClaimRepo.findByTxHashOrThrow(claim.txHash);
        if (current.status === "credited") {
          return { status: "already_final", claim: current };
        }
        throw error;
      }

      const message = errorMessage(error);
      const now = nowFn();
      let deferred = claim;
      try {
        deferred = await deps.depositClaimRepo.recordCreditFailure(claim.txHash, {
          now,
          error: message,
          nextAttemptAt: nextAttemptAt(now),
        });
      } catch (recordError) {
        logger.error("deposit.credit.failure_not_recorded", { txHash: claim.txHash, error: recordError });
      }
      logger.error("deposit.credit.deferred", {
        txHash: claim.txHash,
        accountId: claim.accountId,
        amount: claim.actualAmount,
        error,
      });
      return { status: "credit_deferred", claim: deferred, error: message };
    }
  }

  async function rejectClaim(
    claim: DepositClaimRecord,
    verdict: VerificationVerdict,
    reason: string,
    actualAmount: string | null,
  ): Promise<DepositProcessOutcome> {
    const rejected = await deps.depositClaimRepo.markRejected(claim.txHash, {
      now: nowFn(),
      reason,
      verdict: describeVerdict(verdict),
      actualAmount,
    });
    logger.warn("deposit.rejected", { txHash: claim.txHash, accountId: claim.accountId, reason, actualAmount });
    return { status: "rejected", claim: rejected, verdict };
  }

  async function keepPending(
    claim: DepositClaimRecord,
    verdict: VerificationVerdict,
    error: string | null,
  ): Promise<DepositProcessOutcome> {
    const now = nowFn();
    const pending = await deps.depositClaimRepo.recordAttempt(claim.txHash, {
      now,
      verdict: describeVerdict(verdict),
      error,
      nextAttemptAt: nextAttemptAt(now),
    });
    return { status: "pending", claim: pending, verdict };
  }

  async function verifyAndCredit(
    claim: DepositClaimRecord,
    verdict: VerificationVerdict,
    actualAmount: string,
  ): Promise<DepositProcessOutcome> {
    if (compareDecimalStrings(actualAmount, config.minimumDepositAmount) < 0) {
      return rejectClaim(claim, verdict, "below_minimum", actualAmount);
    }
    const verified = await deps.depositClaimRepo.markVerified(claim.txHash, {
      now: nowFn(),
      actualAmount,
      verdict: describeVerdict(verdict),
    });
    return creditVerifiedClaim(verified);
  }

  async function applyVerdict(claim: DepositClaimRecord, verdict: VerificationVerdict): Promise<DepositProcessOutcome> {
    switch (verdict.kind) {
      case "confirmed":
        return verifyAndCredit(claim, verdict, verdict.actualAmount);
      case "underpaid":
        logger.warn("deposit.underpaid", {
          txHash: claim.txHash,
          accountId: claim.accountId,
          expectedAmount: verdict.expectedAmount,
          actualAmount: verdict.actualAmount,
          policy: config.underpaymentPolicy,
        });
        if (config.underpaymentPolicy === "credit_actual") {
          return verifyAndCredit(claim, verdict, verdict.actualAmount);
        }
        if (config.underpaymentPolicy === "reject") {
          return rejectClaim(claim, verdict, "underpaid", verdict.actualAmount);
        }
        return keepPending(claim, verdict, null);
      case "not_found":
        return rejectClaim(claim, verdict, verdict.reason, null);
      case "pending":
        return keepPending(claim, verdict, null);
      case "provider_error":
        logger.error("deposit.verify.provider_error", {
          txHash: claim.txHash,
          accountId: claim.accountId,
          attempts: verdict.attempts,
          error: verdict.message,
        });
        return keepPending(claim, verdict, verdict.message);
    }
  }

  async function loadQuote(packageId: string): Promise<PackageQuote> {
    const snapshot = await deps.pricingCatalogRepo.loadSnapshot();
    return priceOf(snapshot, packageId);
  }

  async function creditVoucher(voucher: VoucherRecord, accountId: string): Promise<LedgerWriteResult> {
    return deps.ledgerRepo.credit({
      accountId,
      amount: voucher.value,
      kind: "voucher_credit",
      externalReference: voucher.code,
      idempotencyKey: voucherCreditIdempotencyKey(voucher.code),
      now: nowFn(),
    });
  }

  return {
    async submitDepositClaim(input: SubmitDepositClaimInput): Promise<DepositClaimSubmission> {
      const txHash = normalizeTxHash(input.txHash);
      if (input.expectedAmount !== undefined && input.packageId !== undefined) {
        throw new InvalidDepositClaimError("a deposit claim names either an expected amount or a package, not both");
      }

      let quote: PackageQuote | null = null;
      let expectedAmount: string;
      if (input.packageId !== undefined) {
        quote = await loadQuote(input.packageId);
        expectedAmount = quote.cost;
      } else if (input.expectedAmount !== undefined) {
        assertPositiveAmount(input.expectedAmount);
        expectedAmount = normalizeDecimal(input.expectedAmount);
      } else {
        throw new InvalidDepositClaimError("a deposit claim needs either an expected amount or a package");
      }
      if (compareDecimalStrings(expectedAmount, config.minimumDepositAmount) < 0) {
        throw new BelowMinimumDepositError(expectedAmount, config.minimumDepositAmount);
      }

      await assertActive(input.accountId);
      const result = await deps.depositClaimRepo.create({
        txHash,
        accountId: input.accountId,
        expectedAmount,
        packageId: quote?.packageId ?? null,
        now: nowFn(),
      });
      if (result.claim.accountId !== input.accountId) {
        logger.warn("deposit.claim.conflict", { txHash, accountId: input.accountId, ownerId: result.claim.accountId });
        throw new DepositClaimConflictError(txHash, input.accountId);
      }
      if (result.created) {
        logger.info("deposit.claim.submitted", { txHash, accountId: input.accountId, expectedAmount });
      }
      return { created: result.created, claim: result.claim, quote };
    },

    async getDepositClaim(txHash: string): Promise<DepositClaimRecord> {
      return deps.depositClaimRepo.findByTxHashOrThrow(normalizeTxHash(txHash));
    },

    async processDepositClaim(txHash: string, options: { signal?: AbortSignal } = {}): Promise<DepositProcessOutcome> {
      const claim = await deps.depositClaimRepo.findByTxHashOrThrow(normalizeTxHash(txHash));
      if (claim.status === "credited" || claim.status === "rejected") {
        return { status: "already_final", claim };
      }
      if (claim.status === "verified") {
        return creditVerifiedClaim(claim);
      }

      const verdict = await deps.verifier.verify(
        { txHash: claim.txHash, expectedAddress: config.depositAddress, expectedAmount: claim.expectedAmount },
        { signal: options.signal },
      );
      try {
        return await applyVerdict(claim, verdict);
      } catch (error) {
        // Another processor moved the claim while this one was verifying.
        if (error instanceof DepositClaimTransitionError) {
          return reloadFinalClaim(claim.txHash, error);
        }
        throw error;
      }
    },

    async retryDepositCredit(txHash: string): Promise<DepositProcessOutcome> {
      const claim = await deps.depositClaimRepo.findByTxHashOrThrow(normalizeTxHash(txHash));
      if (claim.status === "credited") {
        return { status: "already_final", claim };
      }
      if (claim.status !== "verified") {
        throw new DepositClaimTransitionError("credited", claim.status, claim.txHash);
      }
      return creditVerifiedClaim(claim);
    },

    async requestConversion(input: RequestConversionInput): Promise<ConversionOutcome> {
      const installationId = normalizeInstallationId(input.installationId);
      const existing = await deps.conversionDebitRepo.findByRequestId(input.requestId);
      if (existing) {
        if (existing.accountId !== input.accountId) {
          throw new ConversionRequestConflictError(input.requestId);
        }
        return outcomeFromRecord(existing);
      }

      await assertActive(input.accountId);
      const quote = await loadQuote(input.packageId ?? config.defaultPackageId);
      const reserved = await deps.conversionDebitRepo.reserve({
        requestId: input.requestId,
        accountId: input.accountId,
        packageId: quote.packageId,
        unitCount: quote.unitCount,
        amount: quote.cost,
        installationId,
        now: nowFn(),
      });
      if (!reserved.created) {
        if (reserved.debit.accountId !== input.accountId) {
          throw new ConversionRequestConflictError(input.requestId);
        }
        return outcomeFromRecord(reserved.debit);
      }
      logger.info("conversion.reserved", {
        requestId: input.requestId,
        accountId: input.accountId,
        amount: quote.cost,
        catalogVersion: quote.catalogVersion,
      });

      let confirmationId: string;
      try {
        ({ confirmationId } = await deps.conversionProvider.convert({ installationId, requestId: input.requestId }));
      } catch (error) {
        const reason = releaseReasonFor(error);
        const message = errorMessage(error);
        logger.warn("conversion.provider_failed", { requestId: input.requestId, accountId: input.accountId, reason, error });
        try {
          const released = await deps.conversionDebitRepo.release(input.requestId, { now: nowFn(), reason, error: message });
          return { status: "released", debit: released.debit, reason, error: message };
        } catch (releaseError) {
          if (releaseError instanceof ConversionDebitTransitionError) {
            const current = await deps.conversionDebitRepo.findByRequestId(input.requestId);
            if (current) {
              return outcomeFromRecord(current);
            }
          }
          logger.error("conversion.release_failed", { requestId: input.requestId, accountId: input.accountId, error: releaseError });
          throw releaseError;
        }
      }

      try {
        const debit = await deps.conversionDebitRepo.markFinalized(input.requestId, { now: nowFn(), confirmationId });
        logger.info("conversion.finalized", { requestId: input.requestId, accountId: input.accountId });
        return { status: "finalized", debit, confirmationId, reconciliationRequired: false };
      } catch (error) {
        if (error instanceof ConversionDebitTransitionError && error.currentStatus === "released") {
          // The sweep refunded while the provider was still working; the confirmation is real.
          logger.error("conversion.finalize_after_release", {
            requestId: input.requestId,
            accountId: input.accountId,
            reconciliationRequired: true,
          });
          const current = await deps.conversionDebitRepo.findByRequestId(input.requestId);
          if (current) {
            return { status: "finalized", debit: current, confirmationId, reconciliationRequired: true };
          }
        }
        logger.error("conversion.finalize_failed", { requestId: input.requestId, accountId: input.accountId, error });
        throw error;
      }
    },

    async getConversion(requestId: string): Promise<ConversionOutcome | null> {
      const debit = await deps.conversionDebitRepo.findByRequestId(requestId);
      return debit ? outcomeFromRecord(debit) : null;
    },

    async releaseStaleReservations(params: { olderThanMs: number; limit?: number }): Promise<StaleReservationSweep> {
      const now = nowFn();
      const stale = await deps.conversionDebitRepo.listStaleReservations({
        olderThan: new Date(now.getTime() - params.olderThanMs),
        limit: params.limit ?? 100,
      });
      const summary: StaleReservationSweep = { released: [], skipped: [], failed: [] };
      for (const debit of stale) {
        try {
          await deps.conversionDebitRepo.release(debit.requestId, { now, reason: "stale_reservation" });
          summary.released.push(debit.requestId);
          logger.warn("conversion.stale_released", {
            requestId: debit.requestId,
            accountId: debit.accountId,
            amount: debit.reservedAmount,
          });
        } catch (error) {
          if (error instanceof ConversionDebitTransitionError) {
            summary.skipped.push(debit.requestId);
            continue;
          }
          summary.failed.push(debit.requestId);
          logger.error("conversion.stale_release_failed", { requestId: debit.requestId, accountId: debit.accountId, error });
        }
      }
      return summary;
    },

    async redeemVoucher(input: { accountId: string; code: string }): Promise<VoucherRedemption> {
      const code = normalizeVoucherCode(input.code);
      await assertActive(input.accountId);
      const voucher = await deps.voucherRepo.redeem(code, input.accountId, nowFn());
      try {
        const ledger = await withCreditRetry(() => creditVoucher(voucher, input.accountId), {
          event: "voucher.credit",
          reference: { code, accountId: input.accountId },
        });
        logger.info("voucher.redeemed", { code, accountId: input.accountId, amount: voucher.value });
        return { voucher, ledger };
      } catch (error) {
        logger.error("voucher.credit.failed", { code, accountId: input.accountId, amount: voucher.value, error });
        throw error;
      }
    },

    async repairVoucherCredits(): Promise<RepairSummary> {
      const summary: RepairSummary = { checked: 0, repaired: [] };
      let after: string | undefined;
      for (;;) {
        const page = await deps.voucherRepo.listUsed({ limit: REPAIR_PAGE_SIZE, after });
        for (const voucher of page) {
          summary.checked += 1;
          if (!voucher.redeemedBy) {
            continue;
          }
          const event = await deps.ledgerRepo.findEventByIdempotencyKey(voucherCreditIdempotencyKey(voucher.code));
          if (event) {
            continue;
          }
          const result = await creditVoucher(voucher, voucher.redeemedBy);
          if (result.applied) {
            summary.repaired.push(voucher.code);
            logger.warn("voucher.credit.repaired", { code: voucher.code, accountId: voucher.redeemedBy, amount: voucher.value });
          }
        }
        const last = page.at(-1);
        if (page.length < REPAIR_PAGE_SIZE || !last) {
          return summary;
        }
        after = last.code;
      }
    },

    async repairReleaseRefunds(): Promise<RepairSummary> {
      const summary: RepairSummary = { checked: 0, repaired: [] };
      let after: string | undefined;
      for (;;) {
        const page = await deps.conversionDebitRepo.listByStatus("released", { limit: REPAIR_PAGE_SIZE, after });
        for (const debit of page) {
          summary.checked += 1;
          const event = await deps.ledgerRepo.findEventByIdempotencyKey(conversionReleaseIdempotencyKey(debit.requestId));
          if (event) {
            continue;
          }
          const result = await deps.ledgerRepo.credit({
            accountId: debit.accountId,
            amount: debit.reservedAmount,
            kind: "refund",
            externalReference: debit.requestId,
            idempotencyKey: conversionReleaseIdempotencyKey(debit.requestId),
            metadata: { reason: debit.releaseReason ?? "stale_reservation" },
            now: nowFn(),
          });
          if (result.applied) {
            summary.repaired.push(debit.requestId);
            logger.warn("conversion.refund.repaired", {
              requestId: debit.requestId,
              accountId: debit.accountId,
              amount: debit.reservedAmount,
            });
          }
        }
        const last = page.at(-1);
        if (page.length < REPAIR_PAGE_SIZE || !last) {
          return summary;
        }
        after = last.requestId;
      }
    },

    async createVouchers(input: CreateVouchersInput): Promise<VoucherRecord[]> {
      assertPositiveAmount(input.value);
      for (let attempt = 1; ; attempt += 1) {
        const now = nowFn();
        const batch = buildVoucherBatch({ ...input, now });
        try {
          const created = await deps.voucherRepo.createMany(batch, now);
          logger.info("voucher.batch.created", { createdBy: input.createdBy, count: created.length, value: input.value });
          return created;
        } catch (error) {
          // Generated codes can collide with stored ones; a custom code cannot be regenerated.
          if (!(error instanceof DuplicateVoucherCodeError) || input.customCode !== undefined || attempt >= VOUCHER_CODE_ATTEMPTS) {
            throw error;
          }
          logger.warn("voucher.batch.collision", { createdBy: input.createdBy, codes: error.codes, attempt });
        }
      }
    },

    async getVoucherStats(): Promise<VoucherStats> {
      return deps.voucherRepo.getStats(nowFn());
    },

    async getBalance(accountId: string): Promise<AccountBalance> {
      const account = await deps.ledgerRepo.getAccount(accountId);
      return {
        accountId,
        balance: account ? account.balance : "0",
        status: account ? account.status : "active",
      };
    },

    async listLedgerEvents(accountId: string): Promise<LedgerEventRecord[]> {
      return deps.ledgerRepo.listEvents(accountId);
    },

    async adjustBalance(input: AdjustBalanceInput): Promise<LedgerWriteResult> {
      const amount = normalizeDecimal(input.amount);
      const parsed = parseDecimal(amount);
      if (parsed.value === 0n) {
        throw new InvalidAmountError(input.amount);
      }
      const base = {
        accountId: input.accountId,
        kind: "adjustment" as const,
        externalReference: input.adjustmentId,
        idempotencyKey: adjustmentIdempotencyKey(input.adjustmentId),
        metadata: { actor: input.actor, note: input.note },
        now: nowFn(),
      };
      const result =
        parsed.value > 0n
          ? await deps.ledgerRepo.credit({ ...base, amount })
          : await deps.ledgerRepo.debit({ ...base, amount: negateDecimalString(amount) });
      logger.info("account.adjusted", {
        accountId: input.accountId,
        adjustmentId: input.adjustmentId,
        amount,
        actor: input.actor,
        applied: result.applied,
      });
      return result;
    },

    async suspendAccount(input: { accountId: string; reason: string; actor: string }): Promise<AccountRecord> {
      const account = await deps.ledgerRepo.setStatus(input.accountId, {
        status: "suspended",
        reason: input.reason,
        now: nowFn(),
      });
      logger.warn("account.suspended", { accountId: input.accountId, actor: input.actor, reason: input.reason });
      return account;
    },

    async reactivateAccount(input: { accountId: string; actor: string }): Promise<AccountRecord> {
      const account = await deps.ledgerRepo.setStatus(input.accountId, { status: "active", now: nowFn() });
      logger.info("account.reactivated", { accountId: input.accountId, actor: input.actor });
      return account;
    },

    async getPricingSnapshot(): Promise<PricingSnapshot> {
      return deps.pricingCatalogRepo.loadSnapshot();
    },

    async listPackages(): Promise<PricingSnapshot> {
      const snapshot = await deps.pricingCatalogRepo.loadSnapshot();
      return { version: snapshot.version, packages: listActivePackages(snapshot) };
    },

    async quotePackage(packageId: string): Promise<PackageQuote> {
      return loadQuote(packageId);
    },

    async replacePricingCatalog(packages: PricingPackageInput[], params: { actor: string }): Promise<PricingSnapshot> {
      const snapshot = await deps.pricingCatalogRepo.replaceAll(packages, { now: nowFn(), createdBy: params.actor });
      logger.info("pricing.replaced", { actor: params.actor, version: snapshot.version, packages: snapshot.packages.length });
      return snapshot;
    },
  };
}

export type TransactionCoordinator = ReturnType<typeof createTransactionCoordinator>;
