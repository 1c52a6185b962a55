import {
  compareDecimalStrings,
  conversionReleaseIdempotencyKey,
  conversionReserveIdempotencyKey,
  depositCreditIdempotencyKey,
  voucherCreditIdempotencyKey,
  type ConversionDebitRepo,
  type ConversionDebitStatus,
  type DepositClaimRepo,
  type LedgerRepo,
  type VoucherRepo,
} from "@cid-ledger/db";

export type ReconciliationIssue =
  | { kind: "balance_mismatch"; accountId: string; balance: string; eventSum: string }
  | { kind: "deposit_credit_missing"; txHash: string; accountId: string }
  | { kind: "voucher_credit_missing"; code: string; accountId: string | null }
  | { kind: "conversion_debit_missing"; requestId: string; accountId: string }
  | { kind: "conversion_refund_missing"; requestId: string; accountId: string };

export type ReconciliationReport = {
  checkedAccounts: number;
  checkedClaims: number;
  checkedVouchers: number;
  checkedConversions: number;
  issues: ReconciliationIssue[];
};

const BALANCE_READ_ATTEMPTS = 3;

export type ReconciliationDeps = {
  ledgerRepo: LedgerRepo;
  depositClaimRepo: DepositClaimRepo;
  voucherRepo: VoucherRepo;
  conversionDebitRepo: ConversionDebitRepo;
};

async function findBalanceDrift(
  ledgerRepo: LedgerRepo,
  accountId: string,
  listedBalance: string,
): Promise<{ balance: string; eventSum: string } | null> {
  let balance = listedBalance;
  let eventSum = "0";
  // The balance and the event sum are separate reads; only a balance that holds still across the sum counts.
  for (let attempt = 0; attempt < BALANCE_READ_ATTEMPTS; attempt += 1) {
    eventSum = await ledgerRepo.sumEventAmounts(accountId);
    const current = (await ledgerRepo.getAccount(accountId))?.balance ?? balance;
    if (compareDecimalStrings(eventSum, current) === 0) {
      return null;
    }
    if (compareDecimalStrings(current, balance) === 0) {
      return { balance, eventSum };
    }
    balance = current;
  }
  return { balance, eventSum };
}

async function checkAccounts(deps: ReconciliationDeps, pageSize: number, report: ReconciliationReport) {
  let after: string | undefined;
  for (;;) {
    const page = await deps.ledgerRepo.listAccounts({ limit: pageSize, after });
    for (const account of page) {
      report.checkedAccounts += 1;
      const drift = await findBalanceDrift(deps.ledgerRepo, account.id, account.balance);
      if (drift) {
        report.issues.push({ kind: "balance_mismatch", accountId: account.id, ...drift });
      }
    }
    const last = page.at(-1);
    if (page.length < pageSize || !last) {
      return;
    }
    after = last.id;
  }
}

async function checkClaims(deps: ReconciliationDeps, pageSize: number, report: ReconciliationReport) {
  let after: string | undefined;
  for (;;) {
    const page = await deps.depositClaimRepo.listByStatus("credited", { limit: pageSize, after });
    for (const claim of page) {
      report.checkedClaims += 1;
      const event = await deps.ledgerRepo.findEventByIdempotencyKey(depositCreditIdempotencyKey(claim.txHash));
      if (!event) {
        report.issues.push({ kind: "deposit_credit_missing", txHash: claim.txHash, accountId: claim.accountId });
      }
    }
    const last = page.at(-1);
    if (page.length < pageSize || !last) {
      return;
    }
    after = last.txHash;
  }
}

async function checkVouchers(deps: ReconciliationDeps, pageSize: number, report: ReconciliationReport) {
  let after: string | undefined;
  for (;;) {
    const page = await deps.voucherRepo.listUsed({ limit: pageSize, after });
    for (const voucher of page) {
      report.checkedVouchers += 1;
      const event = await deps.ledgerRepo.findEventByIdempotencyKey(voucherCreditIdempotencyKey(voucher.code));
      if (!event) {
        report.issues.push({ kind: "voucher_credit_missing", code: voucher.code, accountId: voucher.redeemedBy });
      }
    }
    const last = page.at(-1);
    if (page.length < pageSize || !last) {
      return;
    }
    after = last.code;
  }
}

async function checkConversions(
  deps: ReconciliationDeps,
  status: ConversionDebitStatus,
  pageSize: number,
  report: ReconciliationReport,
) {
  let after: string | undefined;
  for (;;) {
    const page = await deps.conversionDebitRepo.listByStatus(status, { limit: pageSize, after });
    for (const debit of page) {
      report.checkedConversions += 1;
      const reserve = await deps.ledgerRepo.findEventByIdempotencyKey(conversionReserveIdempotencyKey(debit.requestId));
      if (!reserve) {
        report.issues.push({ kind: "conversion_debit_missing", requestId: debit.requestId, accountId: debit.accountId });
      }
      if (status === "released") {
        const refund = await deps.ledgerRepo.findEventByIdempotencyKey(conversionReleaseIdempotencyKey(debit.requestId));
        if (!refund) {
          report.issues.push({ kind: "conversion_refund_missing", requestId: debit.requestId, accountId: debit.accountId });
        }
      }
    }
    const last = page.at(-1);
    if (page.length < pageSize || !last) {
      return;
    }
    after = last.requestId;
  }
}

/** Read-only consistency check between the ledger and the records that should have moved it. */
export async function buildReconciliationReport(
  deps: ReconciliationDeps,
  options: { pageSize?: number } = {},
): Promise<ReconciliationReport> {
  const pageSize = options.pageSize ?? 200;
  const report: ReconciliationReport = {
    checkedAccounts: 0,
    checkedClaims: 0,
    checkedVouchers: 0,
    checkedConversions: 0,
    issues: [],
  };
  await checkAccounts(deps, pageSize, report);
  await checkClaims(deps, pageSize, report);
  await checkVouchers(deps, pageSize, report);
  await checkConversions(deps, "finalized", pageSize, report);
  await checkConversions(deps, "released", pageSize, report);
  return report;
}
