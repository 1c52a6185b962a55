import {
  buildReconciliationReport,
  createComponentLogger,
  type ComponentLogger,
  type LedgerRepos,
  type ReconciliationReport,
  type RepairSummary,
  type StaleReservationSweep,
  type TransactionCoordinator,
} from "@cid-ledger/ledger-core";

const defaultLogger = createComponentLogger("ledger-maintenance");

export type ReservationSweepOptions = {
  coordinator: Pick<TransactionCoordinator, "releaseStaleReservations">;
  olderThanMs: number;
  limit: number;
  logger?: ComponentLogger;
};

export async function runReservationSweep(options: ReservationSweepOptions): Promise<StaleReservationSweep> {
  const logger = options.logger ?? defaultLogger;
  const sweep = await options.coordinator.releaseStaleReservations({
    olderThanMs: options.olderThanMs,
    limit: options.limit,
  });
  logger.info("conversion.sweep.summary", {
    olderThanMs: options.olderThanMs,
    released: sweep.released.length,
    skipped: sweep.skipped.length,
    failed: sweep.failed.length,
  });
  return sweep;
}

export type ReconciliationRunOptions = {
  repos: Omit<LedgerRepos, "pricingCatalogRepo">;
  coordinator: Pick<TransactionCoordinator, "repairVoucherCredits" | "repairReleaseRefunds">;
  repair: boolean;
  pageSize?: number;
  logger?: ComponentLogger;
};

export type ReconciliationRunResult = {
  report: ReconciliationReport;
  voucherRepair: RepairSummary | null;
  refundRepair: RepairSummary | null;
};

/**
 * Builds the reconciliation report and, when repair is enabled, re-applies the
 * voucher credits and release refunds it found missing. Balance mismatches and
 * missing deposit or reserve events are only reported.
 */
export async function runLedgerReconciliation(options: ReconciliationRunOptions): Promise<ReconciliationRunResult> {
  const logger = options.logger ?? defaultLogger;
  const report = await buildReconciliationReport(options.repos, { pageSize: options.pageSize });

  let voucherRepair: RepairSummary | null = null;
  let refundRepair: RepairSummary | null = null;
  if (options.repair) {
    if (report.issues.some((issue) => issue.kind === "voucher_credit_missing")) {
      voucherRepair = await options.coordinator.repairVoucherCredits();
    }
    if (report.issues.some((issue) => issue.kind === "conversion_refund_missing")) {
      refundRepair = await options.coordinator.repairReleaseRefunds();
    }
  }

  for (const issue of report.issues) {
    logger.warn("ledger.reconciliation.issue", { ...issue });
  }
  logger.info("ledger.reconciliation.summary", {
    checkedAccounts: report.checkedAccounts,
    checkedClaims: report.checkedClaims,
    checkedVouchers: report.checkedVouchers,
    checkedConversions: report.checkedConversions,
    issues: report.issues.length,
    repairedVoucherCredits: voucherRepair?.repaired.length ?? 0,
    repairedRefunds: refundRepair?.repaired.length ?? 0,
  });

  return { report, voucherRepair, refundRepair };
}
