import type { DepositClaimRepo } from "@cid-ledger/db";
import {
  VerificationAbortedError,
  createComponentLogger,
  errorMessage,
  type ComponentLogger,
  type TransactionCoordinator,
} from "@cid-ledger/ledger-core";
import { createDepositProcessEvent, type DepositProcessEvent } from "./contracts";

export type DepositDiscoveryOptions = {
  limit: number;
  coordinator: Pick<TransactionCoordinator, "processDepositClaim">;
  depositClaimRepo: Pick<DepositClaimRepo, "listDue">;
  signal?: AbortSignal;
  nowFn?: () => Date;
  logger?: ComponentLogger;
};

export type DepositDiscoverySummary = {
  scanned: number;
  credited: number;
  creditDeferred: number;
  rejected: number;
  stillPending: number;
  alreadyFinal: number;
  errors: number;
  aborted: boolean;
  events: DepositProcessEvent[];
};

const defaultLogger = createComponentLogger("deposit-discovery");

/**
 * Runs every claim whose next attempt is due through the coordinator once.
 * A claim that throws is counted and left for the next pass; an abort ends the pass early.
 */
export async function runDepositDiscovery(options: DepositDiscoveryOptions): Promise<DepositDiscoverySummary> {
  const nowFn = options.nowFn ?? (() => new Date());
  const logger = options.logger ?? defaultLogger;
  const due = await options.depositClaimRepo.listDue(nowFn(), { limit: options.limit });

  const summary: DepositDiscoverySummary = {
    scanned: 0,
    credited: 0,
    creditDeferred: 0,
    rejected: 0,
    stillPending: 0,
    alreadyFinal: 0,
    errors: 0,
    aborted: false,
    events: [],
  };

  for (const claim of due) {
    if (options.signal?.aborted) {
      summary.aborted = true;
      break;
    }
    summary.scanned += 1;

    try {
      const outcome = await options.coordinator.processDepositClaim(claim.txHash, { signal: options.signal });
      summary.events.push(createDepositProcessEvent(outcome));
      switch (outcome.status) {
        case "credited":
          summary.credited += 1;
          break;
        case "credit_deferred":
          summary.creditDeferred += 1;
          break;
        case "rejected":
          summary.rejected += 1;
          break;
        case "pending":
          summary.stillPending += 1;
          break;
        case "already_final":
          summary.alreadyFinal += 1;
          break;
      }
    } catch (error) {
      if (error instanceof VerificationAbortedError) {
        summary.aborted = true;
        break;
      }
      summary.errors += 1;
      logger.error("deposit.discovery.claim_failed", {
        txHash: claim.txHash,
        accountId: claim.accountId,
        error: errorMessage(error),
      });
    }
  }

  logger.info("deposit.discovery.summary", {
    limit: options.limit,
    scanned: summary.scanned,
    credited: summary.credited,
    creditDeferred: summary.creditDeferred,
    rejected: summary.rejected,
    stillPending: summary.stillPending,
    alreadyFinal: summary.alreadyFinal,
    errors: summary.errors,
    aborted: summary.aborted,
  });

  return summary;
}
