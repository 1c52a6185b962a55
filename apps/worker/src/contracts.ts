import type { DepositProcessOutcome } from "@cid-ledger/ledger-core";

export type DepositProcessStatus = DepositProcessOutcome["status"];

export type DepositProcessEvent = {
  type: "deposit.process";
  txHash: string;
  accountId: string;
  status: DepositProcessStatus;
  claimStatus: string;
  ledgerCreditApplied: boolean;
  verdict?: string;
  rejectionReason?: string;
  nextAttemptAt?: string | null;
  error?: string;
};

export function createDepositProcessEvent(outcome: DepositProcessOutcome): DepositProcessEvent {
  const { claim } = outcome;
  const event: DepositProcessEvent = {
    type: "deposit.process",
    txHash: claim.txHash,
    accountId: claim.accountId,
    status: outcome.status,
    claimStatus: claim.status,
    ledgerCreditApplied: outcome.status === "credited" && outcome.ledger.applied,
  };

  if (claim.lastVerdict !== null) {
    event.verdict = claim.lastVerdict;
  }
  if (claim.rejectionReason !== null) {
    event.rejectionReason = claim.rejectionReason;
  }
  if (outcome.status === "pending") {
    event.nextAttemptAt = claim.nextAttemptAt?.toISOString() ?? null;
  }
  if (outcome.status === "credit_deferred") {
    event.error = outcome.error;
  }

  return event;
}
