import { describe, expect, it } from "vitest";
import type { DepositClaimRecord } from "@cid-ledger/db";
import { createDepositProcessEvent } from "./contracts";

function claim(overrides: Partial<DepositClaimRecord> = {}): DepositClaimRecord {
  const createdAt = new Date("2026-05-01T00:00:00.000Z");
  return {
    id: "claim-1",
    txHash: "abc",
    accountId: "u1",
    expectedAmount: "50",
    packageId: null,
    actualAmount: null,
    status: "pending",
    rejectionReason: null,
    lastVerdict: null,
    lastError: null,
    attemptCount: 0,
    nextAttemptAt: null,
    createdAt,
    updatedAt: createdAt,
    verifiedAt: null,
    creditedAt: null,
    ...overrides,
  };
}

describe("worker deposit contracts", () => {
  it("builds canonical deposit process event payload for a credit", () => {
    const credited = claim({ status: "credited", actualAmount: "50", lastVerdict: "confirmed:50" });
    const event = createDepositProcessEvent({
      status: "credited",
      claim: credited,
      ledger: {
        applied: true,
        event: {
          id: "evt-1",
          accountId: "u1",
          kind: "deposit_credit",
          amount: "50",
          resultingBalance: "50",
          idempotencyKey: "deposit:credit:abc",
          externalReference: "abc",
          metadata: null,
          createdAt: credited.createdAt,
        },
        account: {
          id: "u1",
          balance: "50",
          status: "active",
          version: 1,
          suspendedAt: null,
          suspendedReason: null,
          createdAt: credited.createdAt,
          updatedAt: credited.createdAt,
        },
      },
    });

    expect(event).toEqual({
      type: "deposit.process",
      txHash: "abc",
      accountId: "u1",
      status: "credited",
      claimStatus: "credited",
      ledgerCreditApplied: true,
      verdict: "confirmed:50",
    });
  });

  it("carries the next attempt time for pending claims", () => {
    const event = createDepositProcessEvent({
      status: "pending",
      claim: claim({ lastVerdict: "pending:0/1", nextAttemptAt: new Date("2026-05-01T00:01:00.000Z") }),
      verdict: { kind: "pending", confirmations: 0, required: 1 },
    });

    expect(event).toMatchObject({
      status: "pending",
      ledgerCreditApplied: false,
      verdict: "pending:0/1",
      nextAttemptAt: "2026-05-01T00:01:00.000Z",
    });
  });

  it("carries the rejection reason and the deferred credit error", () => {
    const rejected = createDepositProcessEvent({
      status: "rejected",
      claim: claim({ status: "rejected", rejectionReason: "missing_transaction" }),
      verdict: { kind: "not_found", reason: "missing_transaction" },
    });
    const deferred = createDepositProcessEvent({
      status: "credit_deferred",
      claim: claim({ status: "verified", actualAmount: "50" }),
      error: "connection reset",
    });

    expect(rejected.rejectionReason).toBe("missing_transaction");
    expect(deferred).toMatchObject({ claimStatus: "verified", error: "connection reset" });
    expect(deferred).not.toHaveProperty("nextAttemptAt");
  });
});
