import { describe, expect, it } from "vitest";
import type { DepositClaimRecord } from "@cid-ledger/db";
import { depositGuidance, toDepositClaimView } from "./deposit";

function claim(overrides: Partial<DepositClaimRecord> = {}): DepositClaimRecord {
  return {
    id: "claim-1",
    txHash: "abc123",
    accountId: "alice",
    expectedAmount: "50",
    packageId: null,
    actualAmount: null,
    status: "pending",
    rejectionReason: null,
    lastVerdict: null,
    lastError: null,
    attemptCount: 0,
    nextAttemptAt: new Date("2026-05-01T10:00:00.000Z"),
    createdAt: new Date("2026-05-01T10:00:00.000Z"),
    updatedAt: new Date("2026-05-01T10:00:00.000Z"),
    verifiedAt: null,
    creditedAt: null,
    ...overrides,
  };
}

describe("deposit method views", () => {
  it("explains rejections by reason", () => {
    expect(depositGuidance(claim({ status: "rejected", rejectionReason: "underpaid" }))).toBe(
      "The transferred amount is below the expected amount.",
    );
    expect(depositGuidance(claim({ status: "rejected", rejectionReason: "something_else" }))).toBeNull();
    expect(depositGuidance(claim({ status: "verified" }))).toBe("Payment confirmed; the balance will be credited shortly.");
  });

  it("renders credited claims without guidance", () => {
    const view = toDepositClaimView(
      claim({
        status: "credited",
        actualAmount: "50",
        creditedAt: new Date("2026-05-01T10:05:00.000Z"),
      }),
    );

    expect(view).toEqual({
      txHash: "abc123",
      accountId: "alice",
      expectedAmount: "50",
      actualAmount: "50",
      packageId: null,
      status: "credited",
      rejectionReason: null,
      guidance: null,
      createdAt: "2026-05-01T10:00:00.000Z",
      creditedAt: "2026-05-01T10:05:00.000Z",
    });
  });
});
