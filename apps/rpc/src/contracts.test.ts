import { describe, expect, it } from "vitest";
import {
  ConversionRequestParamsSchema,
  DepositClaimParamsSchema,
  DepositClaimResultSchema,
  PricingListResultSchema,
  RpcErrorCode,
  RpcRequestSchema,
  VoucherRedeemParamsSchema,
} from "./contracts";

describe("rpc contracts", () => {
  it("validates canonical rpc request shape", () => {
    const parsed = RpcRequestSchema.safeParse({
      jsonrpc: "2.0",
      id: "1",
      method: "balance.get",
      params: { accountId: "alice" },
    });
    expect(parsed.success).toBe(true);
    expect(RpcRequestSchema.safeParse({ jsonrpc: "1.0", id: 1, method: "balance.get" }).success).toBe(false);
  });

  it("requires exactly one of expected amount or package on deposit claims", () => {
    expect(DepositClaimParamsSchema.safeParse({ accountId: "alice", txHash: "abc", expectedAmount: "50" }).success).toBe(
      true,
    );
    expect(DepositClaimParamsSchema.safeParse({ accountId: "alice", txHash: "abc", packageId: "large" }).success).toBe(true);

    const neither = DepositClaimParamsSchema.safeParse({ accountId: "alice", txHash: "abc" });
    expect(neither.success).toBe(false);
    if (!neither.success) {
      expect(neither.error.issues[0]?.message).toBe("exactly one of expectedAmount or packageId is required");
    }
    expect(
      DepositClaimParamsSchema.safeParse({ accountId: "alice", txHash: "abc", expectedAmount: "-5" }).success,
    ).toBe(false);
  });

  it("pins deposit.claim result contract", () => {
    expect(
      DepositClaimResultSchema.safeParse({
        created: true,
        claim: {
          txHash: "abc",
          accountId: "alice",
          expectedAmount: "7",
          actualAmount: null,
          packageId: "large",
          status: "pending",
          rejectionReason: null,
          guidance: "Waiting for the transaction to be confirmed.",
          createdAt: "2026-05-01T10:00:00.000Z",
          creditedAt: null,
        },
        quote: { packageId: "large", name: "Large pack", unitCount: 100, cost: "7", catalogVersion: 1 },
      }).success,
    ).toBe(true);
  });

  it("pins voucher, conversion and pricing payloads", () => {
    expect(VoucherRedeemParamsSchema.safeParse({ accountId: "alice", code: "" }).success).toBe(false);
    expect(
      ConversionRequestParamsSchema.safeParse({ accountId: "alice", requestId: "req-1", installationId: "1234-5678" })
        .success,
    ).toBe(true);
    expect(
      PricingListResultSchema.safeParse({
        catalogVersion: 0,
        packages: [],
      }).success,
    ).toBe(true);
  });

  it("keeps domain error codes in the server-defined range", () => {
    const domainCodes = [
      RpcErrorCode.UNAUTHORIZED,
      RpcErrorCode.INSUFFICIENT_FUNDS,
      RpcErrorCode.ACCOUNT_SUSPENDED,
      RpcErrorCode.INVALID_VOUCHER,
      RpcErrorCode.CONVERSION_REQUEST_CONFLICT,
    ];
    for (const code of domainCodes) {
      expect(code).toBeLessThanOrEqual(-32000);
      expect(code).toBeGreaterThanOrEqual(-32099);
    }
    expect(new Set(Object.values(RpcErrorCode)).size).toBe(Object.keys(RpcErrorCode).length);
  });
});
