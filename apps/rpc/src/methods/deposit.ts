import type { DepositClaimRecord } from "@cid-ledger/db";
import type { PackageQuote, TransactionCoordinator } from "@cid-ledger/ledger-core";
import type { z } from "zod";
import type { DepositClaimResultSchema, DepositClaimViewSchema } from "../contracts";

export type DepositClaimView = z.infer<typeof DepositClaimViewSchema>;
export type DepositClaimResult = z.infer<typeof DepositClaimResultSchema>;

export type HandleDepositClaimInput = {
  accountId: string;
  txHash: string;
  expectedAmount?: string;
  packageId?: string;
};

export type HandleDepositStatusInput = {
  txHash: string;
};

type DepositMethodOptions = {
  coordinator: Pick<TransactionCoordinator, "submitDepositClaim" | "getDepositClaim">;
};

const REJECTION_GUIDANCE: Record<string, string> = {
  missing_transaction: "The transaction was not found on chain. Check the hash and claim again once it is broadcast.",
  no_matching_transfer: "The transaction does not pay the deposit address.",
  lookup_rejected: "The chain provider rejected the transaction hash.",
  below_minimum: "The transferred amount is below the minimum deposit.",
  underpaid: "The transferred amount is below the expected amount.",
};

export function depositGuidance(claim: DepositClaimRecord): string | null {
  switch (claim.status) {
    case "pending":
      return "Waiting for the transaction to be confirmed.";
    case "verified":
      return "Payment confirmed; the balance will be credited shortly.";
    case "rejected":
      return claim.rejectionReason ? (REJECTION_GUIDANCE[claim.rejectionReason] ?? null) : null;
    case "credited":
      return null;
  }
}

export function toDepositClaimView(claim: DepositClaimRecord): DepositClaimView {
  return {
    txHash: claim.txHash,
    accountId: claim.accountId,
    expectedAmount: claim.expectedAmount,
    actualAmount: claim.actualAmount,
    packageId: claim.packageId,
    status: claim.status,
    rejectionReason: claim.rejectionReason,
    guidance: depositGuidance(claim),
    createdAt: claim.createdAt.toISOString(),
    creditedAt: claim.creditedAt?.toISOString() ?? null,
  };
}

function toQuoteView(quote: PackageQuote | null) {
  if (!quote) {
    return null;
  }
  return {
    packageId: quote.packageId,
    name: quote.name,
    unitCount: quote.unitCount,
    cost: quote.cost,
    catalogVersion: quote.catalogVersion,
  };
}

export async function handleDepositClaim(
  input: HandleDepositClaimInput,
  options: DepositMethodOptions,
): Promise<DepositClaimResult> {
  const submission = await options.coordinator.submitDepositClaim(input);
  return {
    created: submission.created,
    claim: toDepositClaimView(submission.claim),
    quote: toQuoteView(submission.quote),
  };
}

export async function handleDepositStatus(
  input: HandleDepositStatusInput,
  options: DepositMethodOptions,
): Promise<DepositClaimView> {
  const claim = await options.coordinator.getDepositClaim(input.txHash);
  return toDepositClaimView(claim);
}
