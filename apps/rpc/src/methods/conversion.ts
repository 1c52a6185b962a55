import { ConversionDebitNotFoundError } from "@cid-ledger/db";
import type { ConversionOutcome, TransactionCoordinator } from "@cid-ledger/ledger-core";
import type { z } from "zod";
import type { ConversionResultSchema } from "../contracts";

export type ConversionResult = z.infer<typeof ConversionResultSchema>;

export type HandleConversionRequestInput = {
  accountId: string;
  requestId: string;
  installationId: string;
  packageId?: string;
};

export type HandleConversionStatusInput = {
  requestId: string;
};

type ConversionMethodOptions = {
  coordinator: Pick<TransactionCoordinator, "requestConversion" | "getConversion">;
};

export function toConversionResult(outcome: ConversionOutcome): ConversionResult {
  const { debit } = outcome;
  return {
    requestId: debit.requestId,
    status: outcome.status,
    packageId: debit.packageId,
    amount: debit.reservedAmount,
    confirmationId: outcome.status === "finalized" ? outcome.confirmationId : null,
    releaseReason: outcome.status === "released" ? outcome.reason : null,
  };
}

export async function handleConversionRequest(
  input: HandleConversionRequestInput,
  options: ConversionMethodOptions,
): Promise<ConversionResult> {
  return toConversionResult(await options.coordinator.requestConversion(input));
}

export async function handleConversionStatus(
  input: HandleConversionStatusInput,
  options: ConversionMethodOptions,
): Promise<ConversionResult> {
  const outcome = await options.coordinator.getConversion(input.requestId);
  if (!outcome) {
    throw new ConversionDebitNotFoundError(input.requestId);
  }
  return toConversionResult(outcome);
}
