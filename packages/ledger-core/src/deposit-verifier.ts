import { setTimeout as sleep } from "timers/promises";
import { ChainLookupError, type ChainAdapter, type ChainTransaction } from "@cid-ledger/chain-adapter";
import { compareDecimalStrings, subtractDecimalStrings, sumDecimalStrings } from "@cid-ledger/db";
import { VerificationAbortedError } from "./errors";
import { errorMessage, type ComponentLogger } from "./logger";
import { computeBackoffDelayMs, type RetryPolicy } from "./retry-policy";

export type VerificationVerdict =
  | { kind: "confirmed"; actualAmount: string; confirmations: number }
  | { kind: "underpaid"; actualAmount: string; expectedAmount: string; confirmations: number }
  | { kind: "not_found"; reason: "missing_transaction" | "no_matching_transfer" | "lookup_rejected" }
  | { kind: "pending"; confirmations: number; required: number }
  | { kind: "provider_error"; message: string; attempts: number };

export type VerifyDepositArgs = {
  txHash: string;
  expectedAddress: string;
  expectedAmount: string;
};

export type DepositVerifier = {
  verify: (args: VerifyDepositArgs, options?: { signal?: AbortSignal }) => Promise<VerificationVerdict>;
};

export type CreateDepositVerifierArgs = {
  chainAdapter: ChainAdapter;
  requiredConfirmations: number;
  amountTolerance: string;
  retryPolicy: RetryPolicy;
  sleepFn?: (ms: number, signal?: AbortSignal) => Promise<void>;
  logger?: ComponentLogger;
};

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}

function judge(
  transaction: Extract<ChainTransaction, { found: true }>,
  args: VerifyDepositArgs,
  requiredConfirmations: number,
  amountTolerance: string,
): VerificationVerdict {
  const matching = transaction.transfers.filter((transfer) => transfer.toAddress === args.expectedAddress);
  if (matching.length === 0) {
    return { kind: "not_found", reason: "no_matching_transfer" };
  }
  if (!transaction.confirmed || transaction.confirmations < requiredConfirmations) {
    return { kind: "pending", confirmations: transaction.confirmations, required: requiredConfirmations };
  }

  const actualAmount = sumDecimalStrings(matching.map((transfer) => transfer.amount));
  const floor = subtractDecimalStrings(args.expectedAmount, amountTolerance);
  if (compareDecimalStrings(actualAmount, floor) < 0) {
    return {
      kind: "underpaid",
      actualAmount,
      expectedAmount: args.expectedAmount,
      confirmations: transaction.confirmations,
    };
  }
  return { kind: "confirmed", actualAmount, confirmations: transaction.confirmations };
}

/**
 * Looks a claimed transaction up on chain and classifies it against the expected transfer.
 *
 * Only retryable {@link ChainLookupError}s are retried; a lookup the provider refuses outright
 * ends as `not_found`, and anything else propagates. The verifier never
 * touches the ledger, so an aborted run leaves no trace beyond the thrown
 * {@link VerificationAbortedError}.
 */
export function createDepositVerifier(args: CreateDepositVerifierArgs): DepositVerifier {
  const sleepFn = args.sleepFn ?? defaultSleep;

  return {
    async verify(verifyArgs, options = {}) {
      const { signal } = options;
      let lastError: ChainLookupError | null = null;

      for (let attempt = 1; attempt <= args.retryPolicy.maxAttempts; attempt += 1) {
        if (signal?.aborted) {
          throw new VerificationAbortedError(verifyArgs.txHash, attempt - 1);
        }

        try {
          const transaction = await args.chainAdapter.lookupTransaction({ txHash: verifyArgs.txHash });
          if (!transaction.found) {
            return { kind: "not_found", reason: "missing_transaction" };
          }
          return judge(transaction, verifyArgs, args.requiredConfirmations, args.amountTolerance);
        } catch (error) {
          if (!(error instanceof ChainLookupError)) {
            throw error;
          }
          lastError = error;
          args.logger?.warn("deposit.verify.lookup_failed", {
            txHash: verifyArgs.txHash,
            attempt,
            status: error.status,
            retryable: error.retryable,
            error: error.message,
          });
          if (!error.retryable) {
            return { kind: "not_found", reason: "lookup_rejected" };
          }
        }

        if (attempt < args.retryPolicy.maxAttempts) {
          try {
            await sleepFn(computeBackoffDelayMs(args.retryPolicy, attempt), signal);
          } catch (error) {
            if (signal?.aborted) {
              throw new VerificationAbortedError(verifyArgs.txHash, attempt);
            }
            throw error;
          }
        }
      }

      return {
        kind: "provider_error",
        message: lastError ? errorMessage(lastError) : "chain lookup failed",
        attempts: args.retryPolicy.maxAttempts,
      };
    },
  };
}
