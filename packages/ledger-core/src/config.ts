import { assertPositiveAmount, normalizeDecimal, parseDecimal } from "@cid-ledger/db";
import { assertRetryPolicy, type RetryPolicy } from "./retry-policy";

export type UnderpaymentPolicy = "credit_actual" | "reject" | "await_top_up";

const UNDERPAYMENT_POLICIES: UnderpaymentPolicy[] = ["credit_actual", "reject", "await_top_up"];

export type LedgerConfig = {
  depositAddress: string;
  requiredConfirmations: number;
  amountTolerance: string;
  minimumDepositAmount: string;
  underpaymentPolicy: UnderpaymentPolicy;
  depositRecheckDelayMs: number;
  verifyRetry: RetryPolicy;
  creditRetryAttempts: number;
  defaultPackageId: string;
};

function parseInteger(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name];
  const value = raw === undefined ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`Invalid ${name}: expected integer >= ${min}`);
  }
  return value;
}

function parseAmount(env: NodeJS.ProcessEnv, name: string, fallback: string, allowZero: boolean): string {
  const raw = (env[name] ?? fallback).trim();
  try {
    if (allowZero && parseDecimal(raw).value === 0n) {
      return "0";
    }
    assertPositiveAmount(raw);
  } catch {
    throw new Error(`Invalid ${name}: expected a ${allowZero ? "non-negative" : "positive"} decimal amount`);
  }
  return normalizeDecimal(raw);
}

function parseUnderpaymentPolicy(env: NodeJS.ProcessEnv): UnderpaymentPolicy {
  const raw = (env.DEPOSIT_UNDERPAYMENT_POLICY ?? "credit_actual").trim().toLowerCase();
  const match = UNDERPAYMENT_POLICIES.find((policy) => policy === raw);
  if (match) {
    return match;
  }
  throw new Error(
    `Invalid DEPOSIT_UNDERPAYMENT_POLICY: expected one of ${UNDERPAYMENT_POLICIES.join(", ")}, received "${raw}"`,
  );
}

export function parseLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const depositAddress = (env.DEPOSIT_ADDRESS ?? "").trim();
  if (!depositAddress) {
    throw new Error("DEPOSIT_ADDRESS is required");
  }
  const defaultPackageId = (env.CONVERSION_DEFAULT_PACKAGE ?? "single").trim();
  if (!defaultPackageId) {
    throw new Error("CONVERSION_DEFAULT_PACKAGE must not be empty");
  }

  const initialDelayMs = parseInteger(env, "VERIFY_INITIAL_DELAY_MS", 500, 0);
  const verifyRetry = assertRetryPolicy({
    maxAttempts: parseInteger(env, "VERIFY_MAX_ATTEMPTS", 4, 1),
    initialDelayMs,
    maxDelayMs: parseInteger(env, "VERIFY_MAX_DELAY_MS", Math.max(8_000, initialDelayMs), initialDelayMs),
    multiplier: 2,
  });

  return {
    depositAddress,
    requiredConfirmations: parseInteger(env, "DEPOSIT_REQUIRED_CONFIRMATIONS", 1, 0),
    amountTolerance: parseAmount(env, "DEPOSIT_AMOUNT_TOLERANCE", "0.01", true),
    minimumDepositAmount: parseAmount(env, "DEPOSIT_MINIMUM_AMOUNT", "5", true),
    underpaymentPolicy: parseUnderpaymentPolicy(env),
    depositRecheckDelayMs: parseInteger(env, "DEPOSIT_RECHECK_DELAY_MS", 60_000, 1),
    verifyRetry,
    creditRetryAttempts: parseInteger(env, "CREDIT_RETRY_ATTEMPTS", 3, 1),
    defaultPackageId,
  };
}
