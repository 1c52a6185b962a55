const DEPOSIT_CREDIT_PREFIX = "deposit:credit";
const VOUCHER_CREDIT_PREFIX = "voucher:credit";
const CONVERSION_RESERVE_PREFIX = "conversion:reserve";
const CONVERSION_RELEASE_PREFIX = "conversion:release";
const ADJUSTMENT_PREFIX = "admin:adjustment";

export type IdempotencyKeyKind =
  | "deposit_credit"
  | "voucher_credit"
  | "conversion_reserve"
  | "conversion_release"
  | "adjustment";

const PREFIX_BY_KIND: Record<IdempotencyKeyKind, string> = {
  deposit_credit: DEPOSIT_CREDIT_PREFIX,
  voucher_credit: VOUCHER_CREDIT_PREFIX,
  conversion_reserve: CONVERSION_RESERVE_PREFIX,
  conversion_release: CONVERSION_RELEASE_PREFIX,
  adjustment: ADJUSTMENT_PREFIX,
};

export function depositCreditIdempotencyKey(txHash: string): string {
  return `${DEPOSIT_CREDIT_PREFIX}:${txHash}`;
}

export function voucherCreditIdempotencyKey(code: string): string {
  return `${VOUCHER_CREDIT_PREFIX}:${code}`;
}

export function conversionReserveIdempotencyKey(requestId: string): string {
  return `${CONVERSION_RESERVE_PREFIX}:${requestId}`;
}

export function conversionReleaseIdempotencyKey(requestId: string): string {
  return `${CONVERSION_RELEASE_PREFIX}:${requestId}`;
}

export function adjustmentIdempotencyKey(adjustmentId: string): string {
  return `${ADJUSTMENT_PREFIX}:${adjustmentId}`;
}

export function parseIdempotencyKey(key: string): { kind: IdempotencyKeyKind; reference: string } | null {
  for (const [kind, prefix] of Object.entries(PREFIX_BY_KIND)) {
    if (!key.startsWith(`${prefix}:`)) {
      continue;
    }
    const reference = key.slice(prefix.length + 1).trim();
    if (!reference) {
      return null;
    }
    if (isIdempotencyKeyKind(kind)) {
      return { kind, reference };
    }
  }
  return null;
}

function isIdempotencyKeyKind(value: string): value is IdempotencyKeyKind {
  return value in PREFIX_BY_KIND;
}
