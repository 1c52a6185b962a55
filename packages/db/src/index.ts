export * from "./amount";
export * from "./client";
export * from "./conversion-debit-repo";
export * from "./deposit-claim-repo";
export * from "./idempotency";
export * from "./ledger-repo";
export * from "./pricing-catalog-repo";
export * from "./schema";
export * from "./voucher-repo";
