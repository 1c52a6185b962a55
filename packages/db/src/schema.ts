import { boolean, index, integer, jsonb, numeric, pgEnum, pgTable, text, timestamp, uniqueIndex, uuid } from "drizzle-orm/pg-core";

export const adminRoleEnum = pgEnum("admin_role", ["SUPER_ADMIN", "OPERATOR"]);
export type AdminRole = (typeof adminRoleEnum.enumValues)[number];

export const accountStatusEnum = pgEnum("account_status", ["active", "suspended"]);
export type AccountStatus = (typeof accountStatusEnum.enumValues)[number];

export const ledgerEventKindEnum = pgEnum("ledger_event_kind", [
  "deposit_credit",
  "debit",
  "refund",
  "voucher_credit",
  "adjustment",
]);
export type LedgerEventKind = (typeof ledgerEventKindEnum.enumValues)[number];

export const depositClaimStatusEnum = pgEnum("deposit_claim_status", ["pending", "verified", "rejected", "credited"]);
export type DepositClaimStatus = (typeof depositClaimStatusEnum.enumValues)[number];

export const voucherStatusEnum = pgEnum("voucher_status", ["unused", "used"]);
export type VoucherStatus = (typeof voucherStatusEnum.enumValues)[number];

export const conversionDebitStatusEnum = pgEnum("conversion_debit_status", ["reserved", "finalized", "released"]);
export type ConversionDebitStatus = (typeof conversionDebitStatusEnum.enumValues)[number];

export const accounts = pgTable(
  "accounts",
  {
    id: text("id").primaryKey(),
    balance: numeric("balance").notNull().default("0"),
    status: accountStatusEnum("status").notNull().default("active"),
    version: integer("version").notNull().default(0),
    suspendedAt: timestamp("suspended_at"),
    suspendedReason: text("suspended_reason"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    byStatus: index("accounts_status_idx").on(table.status),
  }),
);

export const ledgerEvents = pgTable(
  "ledger_events",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    accountId: text("account_id")
      .notNull()
      .references(() => accounts.id),
    kind: ledgerEventKindEnum("kind").notNull(),
    amount: numeric("amount").notNull(),
    resultingBalance: numeric("resulting_balance").notNull(),
    externalReference: text("external_reference"),
    idempotencyKey: text("idempotency_key").notNull(),
    metadata: jsonb("metadata").$type<Record<string, unknown> | null>(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    idempotencyUnique: uniqueIndex("ledger_events_idempotency_key_unique").on(table.idempotencyKey),
    byAccountCreatedAt: index("ledger_events_account_created_at_idx").on(table.accountId, table.createdAt, table.id),
    byReference: index("ledger_events_external_reference_idx").on(table.externalReference),
  }),
);

export const depositClaims = pgTable(
  "deposit_claims",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    txHash: text("tx_hash").notNull(),
    accountId: text("account_id").notNull(),
    expectedAmount: numeric("expected_amount").notNull(),
    packageId: text("package_id"),
    actualAmount: numeric("actual_amount"),
    status: depositClaimStatusEnum("status").notNull(),
    rejectionReason: text("rejection_reason"),
    lastVerdict: text("last_verdict"),
    lastError: text("last_error"),
    attemptCount: integer("attempt_count").notNull().default(0),
    nextAttemptAt: timestamp("next_attempt_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
    verifiedAt: timestamp("verified_at"),
    creditedAt: timestamp("credited_at"),
  },
  (table) => ({
    txHashUnique: uniqueIndex("deposit_claims_tx_hash_unique").on(table.txHash),
    byStatusNextAttempt: index("deposit_claims_status_next_attempt_at_idx").on(
      table.status,
      table.nextAttemptAt,
      table.createdAt,
    ),
    byAccountCreatedAt: index("deposit_claims_account_created_at_idx").on(table.accountId, table.createdAt),
  }),
);

export const vouchers = pgTable(
  "vouchers",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    code: text("code").notNull(),
    value: numeric("value").notNull(),
    status: voucherStatusEnum("status").notNull().default("unused"),
    createdBy: text("created_by").notNull(),
    redeemedBy: text("redeemed_by"),
    redeemedAt: timestamp("redeemed_at"),
    expiresAt: timestamp("expires_at"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    codeUnique: uniqueIndex("vouchers_code_unique").on(table.code),
    byStatus: index("vouchers_status_idx").on(table.status, table.createdAt),
  }),
);

export const conversionDebits = pgTable(
  "conversion_debits",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    requestId: text("request_id").notNull(),
    accountId: text("account_id").notNull(),
    packageId: text("package_id").notNull(),
    unitCount: integer("unit_count").notNull(),
    reservedAmount: numeric("reserved_amount").notNull(),
    installationId: text("installation_id").notNull(),
    confirmationId: text("confirmation_id"),
    status: conversionDebitStatusEnum("status").notNull(),
    releaseReason: text("release_reason"),
    lastError: text("last_error"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
    settledAt: timestamp("settled_at"),
  },
  (table) => ({
    requestIdUnique: uniqueIndex("conversion_debits_request_id_unique").on(table.requestId),
    byStatusCreatedAt: index("conversion_debits_status_created_at_idx").on(table.status, table.createdAt),
  }),
);

export const pricingPackages = pgTable(
  "pricing_packages",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    catalogVersion: integer("catalog_version").notNull(),
    packageId: text("package_id").notNull(),
    name: text("name").notNull(),
    unitCount: integer("unit_count").notNull(),
    cost: numeric("cost").notNull(),
    active: boolean("active").notNull().default(true),
    createdBy: text("created_by"),
    createdAt: timestamp("created_at").defaultNow().notNull(),
  },
  (table) => ({
    versionPackageUnique: uniqueIndex("pricing_packages_version_package_unique").on(table.catalogVersion, table.packageId),
    byVersion: index("pricing_packages_catalog_version_idx").on(table.catalogVersion),
  }),
);
