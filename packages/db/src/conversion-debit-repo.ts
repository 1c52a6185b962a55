import { randomUUID } from "crypto";
import { and, asc, eq, gt, lte } from "drizzle-orm";
import { normalizeDecimal } from "./amount";
import type { DbClient } from "./client";
import { conversionReleaseIdempotencyKey, conversionReserveIdempotencyKey } from "./idempotency";
import { createDbLedgerRepo, type LedgerRepo, type LedgerWriteResult } from "./ledger-repo";
import { conversionDebits, type ConversionDebitStatus } from "./schema";

export type ConversionReleaseReason = "provider_failure" | "provider_timeout" | "provider_rejected" | "stale_reservation";

export type ReserveConversionInput = {
  requestId: string;
  accountId: string;
  packageId: string;
  unitCount: number;
  amount: string;
  installationId: string;
  now?: Date;
};

export type ConversionDebitRecord = {
  id: string;
  requestId: string;
  accountId: string;
  packageId: string;
  unitCount: number;
  reservedAmount: string;
  installationId: string;
  confirmationId: string | null;
  status: ConversionDebitStatus;
  releaseReason: string | null;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
  settledAt: Date | null;
};

export type ConversionReserveResult = {
  created: boolean;
  debit: ConversionDebitRecord;
  ledger: LedgerWriteResult | null;
};

export type ConversionReleaseResult = {
  debit: ConversionDebitRecord;
  ledger: LedgerWriteResult;
};

export class ConversionDebitNotFoundError extends Error {
  constructor(public readonly requestId: string) {
    super("conversion debit not found");
    this.name = "ConversionDebitNotFoundError";
  }
}

export class ConversionDebitTransitionError extends Error {
  constructor(
    public readonly targetStatus: ConversionDebitStatus,
    public readonly currentStatus: string,
    public readonly requestId: string,
  ) {
    super(`invalid conversion debit transition to ${targetStatus} from ${currentStatus}`);
    this.name = "ConversionDebitTransitionError";
  }
}

export type ConversionDebitRepo = {
  reserve(input: ReserveConversionInput): Promise<ConversionReserveResult>;
  findByRequestId(requestId: string): Promise<ConversionDebitRecord | null>;
  markFinalized(requestId: string, params: { now: Date; confirmationId: string }): Promise<ConversionDebitRecord>;
  release(
    requestId: string,
    params: { now: Date; reason: ConversionReleaseReason; error?: string | null },
  ): Promise<ConversionReleaseResult>;
  listStaleReservations(params: { olderThan: Date; limit: number }): Promise<ConversionDebitRecord[]>;
  listByStatus(status: ConversionDebitStatus, options: { limit: number; after?: string }): Promise<ConversionDebitRecord[]>;
  __resetForTests?: () => void;
};

type ConversionDebitRow = typeof conversionDebits.$inferSelect;

function toRecord(row: ConversionDebitRow): ConversionDebitRecord {
  return {
    id: row.id,
    requestId: row.requestId,
    accountId: row.accountId,
    packageId: row.packageId,
    unitCount: row.unitCount,
    reservedAmount: normalizeDecimal(row.reservedAmount),
    installationId: row.installationId,
    confirmationId: row.confirmationId,
    status: row.status,
    releaseReason: row.releaseReason,
    lastError: row.lastError,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    settledAt: row.settledAt,
  };
}

function reserveInput(input: ReserveConversionInput, now: Date) {
  return {
    accountId: input.accountId,
    amount: input.amount,
    kind: "debit" as const,
    externalReference: input.requestId,
    idempotencyKey: conversionReserveIdempotencyKey(input.requestId),
    metadata: { packageId: input.packageId, unitCount: input.unitCount },
    now,
  };
}

function refundInput(debit: ConversionDebitRecord, reason: ConversionReleaseReason, now: Date) {
  return {
    accountId: debit.accountId,
    amount: debit.reservedAmount,
    kind: "refund" as const,
    externalReference: debit.requestId,
    idempotencyKey: conversionReleaseIdempotencyKey(debit.requestId),
    metadata: { reason },
    now,
  };
}

async function throwInvalidTransition(db: DbClient, requestId: string, targetStatus: ConversionDebitStatus): Promise<never> {
  const [existing] = await db
    .select()
    .from(conversionDebits)
    .where(eq(conversionDebits.requestId, requestId))
    .limit(1);
  if (!existing) {
    throw new ConversionDebitNotFoundError(requestId);
  }
  throw new ConversionDebitTransitionError(targetStatus, existing.status, requestId);
}

export function createDbConversionDebitRepo(db: DbClient): ConversionDebitRepo {
  async function findByRequestId(requestId: string): Promise<ConversionDebitRecord | null> {
    const [row] = await db
      .select()
      .from(conversionDebits)
      .where(eq(conversionDebits.requestId, requestId))
      .limit(1);
    return row ? toRecord(row) : null;
  }

  return {
    async reserve(input) {
      const now = input.now ?? new Date();
      const existing = await findByRequestId(input.requestId);
      if (existing) {
        return { created: false, debit: existing, ledger: null };
      }

      // Record and debit commit together; InsufficientFundsError rolls both back.
      const reserved = await db.transaction(async (tx): Promise<ConversionReserveResult | null> => {
        const [row] = await tx
          .insert(conversionDebits)
          .values({
            requestId: input.requestId,
            accountId: input.accountId,
            packageId: input.packageId,
            unitCount: input.unitCount,
            reservedAmount: normalizeDecimal(input.amount),
            installationId: input.installationId,
            status: "reserved",
            createdAt: now,
            updatedAt: now,
          })
          .onConflictDoNothing({ target: conversionDebits.requestId })
          .returning();
        if (!row) {
          return null;
        }
        const ledger = await createDbLedgerRepo(tx).debit(reserveInput(input, now));
        return { created: true, debit: toRecord(row), ledger };
      });
      if (reserved) {
        return reserved;
      }

      const concurrent = await findByRequestId(input.requestId);
      if (!concurrent) {
        throw new ConversionDebitNotFoundError(input.requestId);
      }
      return { created: false, debit: concurrent, ledger: null };
    },

    findByRequestId,

    async markFinalized(requestId, params) {
      const [row] = await db
        .update(conversionDebits)
        .set({
          status: "finalized",
          confirmationId: params.confirmationId,
          updatedAt: params.now,
          settledAt: params.now,
        })
        .where(and(eq(conversionDebits.requestId, requestId), eq(conversionDebits.status, "reserved")))
        .returning();
      if (!row) {
        await throwInvalidTransition(db, requestId, "finalized");
      }
      return toRecord(row);
    },

    async release(requestId, params) {
      return db.transaction(async (tx) => {
        const [row] = await tx
          .update(conversionDebits)
          .set({
            status: "released",
            releaseReason: params.reason,
            lastError: params.error ?? null,
            updatedAt: params.now,
            settledAt: params.now,
          })
          .where(and(eq(conversionDebits.requestId, requestId), eq(conversionDebits.status, "reserved")))
          .returning();
        if (!row) {
          await throwInvalidTransition(tx, requestId, "released");
        }

        const debit = toRecord(row);
        const ledger = await createDbLedgerRepo(tx).credit(refundInput(debit, params.reason, params.now));
        return { debit, ledger };
      });
    },

    async listStaleReservations(params) {
      const rows = await db
        .select()
        .from(conversionDebits)
        .where(and(eq(conversionDebits.status, "reserved"), lte(conversionDebits.createdAt, params.olderThan)))
        .orderBy(asc(conversionDebits.createdAt), asc(conversionDebits.id))
        .limit(params.limit);
      return rows.map(toRecord);
    },

    async listByStatus(status, options) {
      const rows = await db
        .select()
        .from(conversionDebits)
        .where(
          options.after
            ? and(eq(conversionDebits.status, status), gt(conversionDebits.requestId, options.after))
            : eq(conversionDebits.status, status),
        )
        .orderBy(asc(conversionDebits.requestId))
        .limit(options.limit);
      return rows.map(toRecord);
    },
  };
}

export function createInMemoryConversionDebitRepo(deps: { ledgerRepo: LedgerRepo }): ConversionDebitRepo {
  const byRequestId = new Map<string, ConversionDebitRecord>();

  function clone(record: ConversionDebitRecord): ConversionDebitRecord {
    return {
      ...record,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
      settledAt: record.settledAt ? new Date(record.settledAt) : null,
    };
  }

  function getForTransition(requestId: string, target: ConversionDebitStatus): ConversionDebitRecord {
    const record = byRequestId.get(requestId);
    if (!record) {
      throw new ConversionDebitNotFoundError(requestId);
    }
    if (record.status !== "reserved") {
      throw new ConversionDebitTransitionError(target, record.status, requestId);
    }
    return record;
  }

  return {
    async reserve(input) {
      const now = input.now ?? new Date();
      const existing = byRequestId.get(input.requestId);
      if (existing) {
        return { created: false, debit: clone(existing), ledger: null };
      }

      const ledger = await deps.ledgerRepo.debit(reserveInput(input, now));
      // The debit is keyed by request id, so a racing duplicate only observes the first record.
      const raced = byRequestId.get(input.requestId);
      if (raced) {
        return { created: false, debit: clone(raced), ledger: null };
      }
      const record: ConversionDebitRecord = {
        id: randomUUID(),
        requestId: input.requestId,
        accountId: input.accountId,
        packageId: input.packageId,
        unitCount: input.unitCount,
        reservedAmount: normalizeDecimal(input.amount),
        installationId: input.installationId,
        confirmationId: null,
        status: "reserved",
        releaseReason: null,
        lastError: null,
        createdAt: now,
        updatedAt: now,
        settledAt: null,
      };
      byRequestId.set(record.requestId, record);
      return { created: true, debit: clone(record), ledger };
    },

    async findByRequestId(requestId) {
      const record = byRequestId.get(requestId);
      return record ? clone(record) : null;
    },

    async markFinalized(requestId, params) {
      const record = getForTransition(requestId, "finalized");
      record.status = "finalized";
      record.confirmationId = params.confirmationId;
      record.updatedAt = params.now;
      record.settledAt = params.now;
      return clone(record);
    },

    async release(requestId, params) {
      const record = getForTransition(requestId, "released");
      // Flip first so a concurrent finalize sees the release; the refund key makes a retry safe.
      record.status = "released";
      record.releaseReason = params.reason;
      record.lastError = params.error ?? null;
      record.updatedAt = params.now;
      record.settledAt = params.now;
      const ledger = await deps.ledgerRepo.credit(refundInput(clone(record), params.reason, params.now));
      return { debit: clone(record), ledger };
    },

    async listStaleReservations(params) {
      return [...byRequestId.values()]
        .filter((item) => item.status === "reserved" && item.createdAt <= params.olderThan)
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .slice(0, params.limit)
        .map(clone);
    },

    async listByStatus(status, options) {
      return [...byRequestId.values()]
        .filter((item) => item.status === status && (options.after === undefined || item.requestId > options.after))
        .sort((a, b) => (a.requestId < b.requestId ? -1 : a.requestId > b.requestId ? 1 : 0))
        .slice(0, options.limit)
        .map(clone);
    },

    __resetForTests() {
      byRequestId.clear();
    },
  };
}
