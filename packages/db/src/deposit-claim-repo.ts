import { randomUUID } from "crypto";
import { and, asc, eq, gt, inArray, isNull, lte, or, sql } from "drizzle-orm";
import { normalizeDecimal } from "./amount";
import type { DbClient } from "./client";
import { depositCreditIdempotencyKey } from "./idempotency";
import { createDbLedgerRepo, type LedgerRepo, type LedgerWriteResult } from "./ledger-repo";
import { depositClaims, type DepositClaimStatus } from "./schema";

export type CreateDepositClaimInput = {
  txHash: string;
  accountId: string;
  expectedAmount: string;
  packageId?: string | null;
  now?: Date;
};

export type DepositClaimRecord = {
  id: string;
  txHash: string;
  accountId: string;
  expectedAmount: string;
  packageId: string | null;
  actualAmount: string | null;
  status: DepositClaimStatus;
  rejectionReason: string | null;
  lastVerdict: string | null;
  lastError: string | null;
  attemptCount: number;
  nextAttemptAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
  verifiedAt: Date | null;
  creditedAt: Date | null;
};

export type DepositClaimCreateResult = { created: boolean; claim: DepositClaimRecord };

export type DepositClaimCreditResult = { claim: DepositClaimRecord; ledger: LedgerWriteResult };

export class DepositClaimNotFoundError extends Error {
  constructor(public readonly txHash: string) {
    super("deposit claim not found");
    this.name = "DepositClaimNotFoundError";
  }
}

export class DepositClaimTransitionError extends Error {
  constructor(
    public readonly targetStatus: DepositClaimStatus,
    public readonly currentStatus: string,
    public readonly txHash: string,
  ) {
    super(`invalid deposit claim transition to ${targetStatus} from ${currentStatus}`);
    this.name = "DepositClaimTransitionError";
  }
}

export type DepositClaimRepo = {
  create(input: CreateDepositClaimInput): Promise<DepositClaimCreateResult>;
  findByTxHash(txHash: string): Promise<DepositClaimRecord | null>;
  findByTxHashOrThrow(txHash: string): Promise<DepositClaimRecord>;
  listByAccount(accountId: string, options?: { limit?: number }): Promise<DepositClaimRecord[]>;
  listDue(now: Date, options: { limit: number }): Promise<DepositClaimRecord[]>;
  /** Pages by `txHash`; pass the last hash of the previous page as `after`. */
  listByStatus(status: DepositClaimStatus, options: { limit: number; after?: string }): Promise<DepositClaimRecord[]>;
  recordAttempt(
    txHash: string,
    params: { now: Date; verdict: string; error?: string | null; nextAttemptAt: Date | null },
  ): Promise<DepositClaimRecord>;
  markVerified(txHash: string, params: { now: Date; actualAmount: string; verdict: string }): Promise<DepositClaimRecord>;
  markRejected(
    txHash: string,
    params: { now: Date; reason: string; verdict: string; actualAmount?: string | null },
  ): Promise<DepositClaimRecord>;
  markCredited(txHash: string, params: { now: Date }): Promise<DepositClaimCreditResult>;
  recordCreditFailure(txHash: string, params: { now: Date; error: string; nextAttemptAt: Date }): Promise<DepositClaimRecord>;
  __resetForTests?: () => void;
};

type DepositClaimRow = typeof depositClaims.$inferSelect;

function toRecord(row: DepositClaimRow): DepositClaimRecord {
  return {
    id: row.id,
    txHash: row.txHash,
    accountId: row.accountId,
    expectedAmount: normalizeDecimal(row.expectedAmount),
    packageId: row.packageId,
    actualAmount: row.actualAmount === null ? null : normalizeDecimal(row.actualAmount),
    status: row.status,
    rejectionReason: row.rejectionReason,
    lastVerdict: row.lastVerdict,
    lastError: row.lastError,
    attemptCount: row.attemptCount,
    nextAttemptAt: row.nextAttemptAt,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    verifiedAt: row.verifiedAt,
    creditedAt: row.creditedAt,
  };
}

async function throwInvalidTransition(db: DbClient, txHash: string, targetStatus: DepositClaimStatus): Promise<never> {
  const [existing] = await db.select().from(depositClaims).where(eq(depositClaims.txHash, txHash)).limit(1);
  if (!existing) {
    throw new DepositClaimNotFoundError(txHash);
  }
  throw new DepositClaimTransitionError(targetStatus, existing.status, txHash);
}

function creditInput(claim: DepositClaimRecord, now: Date) {
  if (claim.actualAmount === null) {
    throw new DepositClaimTransitionError("credited", `${claim.status} without actual amount`, claim.txHash);
  }
  return {
    accountId: claim.accountId,
    amount: claim.actualAmount,
    kind: "deposit_credit" as const,
    externalReference: claim.txHash,
    idempotencyKey: depositCreditIdempotencyKey(claim.txHash),
    now,
  };
}

export function createDbDepositClaimRepo(db: DbClient): DepositClaimRepo {
  async function findByTxHash(txHash: string): Promise<DepositClaimRecord | null> {
    const [row] = await db.select().from(depositClaims).where(eq(depositClaims.txHash, txHash)).limit(1);
    return row ? toRecord(row) : null;
  }

  return {
    async create(input) {
      const now = input.now ?? new Date();
      const inserted = await db
        .insert(depositClaims)
        .values({
          txHash: input.txHash,
          accountId: input.accountId,
          expectedAmount: normalizeDecimal(input.expectedAmount),
          packageId: input.packageId ?? null,
          actualAmount: null,
          status: "pending",
          attemptCount: 0,
          nextAttemptAt: now,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing({ target: depositClaims.txHash })
        .returning();
      if (inserted.length > 0) {
        return { created: true, claim: toRecord(inserted[0]) };
      }

      const existing = await findByTxHash(input.txHash);
      if (!existing) {
        throw new DepositClaimNotFoundError(input.txHash);
      }
      return { created: false, claim: existing };
    },

    findByTxHash,

    async findByTxHashOrThrow(txHash) {
      const claim = await findByTxHash(txHash);
      if (!claim) {
        throw new DepositClaimNotFoundError(txHash);
      }
      return claim;
    },

    async listByAccount(accountId, options = {}) {
      const rows = await db
        .select()
        .from(depositClaims)
        .where(eq(depositClaims.accountId, accountId))
        .orderBy(asc(depositClaims.createdAt))
        .limit(options.limit ?? 50);
      return rows.map(toRecord);
    },

    async listDue(now, options) {
      const rows = await db
        .select()
        .from(depositClaims)
        .where(
          and(
            inArray(depositClaims.status, ["pending", "verified"]),
            or(isNull(depositClaims.nextAttemptAt), lte(depositClaims.nextAttemptAt, now)),
          ),
        )
        .orderBy(asc(depositClaims.createdAt), asc(depositClaims.id))
        .limit(options.limit);
      return rows.map(toRecord);
    },

    async listByStatus(status, options) {
      const rows = await db
        .select()
        .from(depositClaims)
        .where(
          options.after
            ? and(eq(depositClaims.status, status), gt(depositClaims.txHash, options.after))
            : eq(depositClaims.status, status),
        )
        .orderBy(asc(depositClaims.txHash))
        .limit(options.limit);
      return rows.map(toRecord);
    },

    async recordAttempt(txHash, params) {
      const [row] = await db
        .update(depositClaims)
        .set({
          attemptCount: sql`${depositClaims.attemptCount} + 1`,
          lastVerdict: params.verdict,
          lastError: params.error ?? null,
          nextAttemptAt: params.nextAttemptAt,
          updatedAt: params.now,
        })
        .where(and(eq(depositClaims.txHash, txHash), eq(depositClaims.status, "pending")))
        .returning();
      if (!row) {
        await throwInvalidTransition(db, txHash, "pending");
      }
      return toRecord(row);
    },

    async markVerified(txHash, params) {
      const [row] = await db
        .update(depositClaims)
        .set({
          status: "verified",
          actualAmount: normalizeDecimal(params.actualAmount),
          attemptCount: sql`${depositClaims.attemptCount} + 1`,
          lastVerdict: params.verdict,
          lastError: null,
          nextAttemptAt: params.now,
          updatedAt: params.now,
          verifiedAt: params.now,
        })
        .where(and(eq(depositClaims.txHash, txHash), eq(depositClaims.status, "pending")))
        .returning();
      if (!row) {
        await throwInvalidTransition(db, txHash, "verified");
      }
      return toRecord(row);
    },

    async markRejected(txHash, params) {
      const [row] = await db
        .update(depositClaims)
        .set({
          status: "rejected",
          rejectionReason: params.reason,
          actualAmount: params.actualAmount ? normalizeDecimal(params.actualAmount) : null,
          attemptCount: sql`${depositClaims.attemptCount} + 1`,
          lastVerdict: params.verdict,
          nextAttemptAt: null,
          updatedAt: params.now,
        })
        .where(and(eq(depositClaims.txHash, txHash), eq(depositClaims.status, "pending")))
        .returning();
      if (!row) {
        await throwInvalidTransition(db, txHash, "rejected");
      }
      return toRecord(row);
    },

    async markCredited(txHash, params) {
      return db.transaction(async (tx) => {
        const [row] = await tx
          .update(depositClaims)
          .set({
            status: "credited",
            lastError: null,
            nextAttemptAt: null,
            updatedAt: params.now,
            creditedAt: params.now,
          })
          .where(and(eq(depositClaims.txHash, txHash), eq(depositClaims.status, "verified")))
          .returning();
        if (!row) {
          await throwInvalidTransition(tx, txHash, "credited");
        }

        const claim = toRecord(row);
        const ledgerRepo = createDbLedgerRepo(tx);
        const ledger = await ledgerRepo.credit(creditInput(claim, params.now));
        return { claim, ledger };
      });
    },

    async recordCreditFailure(txHash, params) {
      const [row] = await db
        .update(depositClaims)
        .set({
          lastError: params.error,
          nextAttemptAt: params.nextAttemptAt,
          updatedAt: params.now,
        })
        .where(and(eq(depositClaims.txHash, txHash), eq(depositClaims.status, "verified")))
        .returning();
      if (!row) {
        await throwInvalidTransition(db, txHash, "verified");
      }
      return toRecord(row);
    },
  };
}

export function createInMemoryDepositClaimRepo(deps: { ledgerRepo: LedgerRepo }): DepositClaimRepo {
  const records: DepositClaimRecord[] = [];

  function clone(record: DepositClaimRecord): DepositClaimRecord {
    return {
      ...record,
      nextAttemptAt: record.nextAttemptAt ? new Date(record.nextAttemptAt) : null,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
      verifiedAt: record.verifiedAt ? new Date(record.verifiedAt) : null,
      creditedAt: record.creditedAt ? new Date(record.creditedAt) : null,
    };
  }

  function getForTransition(txHash: string, allowed: DepositClaimStatus[], target: DepositClaimStatus): DepositClaimRecord {
    const record = records.find((item) => item.txHash === txHash);
    if (!record) {
      throw new DepositClaimNotFoundError(txHash);
    }
    if (!allowed.includes(record.status)) {
      throw new DepositClaimTransitionError(target, record.status, txHash);
    }
    return record;
  }

  function byCreatedAt(a: DepositClaimRecord, b: DepositClaimRecord): number {
    return a.createdAt.getTime() - b.createdAt.getTime();
  }

  return {
    async create(input) {
      const existing = records.find((item) => item.txHash === input.txHash);
      if (existing) {
        return { created: false, claim: clone(existing) };
      }
      const now = input.now ?? new Date();
      const record: DepositClaimRecord = {
        id: randomUUID(),
        txHash: input.txHash,
        accountId: input.accountId,
        expectedAmount: normalizeDecimal(input.expectedAmount),
        packageId: input.packageId ?? null,
        actualAmount: null,
        status: "pending",
        rejectionReason: null,
        lastVerdict: null,
        lastError: null,
        attemptCount: 0,
        nextAttemptAt: now,
        createdAt: now,
        updatedAt: now,
        verifiedAt: null,
        creditedAt: null,
      };
      records.push(record);
      return { created: true, claim: clone(record) };
    },

    async findByTxHash(txHash) {
      const record = records.find((item) => item.txHash === txHash);
      return record ? clone(record) : null;
    },

    async findByTxHashOrThrow(txHash) {
      const record = records.find((item) => item.txHash === txHash);
      if (!record) {
        throw new DepositClaimNotFoundError(txHash);
      }
      return clone(record);
    },

    async listByAccount(accountId, options = {}) {
      return records
        .filter((item) => item.accountId === accountId)
        .sort(byCreatedAt)
        .slice(0, options.limit ?? 50)
        .map(clone);
    },

    async listDue(now, options) {
      return records
        .filter(
          (item) =>
            (item.status === "pending" || item.status === "verified") &&
            (item.nextAttemptAt === null || item.nextAttemptAt <= now),
        )
        .sort(byCreatedAt)
        .slice(0, options.limit)
        .map(clone);
    },

    async listByStatus(status, options) {
      return records
        .filter((item) => item.status === status && (options.after === undefined || item.txHash > options.after))
        .sort((a, b) => (a.txHash < b.txHash ? -1 : a.txHash > b.txHash ? 1 : 0))
        .slice(0, options.limit)
        .map(clone);
    },

    async recordAttempt(txHash, params) {
      const record = getForTransition(txHash, ["pending"], "pending");
      record.attemptCount += 1;
      record.lastVerdict = params.verdict;
      record.lastError = params.error ?? null;
      record.nextAttemptAt = params.nextAttemptAt;
      record.updatedAt = params.now;
      return clone(record);
    },

    async markVerified(txHash, params) {
      const record = getForTransition(txHash, ["pending"], "verified");
      record.status = "verified";
      record.actualAmount = normalizeDecimal(params.actualAmount);
      record.attemptCount += 1;
      record.lastVerdict = params.verdict;
      record.lastError = null;
      record.nextAttemptAt = params.now;
      record.updatedAt = params.now;
      record.verifiedAt = params.now;
      return clone(record);
    },

    async markRejected(txHash, params) {
      const record = getForTransition(txHash, ["pending"], "rejected");
      record.status = "rejected";
      record.rejectionReason = params.reason;
      record.actualAmount = params.actualAmount ? normalizeDecimal(params.actualAmount) : null;
      record.attemptCount += 1;
      record.lastVerdict = params.verdict;
      record.nextAttemptAt = null;
      record.updatedAt = params.now;
      return clone(record);
    },

    async markCredited(txHash, params) {
      const record = getForTransition(txHash, ["verified"], "credited");
      // Ledger first: a failed credit leaves the claim verified for the next attempt.
      const ledger = await deps.ledgerRepo.credit(creditInput(clone(record), params.now));
      record.status = "credited";
      record.lastError = null;
      record.nextAttemptAt = null;
      record.updatedAt = params.now;
      record.creditedAt = params.now;
      return { claim: clone(record), ledger };
    },

    async recordCreditFailure(txHash, params) {
      const record = getForTransition(txHash, ["verified"], "verified");
      record.lastError = params.error;
      record.nextAttemptAt = params.nextAttemptAt;
      record.updatedAt = params.now;
      return clone(record);
    },

    __resetForTests() {
      records.length = 0;
    },
  };
}
