import { randomUUID } from "crypto";
import { and, asc, count, eq, gt, isNull, or, sql } from "drizzle-orm";
import { addDecimalStrings, assertPositiveAmount, normalizeDecimal } from "./amount";
import { isUniqueViolation, type DbClient } from "./client";
import { vouchers, type VoucherStatus } from "./schema";

export type VoucherRecord = {
  id: string;
  code: string;
  value: string;
  status: VoucherStatus;
  createdBy: string;
  redeemedBy: string | null;
  redeemedAt: Date | null;
  expiresAt: Date | null;
  createdAt: Date;
};

export type CreateVoucherInput = {
  code: string;
  value: string;
  createdBy: string;
  expiresAt?: Date | null;
};

export type VoucherStats = {
  total: number;
  used: number;
  unused: number;
  expiredUnused: number;
  usedValue: string;
  unusedValue: string;
};

export class VoucherNotFoundError extends Error {
  constructor(public readonly code: string) {
    super("voucher not found");
    this.name = "VoucherNotFoundError";
  }
}

export class VoucherAlreadyUsedError extends Error {
  constructor(public readonly code: string) {
    super("voucher already used");
    this.name = "VoucherAlreadyUsedError";
  }
}

export class VoucherExpiredError extends Error {
  constructor(
    public readonly code: string,
    public readonly expiresAt: Date,
  ) {
    super("voucher expired");
    this.name = "VoucherExpiredError";
  }
}

export class DuplicateVoucherCodeError extends Error {
  constructor(public readonly codes: string[]) {
    super(`voucher code already exists: ${codes.join(", ")}`);
    this.name = "DuplicateVoucherCodeError";
  }
}

export type VoucherRepo = {
  createMany(inputs: CreateVoucherInput[], now?: Date): Promise<VoucherRecord[]>;
  findByCode(code: string): Promise<VoucherRecord | null>;
  redeem(code: string, accountId: string, now: Date): Promise<VoucherRecord>;
  listUsed(options: { limit: number; after?: string }): Promise<VoucherRecord[]>;
  getStats(now: Date): Promise<VoucherStats>;
  __resetForTests?: () => void;
};

type VoucherRow = typeof vouchers.$inferSelect;

function toRecord(row: VoucherRow): VoucherRecord {
  return {
    id: row.id,
    code: row.code,
    value: normalizeDecimal(row.value),
    status: row.status,
    createdBy: row.createdBy,
    redeemedBy: row.redeemedBy,
    redeemedAt: row.redeemedAt,
    expiresAt: row.expiresAt,
    createdAt: row.createdAt,
  };
}

function validateInputs(inputs: CreateVoucherInput[]): void {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  for (const input of inputs) {
    assertPositiveAmount(input.value);
    if (seen.has(input.code)) {
      duplicates.push(input.code);
    }
    seen.add(input.code);
  }
  if (duplicates.length > 0) {
    throw new DuplicateVoucherCodeError(duplicates);
  }
}

function rejectRedeem(existing: VoucherRecord | null, code: string, now: Date): never {
  if (!existing) {
    throw new VoucherNotFoundError(code);
  }
  if (existing.status === "used") {
    throw new VoucherAlreadyUsedError(code);
  }
  if (existing.expiresAt && existing.expiresAt <= now) {
    throw new VoucherExpiredError(code, existing.expiresAt);
  }
  throw new VoucherAlreadyUsedError(code);
}

export function createDbVoucherRepo(db: DbClient): VoucherRepo {
  async function findByCode(code: string): Promise<VoucherRecord | null> {
    const [row] = await db.select().from(vouchers).where(eq(vouchers.code, code)).limit(1);
    return row ? toRecord(row) : null;
  }

  return {
    async createMany(inputs, now = new Date()) {
      if (inputs.length === 0) {
        return [];
      }
      validateInputs(inputs);
      try {
        const rows = await db
          .insert(vouchers)
          .values(
            inputs.map((input) => ({
              code: input.code,
              value: normalizeDecimal(input.value),
              status: "unused" as const,
              createdBy: input.createdBy,
              expiresAt: input.expiresAt ?? null,
              createdAt: now,
            })),
          )
          .returning();
        return rows.map(toRecord);
      } catch (err) {
        if (isUniqueViolation(err)) {
          throw new DuplicateVoucherCodeError(inputs.map((input) => input.code));
        }
        throw err;
      }
    },

    findByCode,

    async redeem(code, accountId, now) {
      const [row] = await db
        .update(vouchers)
        .set({ status: "used", redeemedBy: accountId, redeemedAt: now })
        .where(
          and(
            eq(vouchers.code, code),
            eq(vouchers.status, "unused"),
            or(isNull(vouchers.expiresAt), gt(vouchers.expiresAt, now)),
          ),
        )
        .returning();
      if (row) {
        return toRecord(row);
      }
      return rejectRedeem(await findByCode(code), code, now);
    },

    async listUsed(options) {
      const rows = await db
        .select()
        .from(vouchers)
        .where(
          options.after
            ? and(eq(vouchers.status, "used"), gt(vouchers.code, options.after))
            : eq(vouchers.status, "used"),
        )
        .orderBy(asc(vouchers.code))
        .limit(options.limit);
      return rows.map(toRecord);
    },

    async getStats(now) {
      const expired = sql<boolean>`(${vouchers.expiresAt} IS NOT NULL AND ${vouchers.expiresAt} <= ${now})`;
      const rows = await db
        .select({
          status: vouchers.status,
          expired,
          total: count(),
          value: sql<string>`COALESCE(SUM(${vouchers.value}), 0)`,
        })
        .from(vouchers)
        .groupBy(vouchers.status, expired);

      const stats: VoucherStats = { total: 0, used: 0, unused: 0, expiredUnused: 0, usedValue: "0", unusedValue: "0" };
      for (const row of rows) {
        const total = Number(row.total);
        const value = normalizeDecimal(String(row.value));
        stats.total += total;
        if (row.status === "used") {
          stats.used += total;
          stats.usedValue = addDecimalStrings(stats.usedValue, value);
        } else {
          stats.unused += total;
          stats.unusedValue = addDecimalStrings(stats.unusedValue, value);
          if (row.expired) {
            stats.expiredUnused += total;
          }
        }
      }
      return stats;
    },
  };
}

export function createInMemoryVoucherRepo(): VoucherRepo {
  const byCode = new Map<string, VoucherRecord>();

  function clone(record: VoucherRecord): VoucherRecord {
    return {
      ...record,
      redeemedAt: record.redeemedAt ? new Date(record.redeemedAt) : null,
      expiresAt: record.expiresAt ? new Date(record.expiresAt) : null,
      createdAt: new Date(record.createdAt),
    };
  }

  return {
    async createMany(inputs, now = new Date()) {
      validateInputs(inputs);
      const taken = inputs.filter((input) => byCode.has(input.code)).map((input) => input.code);
      if (taken.length > 0) {
        throw new DuplicateVoucherCodeError(taken);
      }
      const created = inputs.map((input) => {
        const record: VoucherRecord = {
          id: randomUUID(),
          code: input.code,
          value: normalizeDecimal(input.value),
          status: "unused",
          createdBy: input.createdBy,
          redeemedBy: null,
          redeemedAt: null,
          expiresAt: input.expiresAt ?? null,
          createdAt: now,
        };
        byCode.set(record.code, record);
        return clone(record);
      });
      return created;
    },

    async findByCode(code) {
      const record = byCode.get(code);
      return record ? clone(record) : null;
    },

    async redeem(code, accountId, now) {
      const record = byCode.get(code);
      if (!record || record.status !== "unused" || (record.expiresAt && record.expiresAt <= now)) {
        return rejectRedeem(record ? clone(record) : null, code, now);
      }
      record.status = "used";
      record.redeemedBy = accountId;
      record.redeemedAt = now;
      return clone(record);
    },

    async listUsed(options) {
      return [...byCode.values()]
        .filter((item) => item.status === "used" && (options.after === undefined || item.code > options.after))
        .sort((a, b) => (a.code < b.code ? -1 : a.code > b.code ? 1 : 0))
        .slice(0, options.limit)
        .map(clone);
    },

    async getStats(now) {
      const stats: VoucherStats = { total: 0, used: 0, unused: 0, expiredUnused: 0, usedValue: "0", unusedValue: "0" };
      for (const record of byCode.values()) {
        stats.total += 1;
        if (record.status === "used") {
          stats.used += 1;
          stats.usedValue = addDecimalStrings(stats.usedValue, record.value);
        } else {
          stats.unused += 1;
          stats.unusedValue = addDecimalStrings(stats.unusedValue, record.value);
          if (record.expiresAt && record.expiresAt <= now) {
            stats.expiredUnused += 1;
          }
        }
      }
      return stats;
    },

    __resetForTests() {
      byCode.clear();
    },
  };
}
