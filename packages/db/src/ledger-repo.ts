import { randomUUID } from "crypto";
import { asc, eq, gt, sql } from "drizzle-orm";
import {
  addDecimalStrings,
  assertPositiveAmount,
  compareDecimalStrings,
  negateDecimalString,
  normalizeDecimal,
  sumDecimalStrings,
} from "./amount";
import { isUniqueViolation, type DbClient } from "./client";
import { accounts, ledgerEvents, type AccountStatus, type LedgerEventKind } from "./schema";

export type AccountRecord = {
  id: string;
  balance: string;
  status: AccountStatus;
  version: number;
  suspendedAt: Date | null;
  suspendedReason: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type LedgerEventRecord = {
  id: string;
  accountId: string;
  kind: LedgerEventKind;
  amount: string;
  resultingBalance: string;
  externalReference: string | null;
  idempotencyKey: string;
  metadata: Record<string, unknown> | null;
  createdAt: Date;
};

export type LedgerCreditKind = Exclude<LedgerEventKind, "debit">;
export type LedgerDebitKind = "debit" | "adjustment";

type LedgerWriteBase = {
  accountId: string;
  amount: string;
  externalReference?: string | null;
  idempotencyKey: string;
  metadata?: Record<string, unknown> | null;
  now?: Date;
};

export type LedgerCreditInput = LedgerWriteBase & { kind: LedgerCreditKind };
export type LedgerDebitInput = LedgerWriteBase & { kind: LedgerDebitKind };

export type LedgerWriteResult = {
  applied: boolean;
  event: LedgerEventRecord;
  account: AccountRecord;
};

export class InsufficientFundsError extends Error {
  constructor(
    public readonly accountId: string,
    public readonly amount: string,
    public readonly balance: string,
  ) {
    super("insufficient funds");
    this.name = "InsufficientFundsError";
  }
}

export class LedgerEventNotFoundError extends Error {
  constructor(public readonly idempotencyKey: string) {
    super(`ledger event not found for idempotency key ${idempotencyKey}`);
    this.name = "LedgerEventNotFoundError";
  }
}

export type LedgerRepo = {
  ensureAccount(accountId: string, now?: Date): Promise<AccountRecord>;
  getAccount(accountId: string): Promise<AccountRecord | null>;
  getBalance(accountId: string): Promise<string>;
  credit(input: LedgerCreditInput): Promise<LedgerWriteResult>;
  debit(input: LedgerDebitInput): Promise<LedgerWriteResult>;
  findEventByIdempotencyKey(idempotencyKey: string): Promise<LedgerEventRecord | null>;
  listEvents(accountId: string): Promise<LedgerEventRecord[]>;
  listAccounts(options: { limit: number; after?: string }): Promise<AccountRecord[]>;
  sumEventAmounts(accountId: string): Promise<string>;
  setStatus(accountId: string, params: { status: AccountStatus; reason?: string | null; now: Date }): Promise<AccountRecord>;
  __listForTests?: () => LedgerEventRecord[];
  __resetForTests?: () => void;
};

type AccountRow = typeof accounts.$inferSelect;
type LedgerEventRow = typeof ledgerEvents.$inferSelect;

function toAccountRecord(row: AccountRow): AccountRecord {
  return {
    id: row.id,
    balance: normalizeDecimal(row.balance),
    status: row.status,
    version: row.version,
    suspendedAt: row.suspendedAt,
    suspendedReason: row.suspendedReason,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toEventRecord(row: LedgerEventRow): LedgerEventRecord {
  return {
    id: row.id,
    accountId: row.accountId,
    kind: row.kind,
    amount: normalizeDecimal(row.amount),
    resultingBalance: normalizeDecimal(row.resultingBalance),
    externalReference: row.externalReference,
    idempotencyKey: row.idempotencyKey,
    metadata: row.metadata ?? null,
    createdAt: row.createdAt,
  };
}

function signedAmount(amount: string, direction: "credit" | "debit"): string {
  return direction === "debit" ? negateDecimalString(amount) : normalizeDecimal(amount);
}

async function lockAccount(tx: DbClient, accountId: string, now: Date): Promise<AccountRow> {
  await tx
    .insert(accounts)
    .values({
      id: accountId,
      balance: "0",
      status: "active",
      version: 0,
      createdAt: now,
      updatedAt: now,
    })
    .onConflictDoNothing({ target: accounts.id });

  const [row] = await tx.select().from(accounts).where(eq(accounts.id, accountId)).limit(1).for("update");
  if (!row) {
    throw new Error(`account ${accountId} could not be locked`);
  }
  return row;
}

export function createDbLedgerRepo(db: DbClient): LedgerRepo {
  async function getAccount(accountId: string): Promise<AccountRecord | null> {
    const [row] = await db.select().from(accounts).where(eq(accounts.id, accountId)).limit(1);
    return row ? toAccountRecord(row) : null;
  }

  async function findEventByIdempotencyKey(idempotencyKey: string): Promise<LedgerEventRecord | null> {
    const [row] = await db
      .select()
      .from(ledgerEvents)
      .where(eq(ledgerEvents.idempotencyKey, idempotencyKey))
      .limit(1);
    return row ? toEventRecord(row) : null;
  }

  async function write(
    input: LedgerWriteBase & { kind: LedgerEventKind },
    direction: "credit" | "debit",
  ): Promise<LedgerWriteResult> {
    assertPositiveAmount(input.amount);
    const now = input.now ?? new Date();

    try {
      return await db.transaction(async (tx): Promise<LedgerWriteResult> => {
        const account = await lockAccount(tx, input.accountId, now);

        const [existing] = await tx
          .select()
          .from(ledgerEvents)
          .where(eq(ledgerEvents.idempotencyKey, input.idempotencyKey))
          .limit(1);
        if (existing) {
          return { applied: false, event: toEventRecord(existing), account: toAccountRecord(account) };
        }

        const amount = signedAmount(input.amount, direction);
        const nextBalance = addDecimalStrings(account.balance, amount);
        if (compareDecimalStrings(nextBalance, "0") < 0) {
          throw new InsufficientFundsError(input.accountId, normalizeDecimal(input.amount), normalizeDecimal(account.balance));
        }

        const [event] = await tx
          .insert(ledgerEvents)
          .values({
            accountId: input.accountId,
            kind: input.kind,
            amount,
            resultingBalance: nextBalance,
            externalReference: input.externalReference ?? null,
            idempotencyKey: input.idempotencyKey,
            metadata: input.metadata ?? null,
            createdAt: now,
          })
          .returning();

        const [updated] = await tx
          .update(accounts)
          .set({
            balance: nextBalance,
            version: sql`${accounts.version} + 1`,
            updatedAt: now,
          })
          .where(eq(accounts.id, input.accountId))
          .returning();

        return { applied: true, event: toEventRecord(event), account: toAccountRecord(updated) };
      });
    } catch (err) {
      // Same key written concurrently against another account row.
      if (!isUniqueViolation(err)) {
        throw err;
      }
      const existing = await findEventByIdempotencyKey(input.idempotencyKey);
      if (!existing) {
        throw new LedgerEventNotFoundError(input.idempotencyKey);
      }
      const account = await getAccount(existing.accountId);
      if (!account) {
        throw err;
      }
      return { applied: false, event: existing, account };
    }
  }

  return {
    async ensureAccount(accountId, now = new Date()) {
      await db
        .insert(accounts)
        .values({
          id: accountId,
          balance: "0",
          status: "active",
          version: 0,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing({ target: accounts.id });
      const account = await getAccount(accountId);
      if (!account) {
        throw new Error(`account ${accountId} could not be created`);
      }
      return account;
    },

    getAccount,

    async getBalance(accountId) {
      const account = await getAccount(accountId);
      return account ? account.balance : "0";
    },

    async credit(input) {
      return write(input, "credit");
    },

    async debit(input) {
      return write(input, "debit");
    },

    findEventByIdempotencyKey,

    async listEvents(accountId) {
      const rows = await db
        .select()
        .from(ledgerEvents)
        .where(eq(ledgerEvents.accountId, accountId))
        .orderBy(asc(ledgerEvents.createdAt), asc(ledgerEvents.id));
      return rows.map(toEventRecord);
    },

    async listAccounts(options) {
      const rows = await db
        .select()
        .from(accounts)
        .where(options.after ? gt(accounts.id, options.after) : undefined)
        .orderBy(asc(accounts.id))
        .limit(options.limit);
      return rows.map(toAccountRecord);
    },

    async sumEventAmounts(accountId) {
      const [row] = await db
        .select({ total: sql<string>`COALESCE(SUM(${ledgerEvents.amount}), 0)` })
        .from(ledgerEvents)
        .where(eq(ledgerEvents.accountId, accountId));
      return row ? normalizeDecimal(String(row.total)) : "0";
    },

    async setStatus(accountId, params) {
      return db.transaction(async (tx) => {
        await lockAccount(tx, accountId, params.now);
        const suspended = params.status === "suspended";
        const [row] = await tx
          .update(accounts)
          .set({
            status: params.status,
            suspendedAt: suspended ? params.now : null,
            suspendedReason: suspended ? params.reason ?? null : null,
            updatedAt: params.now,
          })
          .where(eq(accounts.id, accountId))
          .returning();
        return toAccountRecord(row);
      });
    },
  };
}

export function createInMemoryLedgerRepo(): LedgerRepo {
  const accountsById = new Map<string, AccountRecord>();
  const events: LedgerEventRecord[] = [];

  function cloneAccount(record: AccountRecord): AccountRecord {
    return {
      ...record,
      suspendedAt: record.suspendedAt ? new Date(record.suspendedAt) : null,
      createdAt: new Date(record.createdAt),
      updatedAt: new Date(record.updatedAt),
    };
  }

  function cloneEvent(record: LedgerEventRecord): LedgerEventRecord {
    return {
      ...record,
      metadata: record.metadata ? { ...record.metadata } : null,
      createdAt: new Date(record.createdAt),
    };
  }

  function ensure(accountId: string, now: Date): AccountRecord {
    const existing = accountsById.get(accountId);
    if (existing) {
      return existing;
    }
    const record: AccountRecord = {
      id: accountId,
      balance: "0",
      status: "active",
      version: 0,
      suspendedAt: null,
      suspendedReason: null,
      createdAt: now,
      updatedAt: now,
    };
    accountsById.set(accountId, record);
    return record;
  }

  // No await between the read and the write: each call is atomic on the event loop.
  async function write(
    input: LedgerWriteBase & { kind: LedgerEventKind },
    direction: "credit" | "debit",
  ): Promise<LedgerWriteResult> {
    assertPositiveAmount(input.amount);
    const now = input.now ?? new Date();

    const existing = events.find((item) => item.idempotencyKey === input.idempotencyKey);
    if (existing) {
      const owner = ensure(existing.accountId, now);
      return { applied: false, event: cloneEvent(existing), account: cloneAccount(owner) };
    }

    const account = ensure(input.accountId, now);
    const amount = signedAmount(input.amount, direction);
    const nextBalance = addDecimalStrings(account.balance, amount);
    if (compareDecimalStrings(nextBalance, "0") < 0) {
      throw new InsufficientFundsError(input.accountId, normalizeDecimal(input.amount), account.balance);
    }

    const event: LedgerEventRecord = {
      id: randomUUID(),
      accountId: input.accountId,
      kind: input.kind,
      amount,
      resultingBalance: nextBalance,
      externalReference: input.externalReference ?? null,
      idempotencyKey: input.idempotencyKey,
      metadata: input.metadata ?? null,
      createdAt: now,
    };
    events.push(event);
    account.balance = nextBalance;
    account.version += 1;
    account.updatedAt = now;
    return { applied: true, event: cloneEvent(event), account: cloneAccount(account) };
  }

  return {
    async ensureAccount(accountId, now = new Date()) {
      return cloneAccount(ensure(accountId, now));
    },

    async getAccount(accountId) {
      const account = accountsById.get(accountId);
      return account ? cloneAccount(account) : null;
    },

    async getBalance(accountId) {
      return accountsById.get(accountId)?.balance ?? "0";
    },

    async credit(input) {
      return write(input, "credit");
    },

    async debit(input) {
      return write(input, "debit");
    },

    async findEventByIdempotencyKey(idempotencyKey) {
      const event = events.find((item) => item.idempotencyKey === idempotencyKey);
      return event ? cloneEvent(event) : null;
    },

    async listEvents(accountId) {
      return events.filter((item) => item.accountId === accountId).map(cloneEvent);
    },

    async listAccounts(options) {
      return [...accountsById.values()]
        .filter((item) => options.after === undefined || item.id > options.after)
        .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
        .slice(0, options.limit)
        .map(cloneAccount);
    },

    async sumEventAmounts(accountId) {
      return sumDecimalStrings(events.filter((item) => item.accountId === accountId).map((item) => item.amount));
    },

    async setStatus(accountId, params) {
      const account = ensure(accountId, params.now);
      const suspended = params.status === "suspended";
      account.status = params.status;
      account.suspendedAt = suspended ? params.now : null;
      account.suspendedReason = suspended ? params.reason ?? null : null;
      account.updatedAt = params.now;
      return cloneAccount(account);
    },

    __listForTests() {
      return events.map(cloneEvent);
    },

    __resetForTests() {
      accountsById.clear();
      events.length = 0;
    },
  };
}
