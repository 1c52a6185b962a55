import { beforeEach, describe, expect, it, vi } from "vitest";
import { InvalidAmountError } from "./amount";
import type { DbClient } from "./client";
import { InsufficientFundsError, createDbLedgerRepo, createInMemoryLedgerRepo } from "./ledger-repo";

describe("ledgerRepo (in-memory)", () => {
  const repo = createInMemoryLedgerRepo();

  beforeEach(() => {
    repo.__resetForTests?.();
  });

  it("writes one credit for new idempotency key and skips duplicates", async () => {
    const first = await repo.credit({
      accountId: "u1",
      amount: "50",
      kind: "deposit_credit",
      externalReference: "abc",
      idempotencyKey: "deposit:credit:abc",
    });
    const second = await repo.credit({
      accountId: "u1",
      amount: "50",
      kind: "deposit_credit",
      externalReference: "abc",
      idempotencyKey: "deposit:credit:abc",
    });

    expect(first.applied).toBe(true);
    expect(first.event.resultingBalance).toBe("50");
    expect(second.applied).toBe(false);
    expect(second.event.id).toBe(first.event.id);
    expect(await repo.getBalance("u1")).toBe("50");
    expect(repo.__listForTests?.()).toHaveLength(1);
  });

  it("records debits as negative amounts and bumps the account version", async () => {
    await repo.credit({ accountId: "u1", amount: "100", kind: "adjustment", idempotencyKey: "admin:adjustment:seed" });
    const result = await repo.debit({
      accountId: "u1",
      amount: "5",
      kind: "debit",
      externalReference: "req-1",
      idempotencyKey: "conversion:reserve:req-1",
    });

    expect(result.event.amount).toBe("-5");
    expect(result.event.resultingBalance).toBe("95");
    expect(result.account).toMatchObject({ balance: "95", version: 2 });
  });

  it("rejects debits that would overdraw without any change", async () => {
    await repo.credit({ accountId: "u1", amount: "3.25", kind: "voucher_credit", idempotencyKey: "voucher:credit:A" });

    await expect(
      repo.debit({ accountId: "u1", amount: "3.26", kind: "debit", idempotencyKey: "conversion:reserve:r" }),
    ).rejects.toBeInstanceOf(InsufficientFundsError);

    expect(await repo.getBalance("u1")).toBe("3.25");
    expect(await repo.findEventByIdempotencyKey("conversion:reserve:r")).toBeNull();
    expect(repo.__listForTests?.()).toHaveLength(1);
  });

  it("returns the recorded debit for a repeated key even after the balance dropped", async () => {
    await repo.credit({ accountId: "u1", amount: "5", kind: "adjustment", idempotencyKey: "admin:adjustment:1" });
    await repo.debit({ accountId: "u1", amount: "5", kind: "debit", idempotencyKey: "conversion:reserve:r1" });

    const repeated = await repo.debit({ accountId: "u1", amount: "5", kind: "debit", idempotencyKey: "conversion:reserve:r1" });

    expect(repeated.applied).toBe(false);
    expect(await repo.getBalance("u1")).toBe("0");
  });

  it("keeps the balance equal to the sum of event amounts", async () => {
    await repo.credit({ accountId: "u1", amount: "10.50", kind: "deposit_credit", idempotencyKey: "deposit:credit:t1" });
    await repo.debit({ accountId: "u1", amount: "3.25", kind: "debit", idempotencyKey: "conversion:reserve:r1" });
    await repo.credit({ accountId: "u1", amount: "3.25", kind: "refund", idempotencyKey: "conversion:release:r1" });

    expect(await repo.getBalance("u1")).toBe("10.5");
    expect(await repo.sumEventAmounts("u1")).toBe("10.5");
  });

  it("rejects non-positive ledger writes", async () => {
    await expect(
      repo.credit({ accountId: "u1", amount: "0", kind: "deposit_credit", idempotencyKey: "deposit:credit:zero" }),
    ).rejects.toBeInstanceOf(InvalidAmountError);
    await expect(
      repo.debit({ accountId: "u1", amount: "-1", kind: "debit", idempotencyKey: "conversion:reserve:neg" }),
    ).rejects.toBeInstanceOf(InvalidAmountError);
  });

  it("suspends and reactivates accounts", async () => {
    const now = new Date("2026-03-01T00:00:00.000Z");
    const suspended = await repo.setStatus("u9", { status: "suspended", reason: "chargeback", now });
    expect(suspended).toMatchObject({ status: "suspended", suspendedReason: "chargeback", suspendedAt: now });

    const active = await repo.setStatus("u9", { status: "active", now });
    expect(active).toMatchObject({ status: "active", suspendedReason: null, suspendedAt: null });
  });

  it("pages accounts by id", async () => {
    await repo.ensureAccount("b");
    await repo.ensureAccount("a");
    await repo.ensureAccount("c");

    expect((await repo.listAccounts({ limit: 2 })).map((item) => item.id)).toEqual(["a", "b"]);
    expect((await repo.listAccounts({ limit: 2, after: "b" })).map((item) => item.id)).toEqual(["c"]);
  });

  it("lets exactly one of many concurrent debits through when funds cover one", async () => {
    await repo.credit({ accountId: "u1", amount: "5", kind: "adjustment", idempotencyKey: "admin:adjustment:seed" });

    const results = await Promise.allSettled(
      Array.from({ length: 5 }, (_, index) =>
        repo.debit({ accountId: "u1", amount: "5", kind: "debit", idempotencyKey: `conversion:reserve:r${index}` }),
      ),
    );

    expect(results.filter((item) => item.status === "fulfilled")).toHaveLength(1);
    expect(await repo.getBalance("u1")).toBe("0");
  });
});

describe("ledgerRepo (db)", () => {
  function createQuery(result: unknown) {
    const query: Record<string, unknown> = {};
    for (const method of ["from", "where", "limit", "for", "values", "onConflictDoNothing", "returning", "set", "orderBy"]) {
      query[method] = vi.fn(() => query);
    }
    query.then = (onFulfilled: (value: unknown) => unknown, onRejected?: (reason: unknown) => unknown) =>
      (result instanceof Error ? Promise.reject(result) : Promise.resolve(result)).then(onFulfilled, onRejected);
    return query;
  }

  function createDbMock(queues: { select?: unknown[]; insert?: unknown[]; update?: unknown[] }) {
    const selectQueue = [...(queues.select ?? [])];
    const insertQueue = [...(queues.insert ?? [])];
    const updateQueue = [...(queues.update ?? [])];
    const insertValues: unknown[] = [];

    const db: Record<string, unknown> = {
      select: vi.fn(() => createQuery(selectQueue.shift() ?? [])),
      insert: vi.fn(() => {
        const query = createQuery(insertQueue.shift() ?? []);
        query.values = vi.fn((value: unknown) => {
          insertValues.push(value);
          return query;
        });
        return query;
      }),
      update: vi.fn(() => createQuery(updateQueue.shift() ?? [])),
    };
    db.transaction = vi.fn(async (fn: (tx: unknown) => Promise<unknown>) => fn(db));
    return { db: db as unknown as DbClient, insertValues };
  }

  const now = new Date("2026-02-01T00:00:00.000Z");

  function accountRow(overrides: Record<string, unknown> = {}) {
    return {
      id: "u1",
      balance: "100.000000",
      status: "active",
      version: 3,
      suspendedAt: null,
      suspendedReason: null,
      createdAt: now,
      updatedAt: now,
      ...overrides,
    };
  }

  function eventRow(overrides: Record<string, unknown> = {}) {
    return {
      id: "event-1",
      accountId: "u1",
      kind: "debit",
      amount: "-5.000000",
      resultingBalance: "95.000000",
      externalReference: "req-1",
      idempotencyKey: "conversion:reserve:req-1",
      metadata: null,
      createdAt: now,
      ...overrides,
    };
  }

  it("locks the account, appends the event and updates the balance", async () => {
    const { db, insertValues } = createDbMock({
      select: [[accountRow()], []],
      insert: [[], [eventRow()]],
      update: [[accountRow({ balance: "95", version: 4 })]],
    });
    const repo = createDbLedgerRepo(db);

    const result = await repo.debit({
      accountId: "u1",
      amount: "5",
      kind: "debit",
      externalReference: "req-1",
      idempotencyKey: "conversion:reserve:req-1",
      now,
    });

    expect(result.applied).toBe(true);
    expect(result.event).toMatchObject({ amount: "-5", resultingBalance: "95" });
    expect(result.account).toMatchObject({ balance: "95", version: 4 });
    expect(insertValues[1]).toMatchObject({ amount: "-5", resultingBalance: "95", kind: "debit" });
  });

  it("returns the existing event when the idempotency key was already written", async () => {
    const { db } = createDbMock({
      select: [[accountRow({ balance: "95" })], [eventRow()]],
      insert: [[]],
    });
    const repo = createDbLedgerRepo(db);

    const result = await repo.debit({
      accountId: "u1",
      amount: "5",
      kind: "debit",
      idempotencyKey: "conversion:reserve:req-1",
      now,
    });

    expect(result.applied).toBe(false);
    expect(result.event.id).toBe("event-1");
    expect(db.update).not.toHaveBeenCalled();
  });

  it("throws InsufficientFundsError without writing an event", async () => {
    const { db } = createDbMock({
      select: [[accountRow({ balance: "4.99" })], []],
      insert: [[]],
    });
    const repo = createDbLedgerRepo(db);

    await expect(
      repo.debit({ accountId: "u1", amount: "5", kind: "debit", idempotencyKey: "conversion:reserve:req-2", now }),
    ).rejects.toMatchObject({ name: "InsufficientFundsError", balance: "4.99", amount: "5" });
    expect(db.insert).toHaveBeenCalledTimes(1);
  });

  it("falls back to the stored event on a unique violation", async () => {
    const { db } = createDbMock({
      select: [[accountRow()], [], [eventRow({ kind: "refund", amount: "5" })], [accountRow()]],
      insert: [[], Object.assign(new Error("duplicate key"), { code: "23505" })],
    });
    const repo = createDbLedgerRepo(db);

    const result = await repo.credit({
      accountId: "u1",
      amount: "5",
      kind: "refund",
      idempotencyKey: "conversion:reserve:req-1",
      now,
    });

    expect(result.applied).toBe(false);
    expect(result.event.kind).toBe("refund");
  });

  it("rethrows non-unique errors", async () => {
    const { db } = createDbMock({
      select: [[accountRow()], []],
      insert: [[], new Error("db unavailable")],
    });
    const repo = createDbLedgerRepo(db);

    await expect(
      repo.credit({ accountId: "u1", amount: "1", kind: "deposit_credit", idempotencyKey: "deposit:credit:x", now }),
    ).rejects.toThrow("db unavailable");
  });

  it("returns 0 for unknown accounts", async () => {
    const { db } = createDbMock({ select: [[]] });
    const repo = createDbLedgerRepo(db);

    expect(await repo.getBalance("nobody")).toBe("0");
  });
});
