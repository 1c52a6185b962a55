import { describe, expect, it } from "vitest";
import Redis from "ioredis-mock";
import {
  InMemoryRateLimitStore,
  RedisRateLimitStore,
  parseRpcRateLimitConfig,
  rateLimitKey,
} from "./rate-limit";

describe("rpc rate limit", () => {
  it("allows requests until limit is reached and blocks after", async () => {
    const store = new InMemoryRateLimitStore(() => 1_000);

    const first = await store.consume({ key: "bot:alice", limit: 2, windowMs: 60_000 });
    const second = await store.consume({ key: "bot:alice", limit: 2, windowMs: 60_000 });
    const third = await store.consume({ key: "bot:alice", limit: 2, windowMs: 60_000 });

    expect(first).toEqual({ allowed: true, limit: 2, remaining: 1, resetAtEpochMs: 61_000 });
    expect(second.allowed).toBe(true);
    expect(third.allowed).toBe(false);
    expect(third.remaining).toBe(0);

    await store.close();
  });

  it("opens a fresh window once the previous one has passed", async () => {
    let now = 0;
    const store = new InMemoryRateLimitStore(() => now);

    await store.consume({ key: "bot:alice", limit: 1, windowMs: 1_000 });
    const blocked = await store.consume({ key: "bot:alice", limit: 1, windowMs: 1_000 });
    now = 1_000;
    const reopened = await store.consume({ key: "bot:alice", limit: 1, windowMs: 1_000 });

    expect(blocked.allowed).toBe(false);
    expect(reopened).toEqual({ allowed: true, limit: 1, remaining: 0, resetAtEpochMs: 2_000 });

    await store.close();
  });

  it("uses independent buckets for different accounts", async () => {
    const store = new InMemoryRateLimitStore();

    const a = await store.consume({ key: rateLimitKey("bot", "alice"), limit: 1, windowMs: 60_000 });
    const b = await store.consume({ key: rateLimitKey("bot", "bob"), limit: 1, windowMs: 60_000 });

    expect(a.allowed).toBe(true);
    expect(b.allowed).toBe(true);
    expect(rateLimitKey("bot", null)).toBe("bot:*");

    await store.close();
  });

  it("counts across instances sharing one Redis", async () => {
    const client = new Redis();
    const storeA = new RedisRateLimitStore(client, "test-rl");
    const storeB = new RedisRateLimitStore(client, "test-rl");

    const first = await storeA.consume({ key: "bot:carol", limit: 1, windowMs: 60_000 });
    const second = await storeB.consume({ key: "bot:carol", limit: 1, windowMs: 60_000 });

    expect(first.allowed).toBe(true);
    expect(second).toMatchObject({ allowed: false, remaining: 0 });

    await client.quit();
  });

  it("parses env config with defaults", () => {
    const parsed = parseRpcRateLimitConfig({});

    expect(parsed).toEqual({
      enabled: true,
      windowMs: 60_000,
      maxRequests: 120,
    });
  });

  it("parses explicit env overrides", () => {
    const parsed = parseRpcRateLimitConfig({
      RPC_RATE_LIMIT_ENABLED: "false",
      RPC_RATE_LIMIT_WINDOW_MS: "120000",
      RPC_RATE_LIMIT_MAX_REQUESTS: "50",
    });

    expect(parsed).toEqual({
      enabled: false,
      windowMs: 120_000,
      maxRequests: 50,
    });
  });
});
