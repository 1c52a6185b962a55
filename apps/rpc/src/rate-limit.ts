import type Redis from "ioredis";

export type RateLimitDecision = {
  allowed: boolean;
  limit: number;
  remaining: number;
  resetAtEpochMs: number;
};

export type RateLimitStore = {
  consume(input: { key: string; limit: number; windowMs: number }): Promise<RateLimitDecision>;
  close(): Promise<void>;
};

type Bucket = {
  count: number;
  resetAtEpochMs: number;
  timer: NodeJS.Timeout;
};

function decide(count: number, limit: number, resetAtEpochMs: number): RateLimitDecision {
  return {
    allowed: count <= limit,
    limit,
    remaining: Math.max(0, limit - count),
    resetAtEpochMs,
  };
}

export class InMemoryRateLimitStore implements RateLimitStore {
  private buckets = new Map<string, Bucket>();

  constructor(private nowMsFn: () => number = Date.now) {}

  async consume(input: { key: string; limit: number; windowMs: number }): Promise<RateLimitDecision> {
    const now = this.nowMsFn();
    const existing = this.buckets.get(input.key);

    if (!existing || now >= existing.resetAtEpochMs) {
      if (existing) {
        clearTimeout(existing.timer);
      }
      const resetAtEpochMs = now + input.windowMs;
      const timer = setTimeout(() => {
        const current = this.buckets.get(input.key);
        if (current && current.resetAtEpochMs <= this.nowMsFn()) {
          this.buckets.delete(input.key);
        }
      }, input.windowMs);
      timer.unref();
      this.buckets.set(input.key, { count: 1, resetAtEpochMs, timer });
      return decide(1, input.limit, resetAtEpochMs);
    }

    existing.count += 1;
    return decide(existing.count, input.limit, existing.resetAtEpochMs);
  }

  async close(): Promise<void> {
    for (const bucket of this.buckets.values()) {
      clearTimeout(bucket.timer);
    }
    this.buckets.clear();
  }
}

/** Fixed window counter: INCR, with the window's TTL set by the first hit. */
export class RedisRateLimitStore implements RateLimitStore {
  constructor(
    private client: Redis,
    private keyPrefix = "cid-ledger:ratelimit",
    private nowMsFn: () => number = Date.now,
  ) {}

  async consume(input: { key: string; limit: number; windowMs: number }): Promise<RateLimitDecision> {
    const key = `${this.keyPrefix}:${input.key}`;
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.pexpire(key, input.windowMs);
    }
    const ttlMs = await this.client.pttl(key);
    const resetAtEpochMs = this.nowMsFn() + (ttlMs > 0 ? ttlMs : input.windowMs);
    return decide(count, input.limit, resetAtEpochMs);
  }

  async close(): Promise<void> {}
}

export function createRateLimitStore(redis: Redis | null): RateLimitStore {
  return redis ? new RedisRateLimitStore(redis) : new InMemoryRateLimitStore();
}

export type RpcRateLimitConfig = {
  enabled: boolean;
  windowMs: number;
  maxRequests: number;
};

function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
    return false;
  }
  return fallback;
}

function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
}

export function parseRpcRateLimitConfig(env: NodeJS.ProcessEnv = process.env): RpcRateLimitConfig {
  return {
    enabled: parseBoolean(env.RPC_RATE_LIMIT_ENABLED, true),
    windowMs: parsePositiveInteger(env.RPC_RATE_LIMIT_WINDOW_MS, 60_000),
    maxRequests: parsePositiveInteger(env.RPC_RATE_LIMIT_MAX_REQUESTS, 120),
  };
}

/** Buckets per calling app and end-user account, so one busy user cannot starve the rest. */
export function rateLimitKey(appId: string, accountId: string | null): string {
  return accountId ? `${appId}:${accountId}` : `${appId}:*`;
}
