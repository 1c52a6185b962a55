import type Redis from "ioredis";

export type NonceStore = {
  isReplay(appId: string, nonce: string, ttlMs: number): Promise<boolean>;
  close(): Promise<void>;
};

export class InMemoryNonceStore implements NonceStore {
  private cache = new Map<string, NodeJS.Timeout>();

  async isReplay(appId: string, nonce: string, ttlMs: number) {
    const key = `${appId}:${nonce}`;
    if (this.cache.has(key)) return true;
    const timer = setTimeout(() => this.cache.delete(key), ttlMs);
    timer.unref();
    this.cache.set(key, timer);
    return false;
  }

  async close() {
    for (const timer of this.cache.values()) {
      clearTimeout(timer);
    }
    this.cache.clear();
  }
}

/** SET NX with a TTL; shared between every RPC instance that uses the same Redis. */
export class RedisNonceStore implements NonceStore {
  constructor(
    private client: Redis,
    private keyPrefix = "cid-ledger:nonce",
  ) {}

  async isReplay(appId: string, nonce: string, ttlMs: number) {
    const key = `${this.keyPrefix}:${appId}:${nonce}`;
    const result = await this.client.set(key, "1", "PX", ttlMs, "NX");
    return result !== "OK";
  }

  async close() {}
}

export function createNonceStore(redis: Redis | null): NonceStore {
  return redis ? new RedisNonceStore(redis) : new InMemoryNonceStore();
}
