import Redis, { type RedisOptions } from "ioredis";
import { BackingStoreUnavailableError, describeError } from "./errors";
import type { BackingStore } from "./stores";

/** The ioredis commands the store issues. */
export type RedisClient = Pick<Redis, "get" | "set" | "del" | "scan" | "quit">;

export type RedisStoreOptions = {
  /** Prepended to every key so several caches can share one database. Default: "tc:". */
  keyPrefix?: string;
  /** SCAN batch size hint. Default: 100. */
  scanCount?: number;
};

/** Escape glob metacharacters so a literal prefix can be used in `SCAN MATCH`. */
function escapeGlob(text: string): string {
  return text.replace(/[*?[\]\\]/g, "\\$&");
}

/**
 * Backing store over a Redis connection. Expiry is delegated to Redis (`SET ... PX`).
 * Every client failure surfaces as `BackingStoreUnavailableError`.
 */
export class RedisStore implements BackingStore {
  private readonly keyPrefix: string;
  private readonly scanCount: number;

  constructor(private readonly client: RedisClient, options: RedisStoreOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? "tc:";
    this.scanCount = options.scanCount ?? 100;
  }

  async rawGet(key: string): Promise<string | null> {
    return this.run("GET", () => this.client.get(this.keyPrefix + key));
  }

  async rawSet(key: string, payload: string, ttlSeconds: number): Promise<void> {
    const ttlMs = Math.max(1, Math.ceil(ttlSeconds * 1000));
    await this.run("SET", () => this.client.set(this.keyPrefix + key, payload, "PX", ttlMs));
  }

  async rawDelete(key: string): Promise<void> {
    await this.run("DEL", () => this.client.del(this.keyPrefix + key));
  }

  async rawScanByPrefix(prefix: string): Promise<string[]> {
    const pattern = `${escapeGlob(this.keyPrefix + prefix)}*`;
    const found = new Set<string>();
    let cursor = "0";
    do {
      const [next, batch] = await this.run("SCAN", () =>
        this.client.scan(cursor, "MATCH", pattern, "COUNT", this.scanCount)
      );
      for (const key of batch) found.add(key.slice(this.keyPrefix.length));
      cursor = next;
    } while (cursor !== "0");
    return [...found];
  }

  async close(): Promise<void> {
    await this.run("QUIT", () => this.client.quit());
  }

  private async run<T>(command: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e: unknown) {
      throw new BackingStoreUnavailableError(`Redis ${command} failed: ${describeError(e)}`, e);
    }
  }
}

/**
 * Connect to Redis at `url` and wrap the connection in a `RedisStore`.
 * The connection is released by `close()`.
 */
export function createRedisStore(
  url: string,
  options: RedisStoreOptions & { redis?: RedisOptions } = {}
): RedisStore {
  const client = new Redis(url, { maxRetriesPerRequest: 1, ...options.redis });
  return new RedisStore(client, options);
}
