/* =========================================================================================
 * Backing stores
 * =======================================================================================*/

/**
 * Minimal key/value capability the cache is built on. Any store that can get, set with a
 * TTL, delete and list keys by prefix is pluggable.
 *
 * Payloads are opaque strings produced by the cache's codec.
 */
export interface BackingStore {
  /** Payload under `key`, or `null` when absent or expired. */
  rawGet(key: string): Promise<string | null>;
  rawSet(key: string, payload: string, ttlSeconds: number): Promise<void>;
  /** No error when `key` is absent. */
  rawDelete(key: string): Promise<void>;
  rawScanByPrefix(prefix: string): Promise<string[]>;
  /**
   * Drop expired payloads, resolving to how many went. Only stores that keep expired
   * payloads until they are read need it; the cache calls it on every sweep.
   */
  purgeExpired?(): Promise<number>;
  /** Release connections or timers held by the store. */
  close(): Promise<void>;
}

type StoredPayload = {
  payload: string;
  /** Absolute expiry (ms since epoch). */
  expiresAt: number;
};

export type MemoryStoreOptions = {
  /** Clock source for expiry; defaults to `Date.now`. */
  clock?: () => number;
};

/**
 * In-process store over a `Map`. Expired payloads are dropped when read or scanned, and by
 * `purgeExpired`.
 */
export class MemoryStore implements BackingStore {
  private readonly store = new Map<string, StoredPayload>();
  private readonly clock: () => number;

  constructor(options: MemoryStoreOptions = {}) {
    this.clock = options.clock ?? (() => Date.now());
  }

  async rawGet(key: string): Promise<string | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (this.clock() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }
    return entry.payload;
  }

  async rawSet(key: string, payload: string, ttlSeconds: number): Promise<void> {
    this.store.set(key, { payload, expiresAt: this.clock() + ttlSeconds * 1000 });
  }

  async rawDelete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async rawScanByPrefix(prefix: string): Promise<string[]> {
    const now = this.clock();
    const keys: string[] = [];
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
        continue;
      }
      if (key.startsWith(prefix)) keys.push(key);
    }
    return keys;
  }

  async purgeExpired(): Promise<number> {
    const now = this.clock();
    let purged = 0;
    for (const [key, entry] of this.store) {
      if (now > entry.expiresAt) {
        this.store.delete(key);
        purged++;
      }
    }
    return purged;
  }

  /** Number of payloads held, expired ones included until they are next touched. */
  get size(): number {
    return this.store.size;
  }

  async close(): Promise<void> {
    this.store.clear();
  }
}
