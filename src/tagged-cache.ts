import { EventEmitter } from "events";
import { performance } from "perf_hooks";
import type pino from "pino";
import { PayloadCodec } from "./codec";
import {
  BackingStoreUnavailableError,
  CacheError,
  CacheTimeoutError,
  InvalidArgumentError,
  describeError,
} from "./errors";
import { KeyedMutex, type Hold } from "./mutex";
import { validateOptions, type CacheOptions, type ResolvedCacheOptions } from "./options";
import { HitMissCounters, type HitMiss } from "./stats";
import type { BackingStore } from "./stores";
import { withTimeout } from "./timeout";

/* =========================================================================================
 * Types
 * =======================================================================================*/

/** Outcome of a read. A miss is a result, never an error. */
export type CacheResult<T> = { found: true; value: T } | { found: false };

/** Per-call overrides. */
export type OperationOptions = {
  /** Timeout in ms for the backing-store call; 0 waits indefinitely. */
  timeout?: number;
};

/** Bookkeeping kept for each key the cache has written. */
type EntryMeta = {
  tags: Set<string>;
  /** Absolute expiry (ms since epoch). */
  expiresAt: number;
};

function assertKey(key: string): void {
  if (typeof key !== "string" || key.length === 0) {
    throw new InvalidArgumentError(`"key" must be a non-empty string`);
  }
}

function assertTTL(ttl: number): void {
  if (!Number.isFinite(ttl) || ttl <= 0) {
    throw new InvalidArgumentError(`"ttl" must be a positive number of seconds (got ${ttl})`);
  }
}

function toTagSet(tags: Iterable<string>): Set<string> {
  const set = new Set<string>();
  for (const tag of tags) {
    if (typeof tag !== "string" || tag.length === 0) {
      throw new InvalidArgumentError(`tags must be non-empty strings`);
    }
    set.add(tag);
  }
  return set;
}

/* =========================================================================================
 * TaggedCache
 * =======================================================================================*/

/**
 * Cache with TTL, tag-based group invalidation and per-namespace hit/miss counters, over a
 * pluggable `BackingStore`.
 *
 * - Payloads live in the store; the tag index and expiry bookkeeping live in this instance and
 *   are never written to the store, so the index cannot expire independently of its members.
 * - Operations on one key are serialized; `invalidateTag` and `clear` lock every key they touch.
 * - Values are JSON-encoded on write and decoded on read: callers always get a fresh copy.
 * - Emits events: `"set" (key, tags)`, `"del" (key)`, `"expired" (key)`,
 *   `"invalidate" (tag, keys)`, `"clear" ()`.
 */
export class TaggedCache extends EventEmitter {
  /** Validated, fully-populated options. */
  protected readonly options: ResolvedCacheOptions;

  private readonly store: BackingStore;
  private readonly codec: PayloadCodec;
  private readonly logger: pino.Logger;
  private readonly stats: HitMissCounters;
  private readonly locks = new KeyedMutex();

  /** key -> tags and expiry of the value last written under it. */
  private readonly entries = new Map<string, EntryMeta>();

  /** Tag index: tag -> keys that carry it. */
  private readonly tagMap = new Map<string, Set<string>>();

  /** Periodic index sweep timer. */
  private checkInterval: NodeJS.Timeout | null = null;

  constructor(options: CacheOptions = {}) {
    super();
    this.options = validateOptions(options);
    this.store = this.options.store;
    this.codec = new PayloadCodec(this.options.encryption ? this.options.secretKey : undefined);
    this.logger = this.options.logger;
    this.stats = new HitMissCounters(this.options.namespaceSeparator);

    if (this.options.checkperiod > 0) {
      this.checkInterval = setInterval(() => this.sweepExpired(), this.options.checkperiod * 1000);
      this.checkInterval.unref();
    }
  }

  /**
   * Read `key`. Absent and expired entries are misses; an expired entry is also dropped from
   * the store and the tag index.
   *
   * A payload this instance has no index entry for (left by an earlier run, or written by
   * another process) is not reachable by tag, so it is deleted and reported as a miss.
   */
  async get<T = unknown>(key: string, opts: OperationOptions = {}): Promise<CacheResult<T>> {
    assertKey(key);
    return this.locks.runExclusive(key, async (hold) => {
      const meta = this.entries.get(key);
      const expired = meta !== undefined && this.isExpired(meta);
      const payload = expired ? null : await this.call("get", () => this.store.rawGet(key), opts, hold);

      if (payload === null || meta === undefined) {
        if (expired) {
          await this.call("delete", () => this.store.rawDelete(key), opts, hold);
          this.unindex(key);
          this.emit("expired", key);
        } else if (meta) {
          // evicted by the store ahead of its TTL
          this.unindex(key);
        } else if (payload !== null) {
          await this.call("delete", () => this.store.rawDelete(key), opts, hold);
          this.logger.debug({ key }, "dropped unindexed payload");
        }
        this.stats.recordMiss(key);
        this.logger.debug({ key }, "cache miss");
        return { found: false };
      }

      const value = this.codec.decode<T>(payload);
      this.stats.recordHit(key);
      this.logger.debug({ key }, "cache hit");
      return { found: true, value };
    });
  }

  /**
   * Write `value` under `key` for `ttl` seconds (default `stdTTL`), replacing any previous
   * value and its tag memberships.
   */
  async set(
    key: string,
    value: unknown,
    ttl?: number,
    tags: Iterable<string> = [],
    opts: OperationOptions = {}
  ): Promise<void> {
    const { payload, seconds, tagSet } = this.prepare(key, value, ttl, tags);
    await this.write(key, payload, seconds, tagSet, opts);
  }

  /**
   * Commit `value` to the system of record, then cache it. Nothing is cached when `commit`
   * rejects; its error reaches the caller unchanged.
   *
   * Arguments are checked before `commit` runs; the value is encoded after it resolves, so
   * changes `commit` makes to it (an assigned id, say) are cached.
   *
   * If the cache write fails after a successful commit, the key is dropped so no stale value
   * outlives the update, and the cache error is rethrown.
   */
  async writeThrough<T>(
    key: string,
    value: T,
    commit: (value: T) => unknown,
    ttl?: number,
    tags: Iterable<string> = []
  ): Promise<void> {
    const { seconds, tagSet } = this.prepare(key, value, ttl, tags);
    await commit(value);
    try {
      await this.write(key, this.codec.encode(value), seconds, tagSet, {});
    } catch (e: unknown) {
      this.logger.warn({ key, err: describeError(e) }, "write-through cache update failed after commit");
      await this.delete(key).catch((cleanup: unknown) => {
        this.logger.error({ key, err: describeError(cleanup) }, "could not drop stale entry after failed write-through");
      });
      throw e;
    }
  }

  /**
   * Cache-aside read: return the cached value, or compute, cache and return it.
   * Logs the elapsed time and whether the read hit.
   */
  async getOrSet<T>(
    key: string,
    compute: () => T | Promise<T>,
    ttl?: number,
    tags: Iterable<string> = []
  ): Promise<T> {
    const started = performance.now();
    const cached = await this.get<T>(key);
    if (cached.found) {
      this.logger.debug({ key, hit: true, durationMs: performance.now() - started }, "cache-aside read");
      return cached.value;
    }
    const value = await compute();
    await this.set(key, value, ttl, tags);
    this.logger.debug({ key, hit: false, durationMs: performance.now() - started }, "cache-aside read");
    return value;
  }

  /** Delete a key (no-op if missing). Resolves to whether the cache knew the key. */
  async delete(key: string, opts: OperationOptions = {}): Promise<boolean> {
    assertKey(key);
    const known = await this.locks.runExclusive(key, async (hold) => {
      await this.call("delete", () => this.store.rawDelete(key), opts, hold);
      return this.unindex(key);
    });
    if (known) this.emit("del", key);
    return known;
  }

  /**
   * Delete every entry carrying `tag` and drop them from all other tags.
   * Keys re-tagged by a concurrent `set` before their lock is taken are left alone.
   *
   * @returns The keys that were invalidated.
   */
  async invalidateTag(tag: string): Promise<string[]> {
    const snapshot = [...(this.tagMap.get(tag) ?? [])];
    if (snapshot.length === 0) return [];

    const removed = await this.locks.runExclusiveMany(snapshot, (hold) =>
      this.deleteMany(
        snapshot.filter((key) => this.entries.get(key)?.tags.has(tag)),
        hold
      )
    );

    this.logger.info({ tag, keys: removed.length }, "invalidated tag");
    this.emit("invalidate", tag, removed);
    return removed;
  }

  /** Check existence **and validity** of a key without touching the statistics. */
  async has(key: string): Promise<boolean> {
    assertKey(key);
    const meta = this.entries.get(key);
    if (!meta || this.isExpired(meta)) return false;
    return (await this.call("get", () => this.store.rawGet(key), {})) !== null;
  }

  /** Remaining TTL (seconds) or `undefined` (unknown/expired). */
  getTTL(key: string): number | undefined {
    const meta = this.entries.get(key);
    if (!meta) return undefined;
    const remainingMs = meta.expiresAt - this.options.clock();
    return remainingMs > 0 ? Math.ceil(remainingMs / 1000) : undefined;
  }

  /** Unexpired keys carrying `tag`. */
  getKeysByTag(tag: string): string[] {
    return [...(this.tagMap.get(tag) ?? [])].filter((key) => this.isLive(key));
  }

  /** Unexpired keys written through this cache. */
  getKeys(): string[] {
    return [...this.entries.keys()].filter((key) => this.isLive(key));
  }

  /** Tags that currently have at least one member. */
  getTags(): string[] {
    return [...this.tagMap.keys()];
  }

  /** Hit/miss snapshot for one namespace. */
  statistics(namespace: string): HitMiss {
    return this.stats.snapshot(namespace);
  }

  allStatistics(): Record<string, HitMiss> {
    return this.stats.snapshotAll();
  }

  /** Reset counters for one namespace, or all of them. */
  resetStatistics(namespace?: string): void {
    this.stats.reset(namespace);
  }

  /** Namespace a key's hits and misses are counted under. */
  namespaceOf(key: string): string {
    return this.stats.namespaceOf(key);
  }

  /** Keys in the backing store starting with `prefix`, whether or not this cache wrote them. */
  async scan(prefix = ""): Promise<string[]> {
    return this.call("scan", () => this.store.rawScanByPrefix(prefix), {});
  }

  /** Default TTL in seconds. */
  get stdTTL(): number {
    return this.options.stdTTL;
  }

  /**
   * Drop expired keys from the tag index, and have the store purge its expired payloads when
   * it keeps them around until read (as `MemoryStore` does).
   */
  sweepExpired(): void {
    const now = this.options.clock();
    for (const [key, meta] of this.entries) {
      if (now > meta.expiresAt) {
        this.unindex(key);
        this.emit("expired", key);
      }
    }
    this.store.purgeExpired?.().catch((e: unknown) => {
      this.logger.error({ err: describeError(e) }, "store purge failed");
    });
  }

  /** Delete every key written through this cache and clear the tag index. */
  async clear(): Promise<void> {
    const keys = [...this.entries.keys()];
    await this.locks.runExclusiveMany(keys, (hold) => this.deleteMany(keys, hold));
    this.emit("clear");
  }

  /**
   * Stop the periodic sweeper, wait for store calls that outlived their timeout, and release
   * the store (call on shutdown).
   */
  async close(): Promise<void> {
    if (this.checkInterval) clearInterval(this.checkInterval);
    this.checkInterval = null;
    await this.locks.drain();
    await this.store.close();
  }

  /** Logger this cache writes to; helpers built on the cache log through a child of it. */
  get log(): pino.Logger {
    return this.logger;
  }

  /* ---------------------------------------------------------------------------------------
   * Internals
   * -------------------------------------------------------------------------------------*/

  /** Validate and encode a write before anything reaches the store. */
  private prepare(
    key: string,
    value: unknown,
    ttl: number | undefined,
    tags: Iterable<string>
  ): { payload: string; seconds: number; tagSet: Set<string> } {
    assertKey(key);
    const seconds = ttl ?? this.options.stdTTL;
    assertTTL(seconds);
    const tagSet = toTagSet(tags);
    return { payload: this.codec.encode(value), seconds, tagSet };
  }

  private async write(
    key: string,
    payload: string,
    seconds: number,
    tagSet: Set<string>,
    opts: OperationOptions
  ): Promise<void> {
    await this.locks.runExclusive(key, async (hold) => {
      const previous = this.entries.get(key);
      const expiresAt = this.options.clock() + seconds * 1000;

      // While the write is in flight, and after it fails, the key stays under both its old
      // and new tags so an invalidation of either still reaches whatever the store holds.
      if (previous) {
        this.reindex(key, new Set([...previous.tags, ...tagSet]), Math.max(previous.expiresAt, expiresAt));
      } else {
        this.reindex(key, tagSet, expiresAt);
      }

      await this.call("set", () => this.store.rawSet(key, payload, seconds), opts, (late) =>
        hold(this.discardLateWrite(key, late))
      );
      this.reindex(key, tagSet, expiresAt);
    });
    this.emit("set", key, [...tagSet]);
  }

  /**
   * A write reported as timed out may still land. Once it settles the key is deleted, so a
   * write its caller saw fail is never served. The key stays locked until then.
   */
  private async discardLateWrite(key: string, late: Promise<unknown>): Promise<void> {
    await late.then(
      () => undefined,
      () => undefined
    );
    try {
      await this.call("delete", () => this.store.rawDelete(key), {});
      this.unindex(key);
    } catch (e: unknown) {
      this.logger.error({ key, err: describeError(e) }, "could not drop late write");
    }
  }

  /**
   * Delete `keys` from the store and the index. Callers hold the key locks.
   * Keys whose store delete failed stay indexed; the first failure is rethrown.
   */
  private async deleteMany(keys: string[], hold: Hold): Promise<string[]> {
    const results = await Promise.allSettled(
      keys.map((key) => this.call("delete", () => this.store.rawDelete(key), {}, hold))
    );
    const removed: string[] = [];
    let failure: unknown;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        this.unindex(keys[i]);
        removed.push(keys[i]);
      } else if (failure === undefined) {
        failure = result.reason;
      }
    });
    if (failure !== undefined) throw failure;
    return removed;
  }

  /** Replace the index entry for `key`. */
  private reindex(key: string, tags: Set<string>, expiresAt: number): void {
    this.unindex(key);
    this.entries.set(key, { tags: new Set(tags), expiresAt });
    for (const tag of tags) {
      let keys = this.tagMap.get(tag);
      if (!keys) {
        keys = new Set();
        this.tagMap.set(tag, keys);
      }
      keys.add(key);
    }
  }

  /** Remove `key` from the index. Returns whether it was indexed. */
  private unindex(key: string): boolean {
    const meta = this.entries.get(key);
    if (!meta) return false;
    for (const tag of meta.tags) {
      const keys = this.tagMap.get(tag);
      if (keys) {
        keys.delete(key);
        if (keys.size === 0) this.tagMap.delete(tag);
      }
    }
    this.entries.delete(key);
    return true;
  }

  private isExpired(meta: EntryMeta): boolean {
    return this.options.clock() > meta.expiresAt;
  }

  private isLive(key: string): boolean {
    const meta = this.entries.get(key);
    return meta !== undefined && !this.isExpired(meta);
  }

  /**
   * Run a store call under the operation timeout. Failures that are not already cache errors
   * are reported as `BackingStoreUnavailableError`.
   *
   * On a timeout the caller hears about it at once, while `hold` keeps its locks until the
   * store call has actually settled.
   */
  private async call<T>(
    operation: string,
    fn: () => Promise<T>,
    opts: OperationOptions,
    hold?: Hold
  ): Promise<T> {
    const timeout = opts.timeout ?? this.options.operationTimeout;
    const pending = this.attempt(operation, fn);
    try {
      return await withTimeout(pending, timeout, operation);
    } catch (e: unknown) {
      if (e instanceof CacheTimeoutError) hold?.(pending);
      throw e;
    }
  }

  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e: unknown) {
      if (e instanceof CacheError) throw e;
      throw new BackingStoreUnavailableError(`Backing store ${operation} failed: ${describeError(e)}`, e);
    }
  }
}
