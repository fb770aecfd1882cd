export type HitMiss = {
  hits: number;
  misses: number;
};

/**
 * Cumulative hit/miss counters per namespace. Counts never decay; only `reset` clears them.
 */
export class HitMissCounters {
  private readonly counters = new Map<string, HitMiss>();

  constructor(private readonly separator: string) {}

  /** Portion of `key` before the first separator, or the whole key. */
  namespaceOf(key: string): string {
    const at = key.indexOf(this.separator);
    return at === -1 ? key : key.slice(0, at);
  }

  recordHit(key: string): void {
    this.counter(this.namespaceOf(key)).hits++;
  }

  recordMiss(key: string): void {
    this.counter(this.namespaceOf(key)).misses++;
  }

  /** Snapshot for one namespace (zeros when nothing was recorded). */
  snapshot(namespace: string): HitMiss {
    const c = this.counters.get(namespace);
    return { hits: c?.hits ?? 0, misses: c?.misses ?? 0 };
  }

  snapshotAll(): Record<string, HitMiss> {
    const out: Record<string, HitMiss> = {};
    for (const [ns, c] of this.counters) out[ns] = { ...c };
    return out;
  }

  /** Reset one namespace, or all of them. */
  reset(namespace?: string): void {
    if (namespace === undefined) this.counters.clear();
    else this.counters.delete(namespace);
  }

  private counter(namespace: string): HitMiss {
    let c = this.counters.get(namespace);
    if (!c) {
      c = { hits: 0, misses: 0 };
      this.counters.set(namespace, c);
    }
    return c;
  }
}
