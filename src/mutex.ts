/** Keeps the caller's names locked until `pending` settles, even after the holder returns. */
export type Hold = (pending: Promise<unknown>) => void;

/**
 * Async mutual exclusion keyed by name. Holders of the same name run one at a time in
 * arrival order; different names never block each other.
 *
 * Multi-name acquisition always locks in sorted order, so two callers locking overlapping
 * name sets cannot deadlock.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /** Releases deferred through `hold`, not yet done. */
  private readonly lingering = new Set<Promise<void>>();

  runExclusive<T>(name: string, fn: (hold: Hold) => Promise<T>): Promise<T> {
    return this.runExclusiveMany([name], fn);
  }

  async runExclusiveMany<T>(names: Iterable<string>, fn: (hold: Hold) => Promise<T>): Promise<T> {
    const ordered = [...new Set(names)].sort();
    const releases: Array<() => void> = [];
    const held: Array<Promise<unknown>> = [];
    const releaseAll = (): void => {
      for (const release of releases.reverse()) release();
    };
    try {
      for (const name of ordered) releases.push(await this.acquire(name));
      return await fn((pending) => {
        held.push(pending);
      });
    } finally {
      if (held.length === 0) releaseAll();
      else this.linger(Promise.allSettled(held).then(releaseAll));
    }
  }

  /** Names currently held or waited on. */
  get size(): number {
    return this.tails.size;
  }

  /** Resolves once every deferred release has happened. */
  async drain(): Promise<void> {
    while (this.lingering.size > 0) {
      await Promise.all([...this.lingering]);
    }
  }

  private linger(release: Promise<void>): void {
    const tracked: Promise<void> = release.then(() => {
      this.lingering.delete(tracked);
    });
    this.lingering.add(tracked);
  }

  private async acquire(name: string): Promise<() => void> {
    const previous = this.tails.get(name) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(name, tail);
    await previous;
    return () => {
      release();
      if (this.tails.get(name) === tail) this.tails.delete(name);
    };
  }
}
