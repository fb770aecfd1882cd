import type pino from "pino";
import { describeError } from "./errors";
import { itemKey, listKey } from "./keys";
import type { TaggedCache } from "./tagged-cache";

/** Loads every record of one entity type from the system of record. */
export type WarmSource = {
  entity: string;
  load(): Promise<Array<{ id: string | number }>>;
};

export type WarmOptions = {
  /** TTL in seconds for warmed entries. Default: 3600. */
  ttl?: number;
  /** Restrict warming to these entity types. */
  only?: string[];
  logger?: pino.Logger;
};

export type WarmReport = {
  total: number;
  byEntity: Record<string, number>;
};

/**
 * Pre-populate the cache: one `{entity}_list` entry holding every record and one
 * `{entity}_{id}` entry per record, all tagged with the entity name.
 * A source that fails is logged and counted as 0; the others still run.
 */
export async function warmCache(
  cache: TaggedCache,
  sources: WarmSource[],
  options: WarmOptions = {}
): Promise<WarmReport> {
  const ttl = options.ttl ?? 3600;
  const logger = options.logger ?? cache.log.child({ component: "warm" });
  const report: WarmReport = { total: 0, byEntity: {} };

  for (const source of sources) {
    if (options.only && !options.only.includes(source.entity)) continue;
    let count = 0;
    try {
      const records = await source.load();
      const tags = [source.entity];
      await cache.set(listKey(source.entity), records, ttl, tags);
      count = 1;
      for (const record of records) {
        await cache.set(itemKey(source.entity, record.id), record, ttl, tags);
        count++;
      }
      logger.info({ entity: source.entity, count }, `warmed ${source.entity} cache`);
    } catch (e: unknown) {
      logger.error({ entity: source.entity, err: describeError(e) }, `error warming ${source.entity} cache`);
      count = 0;
    }
    report.byEntity[source.entity] = count;
    report.total += count;
  }

  logger.info({ total: report.total, ttl }, `warmed cache with ${report.total} items`);
  return report;
}
