import type { TaggedCache } from "./tagged-cache";

export type EntityKeyReport = {
  count: number;
  sample: string[];
};

export type KeyReport = {
  totalKeys: number;
  byEntity: Record<string, EntityKeyReport>;
  /** Default TTL in seconds. */
  stdTTL: number;
};

/**
 * Count the store's keys per entity type. A key belongs to an entity when its namespace
 * (see `TaggedCache.namespaceOf`) equals the entity name.
 */
export async function keyReport(cache: TaggedCache, entities: string[], sampleSize = 5): Promise<KeyReport> {
  const keys = (await cache.scan()).sort();
  const byEntity: Record<string, EntityKeyReport> = {};
  for (const entity of entities) {
    const matching = keys.filter((key) => cache.namespaceOf(key) === entity);
    byEntity[entity] = { count: matching.length, sample: matching.slice(0, sampleSize) };
  }
  return { totalKeys: keys.length, byEntity, stdTTL: cache.stdTTL };
}
