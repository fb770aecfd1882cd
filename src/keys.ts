/**
 * Key naming shared by callers: `{entity}_list` for collections, `{entity}_{id}` for records.
 * The entity name doubles as the namespace statistics are counted under.
 */

export const KEY_SEPARATOR = "_";

/** `prefix`, or `prefix_id` when an identifier is given. */
export function cacheKey(prefix: string, id?: string | number): string {
  return id === undefined || id === "" ? prefix : `${prefix}${KEY_SEPARATOR}${id}`;
}

export function listKey(entity: string): string {
  return cacheKey(entity, "list");
}

export function itemKey(entity: string, id: string | number): string {
  return cacheKey(entity, id);
}
