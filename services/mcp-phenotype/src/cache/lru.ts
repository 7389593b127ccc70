import { LRUCache } from "lru-cache";

export function createTTLCache<
  K extends NonNullable<unknown>,
  V extends NonNullable<unknown>,
>(
  ttlMs: number,
  max = 500,
): LRUCache<K, V> {
  return new LRUCache<K, V>({
    max,
    ttl: ttlMs,
    updateAgeOnGet: true,
    updateAgeOnHas: true,
  });
}

/** Order-insensitive key for a pair of phenotype id sets. */
export function phenotypeSetKey(
  observed: Iterable<string>,
  excluded: Iterable<string>,
): string {
  return JSON.stringify([[...new Set(observed)].sort(), [...new Set(excluded)].sort()]);
}
