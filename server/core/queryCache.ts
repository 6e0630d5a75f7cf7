interface CacheEntry<T> {
  data: T;
  cachedAt: number;
  expiry: number;
}

const caches = new Map<string, CacheEntry<unknown>>();

export function getCached<T>(key: string): T | null {
  const entry = getCachedEntry<T>(key);
  return entry ? entry.data : null;
}

export function getCachedEntry<T>(key: string): { data: T; cachedAt: number } | null {
  const entry = caches.get(key);
  if (entry && entry.expiry > Date.now()) {
    // Callers pair keys with a single value type
    return { data: entry.data as T, cachedAt: entry.cachedAt };
  }
  if (entry) {
    caches.delete(key);
  }
  return null;
}

function sweepExpired(now: number): void {
  for (const [key, entry] of caches) {
    if (entry.expiry <= now) {
      caches.delete(key);
    }
  }
}

// Keys can come from request input, so every write also drops expired entries
export function setCache<T>(key: string, data: T, ttlMs: number): void {
  const now = Date.now();
  sweepExpired(now);
  caches.set(key, { data, cachedAt: now, expiry: now + ttlMs });
}

export function invalidateCache(keyPrefix: string): void {
  for (const key of caches.keys()) {
    if (key.startsWith(keyPrefix)) {
      caches.delete(key);
    }
  }
}

export function countCached(keyPrefix: string): number {
  const now = Date.now();
  let count = 0;
  for (const [key, entry] of caches) {
    if (key.startsWith(keyPrefix) && entry.expiry > now) {
      count++;
    }
  }
  return count;
}

/** Entries held in memory, expired or not. */
export function cacheSize(): number {
  return caches.size;
}

export function clearAllCaches(): void {
  caches.clear();
}
