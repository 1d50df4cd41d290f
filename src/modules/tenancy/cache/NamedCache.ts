/**
 * Named Cache
 *
 * Boundary of the generic cache layer the tenant cache manager works on.
 * Values cross the boundary as JSON, so every backend hands out copies and
 * never shared references.
 */

export interface NamedCache {
  readonly name: string;
  get<T>(key: string): Promise<T | undefined>;
  put(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  evict(key: string): Promise<boolean>;
  clear(): Promise<void>;
}

/**
 * A cache that can list its keys, which allows per-tenant eviction and
 * integrity checks without touching other tenants' entries.
 */
export interface EnumerableNamedCache extends NamedCache {
  keys(prefix: string): Promise<string[]>;
}

export interface CacheProvider {
  getCache(name: string): NamedCache | undefined;
  getCacheNames(): string[];
}

export interface NamedCacheDefinition {
  name: string;
  ttlSeconds: number;
}

export const DEFAULT_CACHE_DEFINITIONS: readonly NamedCacheDefinition[] = [
  { name: "users", ttlSeconds: 30 * 60 },
  { name: "companies", ttlSeconds: 2 * 60 * 60 },
  { name: "reports", ttlSeconds: 15 * 60 },
  { name: "assets", ttlSeconds: 60 * 60 },
  { name: "workOrders", ttlSeconds: 15 * 60 },
  { name: "schools", ttlSeconds: 60 * 60 },
  { name: "statistics", ttlSeconds: 5 * 60 },
  { name: "permissions", ttlSeconds: 60 * 60 },
  { name: "api-responses", ttlSeconds: 2 * 60 },
];

export function isEnumerableCache(cache: NamedCache): cache is EnumerableNamedCache {
  return "keys" in cache && typeof cache.keys === "function";
}

interface MemoryEntry {
  payload: string;
  expiresAt: number | null;
}

/**
 * In-process cache backed by a Map with per-entry expiry
 */
export class InMemoryNamedCache implements EnumerableNamedCache {
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(
    readonly name: string,
    private readonly defaultTtlSeconds: number,
    private readonly now: () => number = Date.now,
  ) {}

  async get<T>(key: string): Promise<T | undefined> {
    const entry = this.liveEntry(key);
    if (!entry) {
      return undefined;
    }
    const value: T = JSON.parse(entry.payload);
    return value;
  }

  async put(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.defaultTtlSeconds;
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: ttl > 0 ? this.now() + ttl * 1000 : null,
    });
  }

  async evict(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async keys(prefix: string): Promise<string[]> {
    const matches: string[] = [];
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix) && this.liveEntry(key)) {
        matches.push(key);
      }
    }
    return matches;
  }

  get size(): number {
    return this.entries.size;
  }

  private liveEntry(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }
}

export class InMemoryCacheProvider implements CacheProvider {
  private readonly caches = new Map<string, NamedCache>();

  constructor(
    definitions: readonly NamedCacheDefinition[] = DEFAULT_CACHE_DEFINITIONS,
    now?: () => number,
  ) {
    for (const definition of definitions) {
      this.caches.set(
        definition.name,
        new InMemoryNamedCache(definition.name, definition.ttlSeconds, now),
      );
    }
  }

  getCache(name: string): NamedCache | undefined {
    return this.caches.get(name);
  }

  getCacheNames(): string[] {
    return [...this.caches.keys()];
  }
}
