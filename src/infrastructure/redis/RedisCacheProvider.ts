/**
 * Redis Cache Provider
 *
 * Named caches stored in Redis under `cache:{name}:{key}`, with per-cache
 * TTLs. Key enumeration uses SCAN, so tenant eviction stays precise.
 */

import {
  CacheProvider,
  DEFAULT_CACHE_DEFINITIONS,
  EnumerableNamedCache,
  NamedCache,
  NamedCacheDefinition,
} from "../../modules/tenancy/cache/NamedCache";
import { KeyValueStore } from "../services/RedisService";

const GLOB_SPECIAL = /[*?[\]\\]/g;

export function escapeGlob(value: string): string {
  return value.replace(GLOB_SPECIAL, (match) => `\\${match}`);
}

export class RedisNamedCache implements EnumerableNamedCache {
  private readonly namespace: string;

  constructor(
    readonly name: string,
    private readonly defaultTtlSeconds: number,
    private readonly store: KeyValueStore,
  ) {
    this.namespace = `cache:${name}:`;
  }

  async get<T>(key: string): Promise<T | undefined> {
    const payload = await this.store.get(this.namespace + key);
    if (payload === null) {
      return undefined;
    }
    const value: T = JSON.parse(payload);
    return value;
  }

  async put(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    await this.store.set(
      this.namespace + key,
      JSON.stringify(value),
      ttlSeconds ?? this.defaultTtlSeconds,
    );
  }

  async evict(key: string): Promise<boolean> {
    const removed = await this.store.del([this.namespace + key]);
    return removed > 0;
  }

  async clear(): Promise<void> {
    const keys = await this.store.scanKeys(`${escapeGlob(this.namespace)}*`);
    await this.store.del(keys);
  }

  async keys(prefix: string): Promise<string[]> {
    const keys = await this.store.scanKeys(`${escapeGlob(this.namespace + prefix)}*`);
    return keys.map((key) => key.slice(this.namespace.length));
  }
}

export class RedisCacheProvider implements CacheProvider {
  private readonly caches = new Map<string, NamedCache>();

  constructor(
    store: KeyValueStore,
    definitions: readonly NamedCacheDefinition[] = DEFAULT_CACHE_DEFINITIONS,
  ) {
    for (const definition of definitions) {
      this.caches.set(
        definition.name,
        new RedisNamedCache(definition.name, definition.ttlSeconds, store),
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
