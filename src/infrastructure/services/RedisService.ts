import { createClient } from "redis";
import { structuredLogger } from "../../core/logger/structuredLogger";

/**
 * String key-value operations the Redis-backed caches need
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(keys: string[]): Promise<number>;
  scanKeys(pattern: string): Promise<string[]>;
}

export type RedisClient = ReturnType<typeof createClient>;

export class RedisService implements KeyValueStore {
  private client: RedisClient;

  constructor(url: string, password?: string) {
    this.client = createClient({ url, password });

    this.client.on("error", (err: Error) =>
      structuredLogger.error("Redis client error", err, {
        module: "redis",
        action: "client",
      }),
    );
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async disconnect(): Promise<void> {
    await this.client.disconnect();
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.setEx(key, ttlSeconds, value);
    } else {
      await this.client.set(key, value);
    }
  }

  async get(key: string): Promise<string | null> {
    return await this.client.get(key);
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return await this.client.del(keys);
  }

  // SCAN rather than KEYS so large keyspaces do not block the server
  async scanKeys(pattern: string): Promise<string[]> {
    const keys: string[] = [];
    let cursor = 0;

    do {
      const result = await this.client.scan(cursor, {
        MATCH: pattern,
        COUNT: 100,
      });
      cursor = result.cursor;
      keys.push(...result.keys);
    } while (cursor !== 0);

    return keys;
  }
}
