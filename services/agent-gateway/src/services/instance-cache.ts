import { createClient } from 'redis';

/**
 * Cache interface - contract for all implementations.
 * Values round-trip through JSON, so callers validate what `get` returns.
 */
export interface ICache {
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  getStats(): Promise<Record<string, number>>;
  close(): Promise<void>;
}

export function instanceDocumentsKey(accountSlug: string, instanceSlug: string): string {
  return `instance:${accountSlug}/${instanceSlug}`;
}

/**
 * In-memory cache (dev/local use)
 */
export class InMemoryCache implements ICache {
  private readonly entries = new Map<string, { payload: string; expiresAt: number | null }>();
  private hits = 0;
  private misses = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<unknown> {
    const entry = this.entries.get(key);
    if (!entry || (entry.expiresAt !== null && entry.expiresAt <= this.now())) {
      if (entry) this.entries.delete(key);
      this.misses++;
      return null;
    }
    this.hits++;
    return JSON.parse(entry.payload);
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    this.entries.set(key, {
      payload: JSON.stringify(value),
      expiresAt: ttlSeconds ? this.now() + ttlSeconds * 1000 : null,
    });
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async getStats(): Promise<Record<string, number>> {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis-backed cache (production use)
 */
export class RedisCache implements ICache {
  private readonly client: RedisClient;
  private readonly prefix: string;

  constructor(redisUrl: string, prefix: string = 'agent-gateway:') {
    this.prefix = prefix;
    this.client = createClient({ url: redisUrl });
    this.client.on('error', (error: Error) => {
      console.error('[cache] Redis client error:', error.message);
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async get(key: string): Promise<unknown> {
    const data = await this.client.get(this.prefix + key);
    return data ? JSON.parse(data) : null;
  }

  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    const payload = JSON.stringify(value);
    if (ttlSeconds) {
      await this.client.set(this.prefix + key, payload, { EX: ttlSeconds });
    } else {
      await this.client.set(this.prefix + key, payload);
    }
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(this.prefix + key)) > 0;
  }

  async clear(): Promise<void> {
    // only this service's keys; the database may be shared
    for await (const key of this.client.scanIterator({ MATCH: `${this.prefix}*`, COUNT: 100 })) {
      await this.client.del(key);
    }
  }

  async getStats(): Promise<Record<string, number>> {
    let keys = 0;
    for await (const _key of this.client.scanIterator({ MATCH: `${this.prefix}*`, COUNT: 100 })) {
      keys++;
    }
    return { entries: keys };
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}

/**
 * Redis when a URL is configured, otherwise process memory.
 */
export async function createCache(redisUrl: string | null): Promise<ICache> {
  if (redisUrl) {
    const cache = new RedisCache(redisUrl);
    await cache.connect();
    console.log('✅ Using Redis cache');
    return cache;
  }
  console.log('⚡ Using in-memory cache');
  return new InMemoryCache();
}
