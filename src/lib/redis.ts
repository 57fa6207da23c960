import Redis from 'ioredis';
import { MemoryTtlCache } from './cache';

/**
 * String-keyed cache with TTLs in seconds. Values must be JSON-serializable.
 */
export interface CacheStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Drops every key starting with `prefix`; resolves to the number removed. */
  invalidate(prefix: string): Promise<number>;
}

export type CacheAdapterOptions = {
  redisUrl?: string | null;
  keyPrefix?: string;
  memoryMaxEntries?: number;
};

export type CacheStats = {
  backend: 'redis' | 'memory';
  redisConnected: boolean;
  memoryEntries: number;
};

/**
 * Redis-backed cache with automatic fallback to an in-memory cache.
 *
 * If a Redis URL is given, reads go to Redis first and writes go to both.
 * Without one (or while Redis is down) everything is served from memory,
 * which is not shared across processes.
 */
export class CacheAdapter implements CacheStore {
  private redis: Redis | null = null;
  private fallbackCache: MemoryTtlCache<string>;
  private isRedisAvailable = false;
  private readonly keyPrefix: string;

  constructor(options: CacheAdapterOptions = {}) {
    this.keyPrefix = options.keyPrefix ?? 'forecasting:';
    this.fallbackCache = new MemoryTtlCache<string>(300_000, options.memoryMaxEntries ?? 5000);

    if (!options.redisUrl) {
      return;
    }

    this.redis = new Redis(options.redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      lazyConnect: true
    });

    this.redis.on('connect', () => {
      console.log('✅ Redis connected successfully');
      this.isRedisAvailable = true;
    });

    this.redis.on('error', (err: Error) => {
      console.error('❌ Redis connection error:', err.message);
      this.isRedisAvailable = false;
    });

    this.redis.on('close', () => {
      console.warn('⚠️  Redis connection closed, falling back to in-memory cache');
      this.isRedisAvailable = false;
    });

    this.redis.connect().catch((err: Error) => {
      console.error('Failed to connect to Redis:', err.message);
      this.isRedisAvailable = false;
    });
  }

  private fullKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  async get<T>(key: string): Promise<T | null> {
    const fullKey = this.fullKey(key);

    if (this.redis && this.isRedisAvailable) {
      try {
        const value = await this.redis.get(fullKey);
        if (value !== null) {
          return JSON.parse(value) as T;
        }
      } catch (error) {
        console.error('Redis GET error:', error);
      }
    }

    const cached = this.fallbackCache.get(fullKey);
    if (cached !== undefined) {
      return JSON.parse(cached) as T;
    }

    return null;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    const fullKey = this.fullKey(key);
    const serialized = JSON.stringify(value);

    if (this.redis && this.isRedisAvailable) {
      try {
        await this.redis.setex(fullKey, ttlSeconds, serialized);
      } catch (error) {
        console.error('Redis SET error:', error);
      }
    }

    this.fallbackCache.set(fullKey, serialized, ttlSeconds * 1000);
  }

  async delete(key: string): Promise<void> {
    const fullKey = this.fullKey(key);

    if (this.redis && this.isRedisAvailable) {
      try {
        await this.redis.del(fullKey);
      } catch (error) {
        console.error('Redis DEL error:', error);
      }
    }

    this.fallbackCache.delete(fullKey);
  }

  /**
   * Drops every key under `prefix` (e.g. `forecast:SKU-1:`).
   */
  async invalidate(prefix: string): Promise<number> {
    const fullPrefix = this.fullKey(prefix);
    let deletedCount = 0;

    if (this.redis && this.isRedisAvailable) {
      try {
        const keys = await this.redis.keys(`${fullPrefix}*`);
        if (keys.length > 0) {
          deletedCount = await this.redis.del(...keys);
        }
      } catch (error) {
        console.error('Redis invalidation error:', error);
      }
    }

    const memoryDeleted = this.fallbackCache.invalidate(fullPrefix);
    return Math.max(deletedCount, memoryDeleted);
  }

  getStats(): CacheStats {
    return {
      backend: this.isRedisAvailable ? 'redis' : 'memory',
      redisConnected: this.isRedisAvailable,
      memoryEntries: this.fallbackCache.size
    };
  }

  async disconnect(): Promise<void> {
    if (this.redis) {
      await this.redis.quit();
    }
    this.fallbackCache.destroy();
  }
}
