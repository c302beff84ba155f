/**
 * =============================================================================
 * CACHE SERVICE - Redis-Ready Caching Layer
 * =============================================================================
 *
 * Abstraction layer for caching geocoding and routing lookups:
 * - In-memory storage (development, single server, tests)
 * - Redis storage (production, shared across instances)
 *
 * HOW TO USE:
 * 1. Development: in-memory storage is used by default
 * 2. Production: Set REDIS_ENABLED=true and REDIS_URL in environment
 *
 * @module cache.service
 * =============================================================================
 */

import { createClient } from 'redis';
import { CACHE } from '../../core/constants';
import { logger } from './logger.service';

// =============================================================================
// CACHE INTERFACE
// =============================================================================

export interface CacheStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  close(): Promise<void>;
}

// =============================================================================
// IN-MEMORY CACHE (Development / Single Server)
// =============================================================================

export class InMemoryCache implements CacheStore {
  private store = new Map<string, { value: string; expiresAt?: number }>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 60000) {
    this.cleanupTimer = setInterval(() => this.cleanup(), cleanupIntervalMs);
    // Never keep the process alive just for cleanup
    this.cleanupTimer.unref();
  }

  async get(key: string): Promise<string | null> {
    const entry = this.store.get(key);

    if (!entry) return null;

    if (entry.expiresAt && Date.now() > entry.expiresAt) {
      this.store.delete(key);
      return null;
    }

    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const entry: { value: string; expiresAt?: number } = { value };

    if (ttlSeconds && ttlSeconds > 0) {
      entry.expiresAt = Date.now() + (ttlSeconds * 1000);
    }

    this.store.set(key, entry);
  }

  async delete(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async close(): Promise<void> {
    clearInterval(this.cleanupTimer);
  }

  get size(): number {
    return this.store.size;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [key, entry] of this.store.entries()) {
      if (entry.expiresAt && now > entry.expiresAt) {
        this.store.delete(key);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`Cache cleanup: removed ${cleaned} expired entries`);
    }
  }
}

// =============================================================================
// REDIS CACHE (Production / Horizontal Scaling)
// =============================================================================

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements CacheStore {
  private client: RedisClient;
  private isConnected = false;

  constructor(url: string) {
    this.client = createClient({
      url,
      socket: {
        reconnectStrategy: (retries: number) => {
          if (retries > 10) {
            logger.error('Redis: Max reconnection attempts reached');
            return new Error('Max reconnection attempts reached');
          }
          return Math.min(retries * 100, 3000);
        }
      }
    });

    this.client.on('error', (err: Error) => {
      logger.error('Redis error', { error: err.message });
      this.isConnected = false;
    });

    this.client.on('ready', () => {
      logger.info('🔴 Redis connected');
      this.isConnected = true;
    });

    this.client.on('reconnecting', () => {
      logger.warn('Redis reconnecting...');
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  // Reads and writes degrade to cache misses while disconnected
  async get(key: string): Promise<string | null> {
    if (!this.isConnected) return null;
    return await this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (!this.isConnected) return;

    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.setEx(key, ttlSeconds, value);
    } else {
      await this.client.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    if (!this.isConnected) return false;
    const result = await this.client.del(key);
    return result > 0;
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
    this.isConnected = false;
  }
}

// =============================================================================
// CACHE SERVICE (Unified Interface)
// =============================================================================

export class CacheService {
  constructor(
    private readonly cache: CacheStore,
    private readonly prefix: string = CACHE.PREFIX.ROOT
  ) {}

  /**
   * Get value from cache
   * Values that fail to parse are treated as misses
   */
  async get<T>(key: string): Promise<T | null> {
    const value = await this.cache.get(this.prefix + key);
    if (value === null) return null;

    try {
      return JSON.parse(value) as T;
    } catch {
      logger.warn('Cache entry is not valid JSON, ignoring', { key });
      return null;
    }
  }

  /**
   * Set value in cache
   * @param value - Value to store (will be JSON stringified)
   * @param ttlSeconds - Time to live in seconds (optional)
   */
  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    await this.cache.set(this.prefix + key, JSON.stringify(value), ttlSeconds);
  }

  async delete(key: string): Promise<boolean> {
    return await this.cache.delete(this.prefix + key);
  }

  async close(): Promise<void> {
    await this.cache.close();
  }

  /**
   * Build a stable cache key from request parameters
   */
  static buildKey(namespace: string, params: Record<string, unknown>): string {
    const sorted = Object.keys(params)
      .sort()
      .map(k => `${k}=${JSON.stringify(params[k])}`)
      .join('&');
    return `${namespace}:${sorted}`;
  }
}

/**
 * Create the cache service for the configured backend
 */
export async function createCacheService(options: { redisEnabled: boolean; redisUrl: string }): Promise<CacheService> {
  if (options.redisEnabled) {
    logger.info('🔴 Initializing Redis cache');
    const redis = new RedisCache(options.redisUrl);
    await redis.connect();
    return new CacheService(redis);
  }

  logger.info('📦 Using in-memory cache (enable Redis to share across instances)');
  return new CacheService(new InMemoryCache());
}
