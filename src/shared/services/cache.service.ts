/**
 * =============================================================================
 * CACHE SERVICE - Redis-Ready Caching Layer
 * =============================================================================
 *
 * Abstraction layer for caching that supports both:
 * - In-memory storage (development, single server)
 * - Redis storage (production, shared between instances)
 *
 * Used for geocoding results and route distances, so that repeated quotes
 * for the same addresses do not hit the public map services again.
 *
 * The service is constructed once in the composition root and passed to the
 * collaborators that need it; nothing imports a cache singleton.
 *
 * @module cache.service
 * =============================================================================
 */

import type { createClient } from 'redis';
import type { z } from 'zod';
import { logger } from './logger.service';
import { errorMessage } from '../../core/errors/AppError';

type RedisClient = ReturnType<typeof createClient>;

// =============================================================================
// CACHE INTERFACE
// =============================================================================

export interface CacheStore {
  readonly kind: 'memory' | 'redis';
  connect(): Promise<void>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;
  isReady(): boolean;
  close(): Promise<void>;
}

// =============================================================================
// IN-MEMORY CACHE (Development / Single Server)
// =============================================================================

export class InMemoryCache implements CacheStore {
  readonly kind = 'memory' as const;
  private store = new Map<string, { value: string; expiresAt?: number }>();
  private cleanupTimer: NodeJS.Timeout;

  constructor(cleanupIntervalMs: number = 60000) {
    // Expired entries are also dropped lazily on read
    this.cleanupTimer = setInterval(() => this.cleanup(), cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  async connect(): Promise<void> {
    logger.info('📦 In-memory cache initialized');
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

  async clear(): Promise<void> {
    this.store.clear();
  }

  isReady(): boolean {
    return true;
  }

  async close(): Promise<void> {
    clearInterval(this.cleanupTimer);
    this.store.clear();
  }

  size(): number {
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

export class RedisCache implements CacheStore {
  readonly kind = 'redis' as const;
  private client: RedisClient | null = null;
  private connected = false;

  constructor(private readonly url: string) {}

  async connect(): Promise<void> {
    // Loaded lazily so the redis client is never required when the cache stays in memory
    const { createClient } = await import('redis');

    const client = createClient({
      url: this.url,
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

    client.on('error', (err: Error) => {
      logger.error('Redis error', { error: err.message });
      this.connected = false;
    });

    client.on('ready', () => {
      logger.info('🔴 Redis connected');
      this.connected = true;
    });

    client.on('reconnecting', () => {
      logger.warn('Redis reconnecting...');
    });

    this.client = client;
    await client.connect();
  }

  async get(key: string): Promise<string | null> {
    if (!this.client || !this.connected) return null;
    return await this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (!this.client || !this.connected) return;

    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.setEx(key, ttlSeconds, value);
    } else {
      await this.client.set(key, value);
    }
  }

  async delete(key: string): Promise<boolean> {
    if (!this.client || !this.connected) return false;
    const result = await this.client.del(key);
    return result > 0;
  }

  async clear(): Promise<void> {
    if (!this.client || !this.connected) return;
    await this.client.flushDb();
  }

  isReady(): boolean {
    return this.connected;
  }

  async close(): Promise<void> {
    if (!this.client) return;
    await this.client.quit();
    this.connected = false;
  }
}

// =============================================================================
// CACHE SERVICE (Unified Interface)
// =============================================================================

export class CacheService {
  constructor(
    private readonly store: CacheStore,
    private readonly prefix: string = 'pq:'
  ) {}

  get kind(): CacheStore['kind'] {
    return this.store.kind;
  }

  async initialize(): Promise<void> {
    await this.store.connect();
  }

  /**
   * Get value from cache, checked against `schema`. A broken cache, or an
   * entry of another shape (old release, foreign writer), reads as a miss.
   */
  async get<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    let raw: unknown;
    try {
      const value = await this.store.get(this.prefix + key);
      if (value === null) return null;
      raw = JSON.parse(value);
    } catch (error) {
      logger.warn(`Cache read failed for ${key}: ${errorMessage(error)}`);
      return null;
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Cache entry ${key} has an unexpected shape, ignoring it`);
      return null;
    }
    return parsed.data;
  }

  /**
   * Set value in cache (JSON stringified). A failed write is logged and dropped.
   */
  async set(key: string, value: unknown, ttlSeconds?: number): Promise<void> {
    try {
      await this.store.set(this.prefix + key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      logger.warn(`Cache write failed for ${key}: ${errorMessage(error)}`);
    }
  }

  async delete(key: string): Promise<boolean> {
    return await this.store.delete(this.prefix + key);
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }

  isReady(): boolean {
    return this.store.isReady();
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}

/**
 * Pick the store from configuration: Redis when enabled, memory otherwise
 */
export function createCacheService(options: { redisEnabled: boolean; redisUrl: string }): CacheService {
  if (options.redisEnabled) {
    logger.info('🔴 Initializing Redis cache');
    return new CacheService(new RedisCache(options.redisUrl));
  }
  logger.info('📦 Using in-memory cache (enable Redis to share it between instances)');
  return new CacheService(new InMemoryCache());
}
