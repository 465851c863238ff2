import { Redis } from 'ioredis';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import type { Analysis, AnalysisStore } from '../types.js';

/** The calls the cache makes on an ioredis client */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
  quit(): Promise<unknown>;
}

/**
 * String cache that works with or without Redis. When Redis is unreachable
 * at start-up the process keeps an in-memory TTL map. A Redis read that
 * fails later throws unless memory holds the key.
 */
export class Cache {
  private memoryCache = new Map<string, { value: string; expiresAt: number }>();
  private redis: RedisClient | null = null;
  private redisAvailable = false;

  constructor(
    private readonly redisUrl?: string,
    client?: RedisClient,
  ) {
    if (client) {
      this.redis = client;
      this.redisAvailable = true;
    }
  }

  async init(): Promise<void> {
    if (this.redis) return;
    if (!this.redisUrl) {
      logger.info('[cache] REDIS_URL not set, using in-memory cache');
      return;
    }

    const client = new Redis(this.redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 5) {
          logger.warn('[redis] Max retries reached, giving up');
          return null;
        }
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });

    client.on('error', (err: unknown) => {
      logger.debug(`[redis] Connection error: ${errorMessage(err)}`);
    });
    client.on('connect', () => {
      logger.info('[redis] Connected');
    });

    try {
      await client.connect();
      this.redis = client;
      this.redisAvailable = true;
    } catch (err) {
      logger.warn(`[redis] Failed to connect, running with in-memory cache: ${errorMessage(err)}`);
      client.disconnect();
    }
  }

  get backend(): 'redis' | 'memory' {
    return this.redisAvailable ? 'redis' : 'memory';
  }

  async get(key: string): Promise<string | null> {
    if (this.redis && this.redisAvailable) {
      try {
        return await this.redis.get(key);
      } catch (err) {
        const fallback = this.readMemory(key);
        if (fallback === null) {
          logger.warn(`[cache] Redis read failed for ${key}: ${errorMessage(err)}`);
          throw err;
        }
        logger.warn(`[cache] Redis read failed for ${key}, served from memory: ${errorMessage(err)}`);
        return fallback;
      }
    }
    return this.readMemory(key);
  }

  private readMemory(key: string): string | null {
    const entry = this.memoryCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.memoryCache.delete(key);
    return null;
  }

  async set(key: string, value: string, ttlSeconds = 60): Promise<void> {
    if (this.redis && this.redisAvailable) {
      try {
        await this.redis.setex(key, ttlSeconds, value);
        return;
      } catch (err) {
        logger.warn(`[cache] Redis write failed for ${key}, using memory: ${errorMessage(err)}`);
      }
    }

    this.sweep();
    this.memoryCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    if (this.redis && this.redisAvailable) {
      try {
        await this.redis.del(key);
      } catch (err) {
        logger.warn(`[cache] Redis delete failed for ${key}: ${errorMessage(err)}`);
      }
    }
    this.memoryCache.delete(key);
  }

  async close(): Promise<void> {
    if (this.redis) {
      await this.redis.quit();
      this.redis = null;
      this.redisAvailable = false;
    }
    this.memoryCache.clear();
  }

  private sweep(): void {
    const now = Date.now();
    for (const [key, entry] of this.memoryCache) {
      if (entry.expiresAt <= now) this.memoryCache.delete(key);
    }
  }
}

function isAnalysis(value: unknown): value is Analysis {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'string' &&
    'tokenAddress' in value && typeof value.tokenAddress === 'string' &&
    'finalScore' in value && typeof value.finalScore === 'number' &&
    'verdictDecision' in value && typeof value.verdictDecision === 'string'
  );
}

/** Stores whole Analysis objects as JSON under a prefixed fingerprint */
export class AnalysisCache implements AnalysisStore {
  constructor(
    private readonly cache: Cache,
    private readonly keyPrefix = 'tokenrisk:',
  ) {}

  async get(key: string): Promise<Analysis | null> {
    const raw = await this.cache.get(this.keyPrefix + key);
    if (raw === null) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      if (isAnalysis(parsed)) return parsed;
      logger.warn(`[cache] Discarding malformed entry for ${key}`);
    } catch (err) {
      logger.warn(`[cache] Discarding unparseable entry for ${key}: ${errorMessage(err)}`);
    }
    return null;
  }

  async put(key: string, analysis: Analysis, ttlSeconds: number): Promise<void> {
    await this.cache.set(this.keyPrefix + key, JSON.stringify(analysis), ttlSeconds);
  }
}
