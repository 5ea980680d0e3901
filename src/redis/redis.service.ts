import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { debugLog } from '../common/utils/debug-logger';

// Deletes the lock only while it still carries the caller's token
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0`;

/**
 * Redis service with in-memory fallback for a single instance.
 * GUARD: If MULTI_INSTANCE=true and Redis unavailable, operations fail hard.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<
    string,
    { value: string; expiresAt: number }
  >();
  private readonly fallbackLocks = new Map<
    string,
    { token: string; expiresAt: number }
  >();
  private readonly multiInstance: boolean;
  private connected = false;

  constructor(private readonly config: ConfigService) {
    this.multiInstance = config.get<string>('MULTI_INSTANCE') === 'true';
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    const client = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      retryStrategy: (times) => {
        if (times > 3) return null;
        return Math.min(times * 100, 2000);
      },
      lazyConnect: true,
    });

    client.on('connect', () => {
      this.connected = true;
      debugLog.redis.ok('Redis connected');
    });

    client.on('error', (err: Error) => {
      this.connected = false;
      this.logger.error('Redis error', err.message);
    });

    client.on('close', () => {
      this.connected = false;
      this.logger.warn('Redis connection closed');
    });

    client.connect().catch((err: Error) => {
      this.logger.error('Failed to connect to Redis', err.message);
    });

    this.client = client;
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * The live client, or null when the in-memory fallback applies.
   * Throws in multi-instance mode when Redis is down.
   */
  private activeClient(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  async get(key: string): Promise<string | null> {
    const client = this.activeClient();
    if (client) {
      return client.get(key);
    }

    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.fallbackCache.delete(key);
    return null;
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.activeClient();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    const client = this.activeClient();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
  }

  /**
   * Acquires a lock with TTL.
   * Returns the owner token, or null if the lock is already held.
   */
  async acquireLock(key: string, ttlMs: number): Promise<string | null> {
    const token = randomUUID();
    const client = this.activeClient();

    if (client) {
      const result = await client.set(
        key,
        token,
        'EX',
        Math.ceil(ttlMs / 1000),
        'NX',
      );
      return result === 'OK' ? token : null;
    }

    const existing = this.fallbackLocks.get(key);
    if (existing && existing.expiresAt > Date.now()) {
      return null;
    }
    this.fallbackLocks.set(key, { token, expiresAt: Date.now() + ttlMs });
    return token;
  }

  /**
   * Releases a lock if the token still owns it.
   */
  async releaseLock(key: string, token: string): Promise<void> {
    const client = this.activeClient();
    if (client) {
      await client.eval(RELEASE_LOCK_SCRIPT, 1, key, token);
      return;
    }

    if (this.fallbackLocks.get(key)?.token === token) {
      this.fallbackLocks.delete(key);
    }
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance; // Healthy in single-instance fallback mode
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  getStatus(): { connected: boolean; mode: 'redis' | 'fallback' } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
    };
  }
}
