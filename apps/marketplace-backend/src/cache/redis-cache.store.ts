import { Logger } from '@nestjs/common';
import type { createClient } from 'redis';
import type { z } from 'zod';
import { parseCached, type CacheStore } from './cache.types';

export type RedisClient = ReturnType<typeof createClient>;

/**
 * Redis-backed cache. Read failures degrade to a miss; write and evict
 * failures are logged and swallowed so the database stays the source of
 * truth.
 */
export class RedisCacheStore implements CacheStore {
  private readonly logger = new Logger(RedisCacheStore.name);

  constructor(
    private readonly client: RedisClient,
    private readonly prefix = 'marketplace:',
  ) {}

  async get<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    try {
      const raw = await this.client.get(this.prefix + key);
      return parseCached(raw, schema);
    } catch (error) {
      this.logger.warn(`get failed for ${key}: ${errorMessage(error)}`);
      return null;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    try {
      await this.client.set(this.prefix + key, JSON.stringify(value), {
        EX: ttlSeconds,
      });
    } catch (error) {
      this.logger.warn(`set failed for ${key}: ${errorMessage(error)}`);
    }
  }

  async evict(...keys: string[]): Promise<void> {
    if (keys.length === 0) {
      return;
    }
    try {
      await this.client.del(keys.map((key) => this.prefix + key));
    } catch (error) {
      this.logger.warn(`evict failed for ${keys.join(',')}: ${errorMessage(error)}`);
    }
  }
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
