import type { z } from 'zod';
import type { Clock } from '../common/clock/clock';
import { systemClock } from '../common/clock/clock';
import { parseCached, type CacheStore } from './cache.types';

type Entry = { raw: string; expiresAt: number };

/** Process-local cache used when no Redis is configured, and in tests. */
export class MemoryCacheStore implements CacheStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get<T>(key: string, schema: z.ZodType<T>): Promise<T | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return null;
    }
    return parseCached(entry.raw, schema);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.entries.set(key, {
      raw: JSON.stringify(value),
      expiresAt: this.clock.now().getTime() + ttlSeconds * 1000,
    });
  }

  async evict(...keys: string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key);
    }
  }
}
