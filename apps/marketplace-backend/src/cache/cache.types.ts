import type { z } from 'zod';

export const CACHE_STORE = Symbol('CACHE_STORE');

/**
 * Explicit key/value cache. Values are stored as JSON and re-validated on
 * the way out, so a stale or foreign entry reads as a miss.
 */
export interface CacheStore {
  get<T>(key: string, schema: z.ZodType<T>): Promise<T | null>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  evict(...keys: string[]): Promise<void>;
}

export const parseCached = <T>(
  raw: string | null,
  schema: z.ZodType<T>,
): T | null => {
  if (raw === null) {
    return null;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = schema.safeParse(decoded);
  return result.success ? result.data : null;
};
