import { Inject, Injectable } from '@nestjs/common';
import { and, asc, count, desc, eq, ilike } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { PersistenceError } from '../common/errors/domain-errors';
import { DRIZZLE_DB } from '../db/drizzle';
import type { DbExecutor } from '../db/drizzle';
import { categories, providerProfiles } from '../db/schema';
import type { CategoryRow, ProviderRow } from '../db/schema';

export type ListProvidersParams = {
  categoryId?: number;
  area?: string;
  offset: number;
  limit: number;
};

export type CategoryWithProviderCount = CategoryRow & {
  providerCount: number;
};

export abstract class ProvidersRepository {
  abstract findByUserId(userId: string): Promise<ProviderRow | null>;

  /** Verified providers currently accepting bookings, best rated first. */
  abstract listListed(
    params: ListProvidersParams,
  ): Promise<{ items: ProviderRow[]; total: number }>;

  abstract setAvailability(
    userId: string,
    available: boolean,
    now: Date,
  ): Promise<ProviderRow | null>;

  /** Active categories, each with its number of verified providers. */
  abstract listActiveCategories(): Promise<CategoryWithProviderCount[]>;
}

@Injectable()
export class DrizzleProvidersRepository extends ProvidersRepository {
  constructor(@Inject(DRIZZLE_DB) private readonly db: DbExecutor) {
    super();
  }

  async findByUserId(userId: string): Promise<ProviderRow | null> {
    try {
      const [provider] = await this.db
        .select()
        .from(providerProfiles)
        .where(eq(providerProfiles.userId, userId))
        .limit(1);
      return provider ?? null;
    } catch (error) {
      throw new PersistenceError('findProvider', error);
    }
  }

  async listListed(
    params: ListProvidersParams,
  ): Promise<{ items: ProviderRow[]; total: number }> {
    const conditions: SQL[] = [
      eq(providerProfiles.verified, true),
      eq(providerProfiles.available, true),
    ];
    if (params.categoryId !== undefined) {
      conditions.push(eq(providerProfiles.categoryId, params.categoryId));
    }
    if (params.area) {
      conditions.push(
        ilike(providerProfiles.serviceArea, `%${escapeLike(params.area)}%`),
      );
    }
    const where = and(...conditions);

    try {
      const items = await this.db
        .select()
        .from(providerProfiles)
        .where(where)
        .orderBy(
          desc(providerProfiles.rating),
          asc(providerProfiles.businessName),
          asc(providerProfiles.userId),
        )
        .limit(params.limit)
        .offset(params.offset);

      const [totals] = await this.db
        .select({ total: count() })
        .from(providerProfiles)
        .where(where);

      return { items, total: totals?.total ?? 0 };
    } catch (error) {
      throw new PersistenceError('listProviders', error);
    }
  }

  async setAvailability(
    userId: string,
    available: boolean,
    now: Date,
  ): Promise<ProviderRow | null> {
    try {
      const [updated] = await this.db
        .update(providerProfiles)
        .set({ available, updatedAt: now })
        .where(eq(providerProfiles.userId, userId))
        .returning();
      return updated ?? null;
    } catch (error) {
      throw new PersistenceError('setProviderAvailability', error);
    }
  }

  async listActiveCategories(): Promise<CategoryWithProviderCount[]> {
    try {
      const rows = await this.db
        .select({
          category: categories,
          providerCount: count(providerProfiles.userId),
        })
        .from(categories)
        .leftJoin(
          providerProfiles,
          and(
            eq(providerProfiles.categoryId, categories.id),
            eq(providerProfiles.verified, true),
          ),
        )
        .where(eq(categories.active, true))
        .groupBy(categories.id)
        .orderBy(asc(categories.displayOrder), asc(categories.name));
      return rows.map(({ category, providerCount }) => ({
        ...category,
        providerCount,
      }));
    } catch (error) {
      throw new PersistenceError('listCategories', error);
    }
  }
}

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, '\\$&');
