import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { Actor } from '../bookings/bookings.types';
import { CACHE_STORE } from '../cache/cache.types';
import type { CacheStore } from '../cache/cache.types';
import { CLOCK } from '../common/clock/clock';
import type { Clock } from '../common/clock/clock';
import {
  NotFoundError,
  UnauthorizedActionError,
} from '../common/errors/domain-errors';
import { mapPage, toPage } from '../common/pagination/pagination';
import type { Page, PageRequest } from '../common/pagination/pagination';
import type { ProviderRow } from '../db/schema';
import { ProvidersRepository } from './providers.repository';
import type { CategoryWithProviderCount } from './providers.repository';
import {
  ACTIVE_CATEGORIES_CACHE_KEY,
  categoryResponseSchema,
  providerCacheKey,
  providerResponseSchema,
} from './providers.types';
import type { CategoryResponse, ProviderResponse } from './providers.types';

const DEFAULT_CACHE_TTL_SECONDS = 600;

type ListProvidersQuery = PageRequest & {
  categoryId?: number;
  area?: string;
};

@Injectable()
export class ProvidersService {
  private readonly logger = new Logger(ProvidersService.name);
  private readonly ttlSeconds: number;

  constructor(
    private readonly providers: ProvidersRepository,
    @Inject(CACHE_STORE) private readonly cache: CacheStore,
    @Inject(CLOCK) private readonly clock: Clock,
    configService: ConfigService,
  ) {
    this.ttlSeconds =
      configService.get<number>('CACHE_TTL_SECONDS') ??
      DEFAULT_CACHE_TTL_SECONDS;
  }

  async getProvider(providerUserId: string): Promise<ProviderResponse> {
    const key = providerCacheKey(providerUserId);
    const cached = await this.cache.get(key, providerResponseSchema);
    if (cached) {
      return cached;
    }

    const provider = await this.providers.findByUserId(providerUserId);
    if (!provider) {
      this.logger.warn(`getProvider not found: ${providerUserId}`);
      throw new NotFoundError('Provider', providerUserId);
    }

    const response = toProviderResponse(provider);
    await this.cache.set(key, response, this.ttlSeconds);
    return response;
  }

  async listProviders(
    query: ListProvidersQuery,
  ): Promise<Page<ProviderResponse>> {
    const { items, total } = await this.providers.listListed({
      categoryId: query.categoryId,
      area: query.area,
      offset: query.page * query.size,
      limit: query.size,
    });
    return mapPage(toPage(items, total, query), toProviderResponse);
  }

  async setAvailability(
    actor: Actor,
    available: boolean,
  ): Promise<ProviderResponse> {
    if (actor.role !== 'provider') {
      throw new UnauthorizedActionError('change provider availability');
    }

    const updated = await this.providers.setAvailability(
      actor.userId,
      available,
      this.clock.now(),
    );
    if (!updated) {
      throw new NotFoundError('Provider', actor.userId);
    }

    await this.evictProvider(actor.userId);
    this.logger.log(
      `setAvailability success: ${actor.userId} available=${available}`,
    );
    return toProviderResponse(updated);
  }

  async listCategories(): Promise<CategoryResponse[]> {
    const cached = await this.cache.get(
      ACTIVE_CATEGORIES_CACHE_KEY,
      z.array(categoryResponseSchema),
    );
    if (cached) {
      return cached;
    }

    const rows = await this.providers.listActiveCategories();
    const response = rows.map(toCategoryResponse);
    await this.cache.set(ACTIVE_CATEGORIES_CACHE_KEY, response, this.ttlSeconds);
    return response;
  }

  async evictProvider(providerUserId: string): Promise<void> {
    await this.cache.evict(providerCacheKey(providerUserId));
  }
}

export const toProviderResponse = (provider: ProviderRow): ProviderResponse => ({
  userId: provider.userId,
  businessName: provider.businessName,
  categoryId: provider.categoryId,
  bio: provider.bio,
  hourlyRate: provider.hourlyRate,
  serviceArea: provider.serviceArea,
  experienceYears: provider.experienceYears,
  verified: provider.verified,
  available: provider.available,
  rating: provider.rating,
  totalRatings: provider.totalRatings,
  createdAt: provider.createdAt.toISOString(),
  updatedAt: provider.updatedAt.toISOString(),
});

const toCategoryResponse = (
  category: CategoryWithProviderCount,
): CategoryResponse => ({
  id: category.id,
  name: category.name,
  slug: category.slug,
  description: category.description,
  icon: category.icon,
  displayOrder: category.displayOrder,
  providerCount: category.providerCount,
});
