import { z } from 'zod';

export const providerResponseSchema = z.object({
  userId: z.string(),
  businessName: z.string(),
  categoryId: z.number().int(),
  bio: z.string().nullable(),
  hourlyRate: z.string().nullable(),
  serviceArea: z.string().nullable(),
  experienceYears: z.number().int().nullable(),
  verified: z.boolean(),
  available: z.boolean(),
  rating: z.string(),
  totalRatings: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export type ProviderResponse = z.infer<typeof providerResponseSchema>;

export const categoryResponseSchema = z.object({
  id: z.number().int(),
  name: z.string(),
  slug: z.string(),
  description: z.string().nullable(),
  icon: z.string().nullable(),
  displayOrder: z.number().int(),
  providerCount: z.number().int(),
});

export type CategoryResponse = z.infer<typeof categoryResponseSchema>;

export const providerCacheKey = (providerUserId: string): string =>
  `providers:${providerUserId}`;

export const ACTIVE_CATEGORIES_CACHE_KEY = 'categories:active';
