import { z } from 'zod';
import { pageQuerySchema } from '../common/pagination/pagination';

export const providerIdParamSchema = z.object({
  id: z.string().uuid({ message: 'Invalid provider id' }),
});

export const listProvidersSchema = pageQuerySchema.extend({
  categoryId: z.coerce
    .number()
    .int({ message: 'categoryId must be an integer' })
    .positive({ message: 'categoryId must be positive' })
    .optional(),
  area: z.string().trim().min(1).max(200).optional(),
});

export const updateAvailabilitySchema = z.object({
  available: z.boolean({ required_error: 'available is required' }),
});

export type ProviderIdParam = z.infer<typeof providerIdParamSchema>;
export type ListProvidersInput = z.infer<typeof listProvidersSchema>;
export type UpdateAvailabilityInput = z.infer<typeof updateAvailabilitySchema>;
