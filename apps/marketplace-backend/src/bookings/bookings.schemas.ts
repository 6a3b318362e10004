import { z } from 'zod';
import { MONEY_PATTERN } from '../common/money/money';
import { pageQuerySchema } from '../common/pagination/pagination';
import { BOOKING_STATUSES, MAX_DURATION_MINUTES } from './bookings.types';

const ISO_WITH_TIMEZONE_REGEX =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{1,3})?)?(?:Z|[+-]\d{2}:\d{2})$/;

const isIsoWithTimezone = (value: string): boolean =>
  ISO_WITH_TIMEZONE_REGEX.test(value) &&
  !Number.isNaN(new Date(value).getTime());

export const bookingIdParamSchema = z.object({
  id: z.string().uuid({ message: 'id must be a valid UUID' }),
});

export const createBookingSchema = z.object({
  providerUserId: z
    .string()
    .uuid({ message: 'providerUserId must be a valid UUID' }),
  scheduledAt: z
    .string()
    .refine(isIsoWithTimezone, {
      message: 'scheduledAt must be a valid ISO 8601 timestamp with timezone',
    })
    .transform((value) => new Date(value)),
  durationMinutes: z
    .number()
    .int({ message: 'durationMinutes must be an integer' })
    .min(1, { message: 'durationMinutes must be at least 1' })
    .max(MAX_DURATION_MINUTES, {
      message: `durationMinutes must be at most ${MAX_DURATION_MINUTES}`,
    })
    .optional(),
  address: z
    .string()
    .trim()
    .min(1, { message: 'address is required' })
    .max(500, { message: 'address must be at most 500 characters' }),
  notes: z
    .string()
    .max(2000, { message: 'notes must be at most 2000 characters' })
    .optional(),
  idempotencyKey: z
    .string()
    .min(1, { message: 'idempotencyKey must be a non-empty string' })
    .max(255, { message: 'idempotencyKey must be at most 255 characters' })
    .optional(),
});

export const completeBookingSchema = z.object({
  finalAmount: z.string().regex(MONEY_PATTERN, {
    message: 'finalAmount must be a decimal string such as "500.00"',
  }),
});

export const cancelBookingSchema = z.object({
  reason: z
    .string()
    .trim()
    .min(1, { message: 'reason is required' })
    .max(1000, { message: 'reason must be at most 1000 characters' }),
});

export const reviewBookingSchema = z.object({
  rating: z
    .number()
    .int({ message: 'rating must be an integer' })
    .min(1, { message: 'rating must be between 1 and 5' })
    .max(5, { message: 'rating must be between 1 and 5' }),
  review: z
    .string()
    .max(2000, { message: 'review must be at most 2000 characters' })
    .optional(),
});

export const listBookingsSchema = pageQuerySchema.extend({
  status: z
    .enum(BOOKING_STATUSES, {
      errorMap: () => ({
        message: `status must be one of ${BOOKING_STATUSES.join(', ')}`,
      }),
    })
    .optional(),
});

export type CreateBookingInput = z.infer<typeof createBookingSchema>;
export type CompleteBookingInput = z.infer<typeof completeBookingSchema>;
export type CancelBookingInput = z.infer<typeof cancelBookingSchema>;
export type ReviewBookingInput = z.infer<typeof reviewBookingSchema>;
export type ListBookingsInput = z.infer<typeof listBookingsSchema>;
export type BookingIdParam = z.infer<typeof bookingIdParamSchema>;
