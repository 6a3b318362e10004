import type { UserRole } from '../auth/auth.types';

export const BOOKING_STATUSES = [
  'pending',
  'confirmed',
  'rejected',
  'in_progress',
  'completed',
  'cancelled',
] as const;

export type BookingStatus = (typeof BOOKING_STATUSES)[number];

/** Bookings in these states occupy the provider's calendar. */
export const ACTIVE_BOOKING_STATUSES: readonly BookingStatus[] = [
  'confirmed',
  'in_progress',
];

export const DEFAULT_DURATION_MINUTES = 60;
export const MAX_DURATION_MINUTES = 8 * 60;

export const BOOKING_EVENTS = [
  'accept',
  'reject',
  'start',
  'complete',
  'cancel',
] as const;

export type BookingEvent = (typeof BOOKING_EVENTS)[number];

export const isBookingStatus = (value: string): value is BookingStatus =>
  (BOOKING_STATUSES as readonly string[]).includes(value);

/** Who is performing an operation, as resolved from the bearer token. */
export type Actor = {
  userId: string;
  role: UserRole;
};

export type Booking = {
  id: string;
  customerUserId: string;
  providerUserId: string;
  scheduledAt: Date;
  durationMinutes: number;
  endsAt: Date;
  status: BookingStatus;
  address: string;
  notes: string | null;
  quotedAmount: string | null;
  finalAmount: string | null;
  respondedAt: Date | null;
  completedAt: Date | null;
  rating: number | null;
  review: string | null;
  cancellationReason: string | null;
  idempotencyKey: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type BookingResponse = {
  id: string;
  customerUserId: string;
  providerUserId: string;
  scheduledAt: string;
  durationMinutes: number;
  endsAt: string;
  status: BookingStatus;
  address: string;
  notes: string | null;
  quotedAmount: string | null;
  finalAmount: string | null;
  respondedAt: string | null;
  completedAt: string | null;
  rating: number | null;
  review: string | null;
  cancellationReason: string | null;
  createdAt: string;
  updatedAt: string;
  idempotencyKey?: string | null;
};
