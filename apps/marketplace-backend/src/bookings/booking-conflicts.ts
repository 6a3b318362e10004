import type { BookingsRepository } from './bookings.repository';

export type Interval = {
  start: Date;
  end: Date;
};

/** Half-open overlap: [s1, e1) and [s2, e2) overlap iff s1 < e2 and s2 < e1. */
export const intervalsOverlap = (a: Interval, b: Interval): boolean =>
  a.start.getTime() < b.end.getTime() && b.start.getTime() < a.end.getTime();

export const addMinutes = (date: Date, minutes: number): Date =>
  new Date(date.getTime() + minutes * 60 * 1000);

/**
 * Answers whether a provider already has an active (confirmed or in
 * progress) booking overlapping a proposed window. The answer is only
 * authoritative when the caller holds the provider lock of the store it
 * was built on.
 */
export class BookingConflictChecker {
  constructor(
    private readonly store: Pick<BookingsRepository, 'hasActiveOverlap'>,
  ) {}

  async hasConflict(
    providerUserId: string,
    proposedStart: Date,
    proposedEnd: Date,
    options: { excludeBookingId?: string } = {},
  ): Promise<boolean> {
    if (proposedEnd.getTime() <= proposedStart.getTime()) {
      throw new RangeError('proposedEnd must be after proposedStart');
    }
    return this.store.hasActiveOverlap({
      providerUserId,
      start: proposedStart,
      end: proposedEnd,
      excludeBookingId: options.excludeBookingId,
    });
  }
}
