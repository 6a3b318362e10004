import { Inject, Injectable, Logger } from '@nestjs/common';
import { CLOCK } from '../common/clock/clock';
import type { Clock } from '../common/clock/clock';
import {
  BookingValidationError,
  InvalidOperationError,
  InvalidTransitionError,
  NotFoundError,
  SchedulingConflictError,
  UnauthorizedActionError,
} from '../common/errors/domain-errors';
import {
  isMoney,
  MAX_AMOUNT,
  normalizeMoney,
  priceForDuration,
} from '../common/money/money';
import { toPage } from '../common/pagination/pagination';
import type { Page, PageRequest } from '../common/pagination/pagination';
import { ProvidersService } from '../providers/providers.service';
import { addMinutes, BookingConflictChecker } from './booking-conflicts';
import { findTransition } from './booking-state-machine';
import { BookingsRepository } from './bookings.repository';
import type { BookingListQuery, BookingPatch } from './bookings.repository';
import {
  DEFAULT_DURATION_MINUTES,
  MAX_DURATION_MINUTES,
} from './bookings.types';
import type {
  Actor,
  Booking,
  BookingEvent,
  BookingStatus,
} from './bookings.types';

export type CreateBookingParams = {
  providerUserId: string;
  scheduledAt: Date;
  durationMinutes?: number;
  address: string;
  notes?: string | null;
  idempotencyKey?: string;
};

export type BookingDecision = 'accept' | 'reject';

export type BookingListRequest = PageRequest & { status?: BookingStatus };

@Injectable()
export class BookingsService {
  private readonly logger = new Logger(BookingsService.name);

  constructor(
    private readonly bookings: BookingsRepository,
    private readonly providers: ProvidersService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async createBooking(
    actor: Actor,
    params: CreateBookingParams,
  ): Promise<{ booking: Booking; idempotent: boolean }> {
    this.logger.log('createBooking start');
    if (actor.role !== 'customer') {
      this.logger.warn('createBooking rejected: actor is not a customer');
      throw new UnauthorizedActionError('create a booking');
    }
    if (actor.userId === params.providerUserId) {
      this.logger.warn('createBooking rejected: self-booking');
      throw new UnauthorizedActionError('book yourself');
    }

    const durationMinutes = params.durationMinutes ?? DEFAULT_DURATION_MINUTES;
    const address = params.address.trim();
    this.validateRequest(params.scheduledAt, durationMinutes, address);
    const endsAt = addMinutes(params.scheduledAt, durationMinutes);

    const provider = await this.providers.getProvider(params.providerUserId);
    if (!(await this.bookings.customerExists(actor.userId))) {
      this.logger.warn(`createBooking rejected: customer missing ${actor.userId}`);
      throw new NotFoundError('Customer', actor.userId);
    }

    const result = await this.bookings.withProviderLock(
      params.providerUserId,
      async (scoped) => {
        // A replay returns the stored booking even if the slot has since
        // passed or the provider stopped taking bookings.
        if (params.idempotencyKey) {
          const existing = await scoped.findByIdempotencyKey({
            customerUserId: actor.userId,
            providerUserId: params.providerUserId,
            idempotencyKey: params.idempotencyKey,
          });
          if (existing) {
            if (
              existing.scheduledAt.getTime() !== params.scheduledAt.getTime() ||
              existing.durationMinutes !== durationMinutes
            ) {
              this.logger.warn('createBooking conflict: idempotency mismatch');
              throw new InvalidOperationError(
                'Idempotency key was already used for a different booking',
                'IDEMPOTENCY_CONFLICT',
              );
            }
            this.logger.log('createBooking idempotent hit');
            return { booking: existing, idempotent: true };
          }
        }

        const now = this.clock.now();
        if (params.scheduledAt.getTime() <= now.getTime()) {
          throw new BookingValidationError(
            'scheduledAt',
            'scheduledAt must be in the future',
          );
        }
        if (!provider.available) {
          this.logger.warn(
            `createBooking rejected: provider unavailable ${provider.userId}`,
          );
          throw new InvalidOperationError(
            'Provider is not accepting new bookings',
            'PROVIDER_UNAVAILABLE',
          );
        }
        const quotedAmount = this.quote(provider.hourlyRate, durationMinutes);

        const checker = new BookingConflictChecker(scoped);
        if (
          await checker.hasConflict(
            params.providerUserId,
            params.scheduledAt,
            endsAt,
          )
        ) {
          this.logger.warn(
            `createBooking rejected: scheduling conflict for ${params.providerUserId}`,
          );
          throw new SchedulingConflictError(
            params.providerUserId,
            params.scheduledAt,
            endsAt,
          );
        }

        const booking = await scoped.create({
          customerUserId: actor.userId,
          providerUserId: params.providerUserId,
          scheduledAt: params.scheduledAt,
          durationMinutes,
          endsAt,
          status: 'pending',
          address,
          notes: params.notes?.trim() || null,
          quotedAmount,
          idempotencyKey: params.idempotencyKey ?? null,
          createdAt: now,
        });
        return { booking, idempotent: false };
      },
    );

    if (!result.idempotent) {
      this.logger.log(`createBooking success: ${result.booking.id}`);
    }
    return result;
  }

  async getBooking(actor: Actor, bookingId: string): Promise<Booking> {
    const booking = await this.loadBooking(bookingId);
    if (actor.role !== 'admin' && !isParty(actor, booking)) {
      this.logger.warn(`getBooking rejected: ${bookingId}`);
      throw new UnauthorizedActionError('view this booking');
    }
    return booking;
  }

  async respondToBooking(
    actor: Actor,
    bookingId: string,
    decision: BookingDecision,
  ): Promise<Booking> {
    if (decision === 'reject') {
      return this.applyTransition(actor, bookingId, 'reject', (now) => ({
        respondedAt: now,
      }));
    }

    this.logger.log(`accept start: ${bookingId}`);
    const booking = await this.loadBooking(bookingId);
    const to = this.ensureAllowed(actor, booking, 'accept');

    // Accepting makes the booking active, so the calendar is re-checked
    // under the provider lock against bookings confirmed since creation.
    return this.bookings.withProviderLock(
      booking.providerUserId,
      async (scoped) => {
        const checker = new BookingConflictChecker(scoped);
        if (
          await checker.hasConflict(
            booking.providerUserId,
            booking.scheduledAt,
            booking.endsAt,
            { excludeBookingId: booking.id },
          )
        ) {
          this.logger.warn(`respondToBooking conflict: ${bookingId}`);
          throw new SchedulingConflictError(
            booking.providerUserId,
            booking.scheduledAt,
            booking.endsAt,
          );
        }

        return this.commit(scoped, booking, 'accept', {
          status: to,
          respondedAt: this.clock.now(),
        });
      },
    );
  }

  async startService(actor: Actor, bookingId: string): Promise<Booking> {
    return this.applyTransition(actor, bookingId, 'start', () => ({}));
  }

  async completeService(
    actor: Actor,
    bookingId: string,
    finalAmount: string,
  ): Promise<Booking> {
    if (!isMoney(finalAmount)) {
      throw new BookingValidationError(
        'finalAmount',
        'finalAmount must be a non-negative amount with at most 2 decimals',
      );
    }
    return this.applyTransition(actor, bookingId, 'complete', (now) => ({
      completedAt: now,
      finalAmount: normalizeMoney(finalAmount),
    }));
  }

  async cancelBooking(
    actor: Actor,
    bookingId: string,
    reason: string,
  ): Promise<Booking> {
    const cancellationReason = reason.trim();
    if (!cancellationReason) {
      throw new BookingValidationError(
        'reason',
        'A cancellation reason is required',
      );
    }
    return this.applyTransition(actor, bookingId, 'cancel', () => ({
      cancellationReason,
    }));
  }

  async attachReview(
    actor: Actor,
    bookingId: string,
    rating: number,
    review?: string | null,
  ): Promise<Booking> {
    if (!Number.isInteger(rating) || rating < 1 || rating > 5) {
      throw new BookingValidationError(
        'rating',
        'rating must be an integer between 1 and 5',
      );
    }

    const booking = await this.loadBooking(bookingId);
    if (actor.role !== 'customer' || actor.userId !== booking.customerUserId) {
      this.logger.warn(`attachReview rejected: ${bookingId}`);
      throw new UnauthorizedActionError('review this booking');
    }
    if (booking.status !== 'completed' || booking.rating !== null) {
      this.logger.warn(`attachReview invalid: ${bookingId}`);
      throw reviewNotAllowed(booking);
    }

    const reviewed = await this.bookings.withProviderLock(
      booking.providerUserId,
      async (scoped) => {
        const now = this.clock.now();
        const updated = await scoped.compareAndSet(
          booking.id,
          { status: 'completed', unrated: true },
          { rating, review: review?.trim() || null },
          now,
        );
        if (!updated) {
          const current = await scoped.findById(booking.id);
          throw reviewNotAllowed(current ?? booking);
        }
        await scoped.refreshProviderRating(booking.providerUserId, now);
        return updated;
      },
    );

    await this.providers.evictProvider(booking.providerUserId);
    this.logger.log(`attachReview success: ${bookingId}`);
    return reviewed;
  }

  async listByCustomer(
    actor: Actor,
    request: BookingListRequest,
  ): Promise<Page<Booking>> {
    if (actor.role !== 'customer') {
      throw new UnauthorizedActionError('list customer bookings');
    }
    const { items, total } = await this.bookings.listByCustomer(
      actor.userId,
      toListQuery(request),
    );
    return toPage(items, total, request);
  }

  async listByProvider(
    actor: Actor,
    request: BookingListRequest,
  ): Promise<Page<Booking>> {
    this.ensureProvider(actor, 'list provider bookings');
    const { items, total } = await this.bookings.listByProvider(
      actor.userId,
      toListQuery(request),
    );
    return toPage(items, total, request);
  }

  async listPendingForProvider(actor: Actor): Promise<Booking[]> {
    this.ensureProvider(actor, 'list pending bookings');
    return this.bookings.listByProviderAndStatus(actor.userId, 'pending');
  }

  async listUpcomingForProvider(actor: Actor): Promise<Booking[]> {
    this.ensureProvider(actor, 'list upcoming bookings');
    return this.bookings.listUpcomingForProvider(
      actor.userId,
      this.clock.now(),
    );
  }

  private async applyTransition(
    actor: Actor,
    bookingId: string,
    event: BookingEvent,
    sideEffects: (now: Date) => BookingPatch,
  ): Promise<Booking> {
    this.logger.log(`${event} start: ${bookingId}`);
    const booking = await this.loadBooking(bookingId);
    const to = this.ensureAllowed(actor, booking, event);
    return this.commit(this.bookings, booking, event, {
      ...sideEffects(this.clock.now()),
      status: to,
    });
  }

  /**
   * Checks party membership, then the transition table, then the actor's
   * role for the event, in that order.
   */
  private ensureAllowed(
    actor: Actor,
    booking: Booking,
    event: BookingEvent,
  ): Booking['status'] {
    if (!isParty(actor, booking)) {
      this.logger.warn(`${event} rejected: not a party to ${booking.id}`);
      throw new UnauthorizedActionError(`${event} this booking`);
    }

    const transition = findTransition(booking.status, event);
    if (!transition) {
      this.logger.warn(`${event} invalid from ${booking.status}: ${booking.id}`);
      throw new InvalidTransitionError(booking.status, event);
    }

    const actsAs =
      actor.userId === booking.providerUserId ? 'provider' : 'customer';
    if (actor.role !== actsAs || !transition.roles.includes(actsAs)) {
      this.logger.warn(`${event} rejected: role ${actor.role} on ${booking.id}`);
      throw new UnauthorizedActionError(`${event} this booking`);
    }

    return transition.to;
  }

  private async commit(
    store: BookingsRepository,
    booking: Booking,
    event: BookingEvent,
    patch: BookingPatch,
  ): Promise<Booking> {
    const updated = await store.compareAndSet(
      booking.id,
      { status: booking.status },
      patch,
      this.clock.now(),
    );

    if (!updated) {
      const current = await store.findById(booking.id);
      if (!current) {
        throw new NotFoundError('Booking', booking.id);
      }
      this.logger.warn(`${event} lost race on ${booking.id}: ${current.status}`);
      throw new InvalidTransitionError(current.status, event);
    }

    this.logger.log(`${event} success: ${booking.id} -> ${updated.status}`);
    return updated;
  }

  private async loadBooking(bookingId: string): Promise<Booking> {
    const booking = await this.bookings.findById(bookingId);
    if (!booking) {
      this.logger.warn(`booking not found: ${bookingId}`);
      throw new NotFoundError('Booking', bookingId);
    }
    return booking;
  }

  private validateRequest(
    scheduledAt: Date,
    durationMinutes: number,
    address: string,
  ): void {
    if (Number.isNaN(scheduledAt.getTime())) {
      throw new BookingValidationError(
        'scheduledAt',
        'scheduledAt must be a valid timestamp',
      );
    }
    if (
      !Number.isInteger(durationMinutes) ||
      durationMinutes < 1 ||
      durationMinutes > MAX_DURATION_MINUTES
    ) {
      throw new BookingValidationError(
        'durationMinutes',
        `durationMinutes must be an integer between 1 and ${MAX_DURATION_MINUTES}`,
      );
    }
    if (!address) {
      throw new BookingValidationError('address', 'address is required');
    }
  }

  private quote(
    hourlyRate: string | null,
    durationMinutes: number,
  ): string | null {
    if (!hourlyRate) {
      return null;
    }
    const amount = priceForDuration(hourlyRate, durationMinutes);
    if (!isMoney(amount)) {
      throw new BookingValidationError(
        'durationMinutes',
        `Quoted amount ${amount} exceeds the largest storable amount ${MAX_AMOUNT}`,
      );
    }
    return amount;
  }

  private ensureProvider(actor: Actor, action: string): void {
    if (actor.role !== 'provider') {
      throw new UnauthorizedActionError(action);
    }
  }
}

const isParty = (actor: Actor, booking: Booking): boolean =>
  actor.userId === booking.customerUserId ||
  actor.userId === booking.providerUserId;

const toListQuery = (request: BookingListRequest): BookingListQuery => ({
  offset: request.page * request.size,
  limit: request.size,
  status: request.status,
});

const reviewNotAllowed = (booking: Booking): InvalidOperationError =>
  new InvalidOperationError(
    booking.rating !== null
      ? 'Booking has already been reviewed'
      : `Only completed bookings can be reviewed (booking is ${booking.status})`,
  );
