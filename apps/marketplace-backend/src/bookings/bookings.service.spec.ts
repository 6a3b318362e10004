import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { MemoryCacheStore } from '../cache/memory-cache.store';
import {
  BookingValidationError,
  InvalidOperationError,
  InvalidTransitionError,
  NotFoundError,
  SchedulingConflictError,
  UnauthorizedActionError,
} from '../common/errors/domain-errors';
import { ProvidersService } from '../providers/providers.service';
import { FixedClock } from '../testing/fixed-clock';
import {
  InMemoryBookingsRepository,
  InMemoryMarketplace,
  InMemoryProvidersRepository,
} from '../testing/in-memory-marketplace';
import { BookingsService, type CreateBookingParams } from './bookings.service';
import type { Actor, Booking } from './bookings.types';

const PROVIDER_ID = '7a7a7a7a-0000-4000-8000-000000000007';
const CUSTOMER_ID = 'c0c0c0c0-0000-4000-8000-000000000001';
const OTHER_CUSTOMER_ID = 'c0c0c0c0-0000-4000-8000-000000000002';

const customer: Actor = { userId: CUSTOMER_ID, role: 'customer' };
const otherCustomer: Actor = { userId: OTHER_CUSTOMER_ID, role: 'customer' };
const provider: Actor = { userId: PROVIDER_ID, role: 'provider' };
const admin: Actor = {
  userId: 'a0a0a0a0-0000-4000-8000-000000000001',
  role: 'admin',
};

const slot = (
  scheduledAt: string,
  durationMinutes = 60,
): CreateBookingParams => ({
  providerUserId: PROVIDER_ID,
  scheduledAt: new Date(scheduledAt),
  durationMinutes,
  address: '12 Elm Street',
});

describe('BookingsService', () => {
  let store: InMemoryMarketplace;
  let clock: FixedClock;
  let providers: ProvidersService;
  let service: BookingsService;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    store = new InMemoryMarketplace();
    store.addProvider({ userId: PROVIDER_ID, hourlyRate: '45.00' });
    store.addCustomer(CUSTOMER_ID);
    store.addCustomer(OTHER_CUSTOMER_ID);
    clock = new FixedClock('2025-02-01T00:00:00.000Z');
    providers = new ProvidersService(
      new InMemoryProvidersRepository(store),
      new MemoryCacheStore(clock),
      clock,
      new ConfigService(),
    );
    service = new BookingsService(
      new InMemoryBookingsRepository(store),
      providers,
      clock,
    );
  });

  const create = async (
    params: CreateBookingParams,
    actor: Actor = customer,
  ): Promise<Booking> => (await service.createBooking(actor, params)).booking;

  const completedBooking = async (): Promise<Booking> => {
    const booking = await create(slot('2025-03-01T10:00:00Z'));
    await service.respondToBooking(provider, booking.id, 'accept');
    await service.startService(provider, booking.id);
    return service.completeService(provider, booking.id, '500.00');
  };

  describe('scheduling', () => {
    it('blocks overlaps with an accepted booking but not back-to-back slots', async () => {
      const first = await create(slot('2025-03-01T10:00:00Z', 60));
      expect(first.status).toBe('pending');
      expect(first.endsAt.toISOString()).toBe('2025-03-01T11:00:00.000Z');

      const accepted = await service.respondToBooking(
        provider,
        first.id,
        'accept',
      );
      expect(accepted.status).toBe('confirmed');
      expect(accepted.respondedAt).toEqual(clock.now());

      await expect(
        create(slot('2025-03-01T10:30:00Z', 60), otherCustomer),
      ).rejects.toBeInstanceOf(SchedulingConflictError);

      const third = await create(slot('2025-03-01T11:00:00Z', 30));
      expect(third.status).toBe('pending');
      expect(store.bookings.size).toBe(2);
    });

    it('lets pending bookings overlap until one is accepted', async () => {
      const first = await create(slot('2025-03-01T10:00:00Z'));
      const second = await create(
        slot('2025-03-01T10:15:00Z'),
        otherCustomer,
      );

      await service.respondToBooking(provider, first.id, 'accept');

      await expect(
        service.respondToBooking(provider, second.id, 'accept'),
      ).rejects.toBeInstanceOf(SchedulingConflictError);
      expect(store.bookings.get(second.id)?.status).toBe('pending');
    });

    it('keeps an in-progress booking blocking its window', async () => {
      const first = await create(slot('2025-03-01T10:00:00Z'));
      await service.respondToBooking(provider, first.id, 'accept');
      await service.startService(provider, first.id);

      await expect(
        create(slot('2025-03-01T09:30:00Z'), otherCustomer),
      ).rejects.toBeInstanceOf(SchedulingConflictError);
    });

    it('frees the window once the booking is cancelled', async () => {
      const first = await create(slot('2025-03-01T10:00:00Z'));
      await service.respondToBooking(provider, first.id, 'accept');
      await service.cancelBooking(customer, first.id, 'Plans changed');

      const replacement = await create(
        slot('2025-03-01T10:00:00Z'),
        otherCustomer,
      );
      expect(replacement.status).toBe('pending');
    });

    it('accepts only one of two overlapping bookings accepted at once', async () => {
      const first = await create(slot('2025-03-01T10:00:00Z'));
      const second = await create(
        slot('2025-03-01T10:30:00Z'),
        otherCustomer,
      );

      const results = await Promise.allSettled([
        service.respondToBooking(provider, first.id, 'accept'),
        service.respondToBooking(provider, second.id, 'accept'),
      ]);

      expect(results.map((result) => result.status).sort()).toEqual([
        'fulfilled',
        'rejected',
      ]);
      const confirmed = [...store.bookings.values()].filter(
        (booking) => booking.status === 'confirmed',
      );
      expect(confirmed).toHaveLength(1);
    });
  });

  describe('createBooking', () => {
    it('quotes the price from the hourly rate', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z', 90));
      expect(booking.quotedAmount).toBe('67.50');
      expect(booking.durationMinutes).toBe(90);
      expect(booking.customerUserId).toBe(CUSTOMER_ID);
    });

    it('defaults to an hour and stores no quote without a rate', async () => {
      store.addProvider({ userId: PROVIDER_ID, hourlyRate: null });
      const booking = await create({
        providerUserId: PROVIDER_ID,
        scheduledAt: new Date('2025-03-01T10:00:00Z'),
        address: '  12 Elm Street  ',
        notes: '   ',
      });

      expect(booking.durationMinutes).toBe(60);
      expect(booking.quotedAmount).toBeNull();
      expect(booking.address).toBe('12 Elm Street');
      expect(booking.notes).toBeNull();
    });

    it('only lets customers book, and never themselves', async () => {
      await expect(
        create(slot('2025-03-01T10:00:00Z'), provider),
      ).rejects.toThrow('Not allowed to create a booking');
      await expect(
        create(slot('2025-03-01T10:00:00Z'), {
          userId: PROVIDER_ID,
          role: 'customer',
        }),
      ).rejects.toThrow('Not allowed to book yourself');
    });

    it('rejects a start that is not in the future', async () => {
      await expect(
        create(slot('2025-02-01T00:00:00Z')),
      ).rejects.toMatchObject({
        field: 'scheduledAt',
        message: 'scheduledAt must be in the future',
      });
    });

    it.each([0, 481, 1.5])('rejects a duration of %p minutes', async (minutes) => {
      await expect(
        create(slot('2025-03-01T10:00:00Z', minutes)),
      ).rejects.toBeInstanceOf(BookingValidationError);
    });

    it('reports unknown providers and customers', async () => {
      await expect(
        create({
          ...slot('2025-03-01T10:00:00Z'),
          providerUserId: 'ffffffff-0000-4000-8000-000000000000',
        }),
      ).rejects.toThrow('Provider not found');

      await expect(
        create(slot('2025-03-01T10:00:00Z'), {
          userId: 'c0c0c0c0-0000-4000-8000-000000000099',
          role: 'customer',
        }),
      ).rejects.toThrow('Customer not found');
    });

    it('refuses providers that are not accepting bookings', async () => {
      await providers.setAvailability(provider, false);

      await expect(create(slot('2025-03-01T10:00:00Z'))).rejects.toMatchObject({
        code: 'PROVIDER_UNAVAILABLE',
      });
    });

    it('replays a request carrying the same idempotency key', async () => {
      const params = { ...slot('2025-03-01T10:00:00Z'), idempotencyKey: 'key-1' };
      const first = await service.createBooking(customer, params);
      const replay = await service.createBooking(customer, params);

      expect(first.idempotent).toBe(false);
      expect(replay.idempotent).toBe(true);
      expect(replay.booking.id).toBe(first.booking.id);
      expect(store.bookings.size).toBe(1);
    });

    it('replays a key after the provider stops taking bookings', async () => {
      const params = { ...slot('2025-03-01T10:00:00Z'), idempotencyKey: 'key-1' };
      const first = await service.createBooking(customer, params);
      await providers.setAvailability(provider, false);

      const replay = await service.createBooking(customer, params);

      expect(replay).toEqual({ booking: first.booking, idempotent: true });
      await expect(
        create({ ...params, idempotencyKey: 'key-2' }),
      ).rejects.toMatchObject({ code: 'PROVIDER_UNAVAILABLE' });
    });

    it('replays a key after the booked start has passed', async () => {
      const params = { ...slot('2025-03-01T10:00:00Z'), idempotencyKey: 'key-1' };
      const first = await service.createBooking(customer, params);
      clock.set('2025-03-01T10:30:00Z');

      const replay = await service.createBooking(customer, params);

      expect(replay).toEqual({ booking: first.booking, idempotent: true });
      await expect(
        create({ ...params, idempotencyKey: 'key-2' }),
      ).rejects.toMatchObject({
        field: 'scheduledAt',
        message: 'scheduledAt must be in the future',
      });
    });

    it('refuses a quote larger than an amount column holds', async () => {
      store.addProvider({ userId: PROVIDER_ID, hourlyRate: '20000000.00' });

      await expect(
        create(slot('2025-03-01T10:00:00Z', 300)),
      ).rejects.toMatchObject({
        field: 'durationMinutes',
        message:
          'Quoted amount 100000000.00 exceeds the largest storable amount 99999999.99',
      });
      expect(store.bookings.size).toBe(0);
    });

    it('refuses to reuse an idempotency key for another slot', async () => {
      await service.createBooking(customer, {
        ...slot('2025-03-01T10:00:00Z'),
        idempotencyKey: 'key-1',
      });

      await expect(
        service.createBooking(customer, {
          ...slot('2025-03-01T12:00:00Z'),
          idempotencyKey: 'key-1',
        }),
      ).rejects.toMatchObject({ code: 'IDEMPOTENCY_CONFLICT' });
    });
  });

  describe('transitions', () => {
    it('refuses to complete a pending booking and leaves it pending', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      const attempt = service.completeService(customer, booking.id, '500.00');

      await expect(attempt).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(attempt).rejects.toMatchObject({
        currentStatus: 'pending',
        event: 'complete',
      });
      expect(store.bookings.get(booking.id)).toEqual(booking);
    });

    it('leaves terminal bookings untouched by every event', async () => {
      const rejected = await create(slot('2025-03-01T10:00:00Z'));
      await service.respondToBooking(provider, rejected.id, 'reject');
      const before = store.bookings.get(rejected.id);

      await expect(
        service.respondToBooking(provider, rejected.id, 'accept'),
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(
        service.startService(provider, rejected.id),
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(
        service.completeService(provider, rejected.id, '10.00'),
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      await expect(
        service.cancelBooking(customer, rejected.id, 'Too late'),
      ).rejects.toBeInstanceOf(InvalidTransitionError);
      expect(store.bookings.get(rejected.id)).toEqual(before);
    });

    it('stamps the response time on reject', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));
      clock.advanceMinutes(5);

      const rejected = await service.respondToBooking(
        provider,
        booking.id,
        'reject',
      );

      expect(rejected.status).toBe('rejected');
      expect(rejected.respondedAt?.toISOString()).toBe(
        '2025-02-01T00:05:00.000Z',
      );
    });

    it('checks the actor is a party before the transition table', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(
        service.completeService(otherCustomer, booking.id, '500.00'),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('keeps provider-only events away from the customer', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(
        service.respondToBooking(customer, booking.id, 'accept'),
      ).rejects.toThrow('Not allowed to accept this booking');
      expect(store.bookings.get(booking.id)?.status).toBe('pending');
    });

    it('requires the acting role to match the part played in the booking', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(
        service.cancelBooking(
          { userId: CUSTOMER_ID, role: 'provider' },
          booking.id,
          'Wrong hat',
        ),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('lets either party cancel work in progress with a reason', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));
      await service.respondToBooking(provider, booking.id, 'accept');
      await service.startService(provider, booking.id);

      const cancelled = await service.cancelBooking(
        customer,
        booking.id,
        '  Leak fixed itself  ',
      );

      expect(cancelled.status).toBe('cancelled');
      expect(cancelled.cancellationReason).toBe('Leak fixed itself');
    });

    it('requires a cancellation reason', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(
        service.cancelBooking(customer, booking.id, '   '),
      ).rejects.toMatchObject({ field: 'reason' });
    });

    it('rejects a malformed final amount', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));
      await service.respondToBooking(provider, booking.id, 'accept');
      await service.startService(provider, booking.id);

      await expect(
        service.completeService(provider, booking.id, '12.345'),
      ).rejects.toMatchObject({ field: 'finalAmount' });
      expect(store.bookings.get(booking.id)?.status).toBe('in_progress');
    });

    it('lets exactly one of two racing cancels through', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      const results = await Promise.allSettled([
        service.cancelBooking(customer, booking.id, 'First'),
        service.cancelBooking(provider, booking.id, 'Second'),
      ]);

      const failures = results.flatMap((result) =>
        result.status === 'rejected' ? [result.reason] : [],
      );
      expect(failures).toHaveLength(1);
      expect(failures[0]).toBeInstanceOf(InvalidTransitionError);
      expect(failures[0]).toMatchObject({ currentStatus: 'cancelled' });
    });

    it('reports a missing booking', async () => {
      await expect(
        service.startService(provider, 'b0b0b0b0-0000-4000-8000-000000000000'),
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('attachReview', () => {
    it('accepts one review per completed booking', async () => {
      const booking = await completedBooking();
      expect(booking.status).toBe('completed');
      expect(booking.finalAmount).toBe('500.00');
      expect(booking.completedAt).toEqual(clock.now());

      const reviewed = await service.attachReview(
        customer,
        booking.id,
        5,
        'Great',
      );
      expect(reviewed.rating).toBe(5);
      expect(reviewed.review).toBe('Great');

      const second = service.attachReview(customer, booking.id, 3, '...');
      await expect(second).rejects.toBeInstanceOf(InvalidOperationError);
      await expect(second).rejects.toThrow('Booking has already been reviewed');
      expect(store.bookings.get(booking.id)?.rating).toBe(5);
    });

    it('refreshes the provider rating and its cached profile', async () => {
      const before = await providers.getProvider(PROVIDER_ID);
      expect(before.rating).toBe('0');

      const first = await completedBooking();
      await service.attachReview(customer, first.id, 5);

      const second = await create(slot('2025-03-02T10:00:00Z'), otherCustomer);
      await service.respondToBooking(provider, second.id, 'accept');
      await service.startService(provider, second.id);
      await service.completeService(provider, second.id, '80');
      await service.attachReview(otherCustomer, second.id, 4);

      const after = await providers.getProvider(PROVIDER_ID);
      expect(after.rating).toBe('4.5');
      expect(after.totalRatings).toBe(2);
    });

    it('only reviews completed bookings', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(
        service.attachReview(customer, booking.id, 5),
      ).rejects.toThrow(
        'Only completed bookings can be reviewed (booking is pending)',
      );
    });

    it('only lets the booking customer review', async () => {
      const booking = await completedBooking();

      await expect(
        service.attachReview(provider, booking.id, 5),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(
        service.attachReview(otherCustomer, booking.id, 5),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it.each([0, 6, 4.5])('rejects a rating of %p', async (rating) => {
      const booking = await completedBooking();

      await expect(
        service.attachReview(customer, booking.id, rating),
      ).rejects.toMatchObject({ field: 'rating' });
    });
  });

  describe('queries', () => {
    it('shows a booking to its parties and admins only', async () => {
      const booking = await create(slot('2025-03-01T10:00:00Z'));

      await expect(service.getBooking(customer, booking.id)).resolves.toEqual(
        booking,
      );
      await expect(service.getBooking(provider, booking.id)).resolves.toEqual(
        booking,
      );
      await expect(service.getBooking(admin, booking.id)).resolves.toEqual(
        booking,
      );
      await expect(
        service.getBooking(otherCustomer, booking.id),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });

    it('pages customer bookings in schedule order', async () => {
      const late = await create(slot('2025-03-03T10:00:00Z'));
      const early = await create(slot('2025-03-01T10:00:00Z'));
      const middle = await create(slot('2025-03-02T10:00:00Z'));
      await create(slot('2025-03-04T10:00:00Z'), otherCustomer);

      const first = await service.listByCustomer(customer, { page: 0, size: 2 });
      expect(first.items.map((booking) => booking.id)).toEqual([
        early.id,
        middle.id,
      ]);
      expect(first).toMatchObject({
        page: 0,
        size: 2,
        totalElements: 3,
        totalPages: 2,
      });

      const second = await service.listByCustomer(customer, { page: 1, size: 2 });
      expect(second.items.map((booking) => booking.id)).toEqual([late.id]);
    });

    it('pages provider bookings across customers', async () => {
      await create(slot('2025-03-01T10:00:00Z'));
      await create(slot('2025-03-01T12:00:00Z'), otherCustomer);

      const page = await service.listByProvider(provider, { page: 0, size: 10 });
      expect(page.totalElements).toBe(2);
      expect(page.items.map((booking) => booking.customerUserId)).toEqual([
        CUSTOMER_ID,
        OTHER_CUSTOMER_ID,
      ]);
    });

    it('filters paged listings by status', async () => {
      const waiting = await create(slot('2025-03-01T10:00:00Z'));
      const accepted = await create(slot('2025-03-02T10:00:00Z'));
      await service.respondToBooking(provider, accepted.id, 'accept');

      const pending = await service.listByCustomer(customer, {
        page: 0,
        size: 10,
        status: 'pending',
      });
      expect(pending.items.map((booking) => booking.id)).toEqual([waiting.id]);
      expect(pending.totalElements).toBe(1);

      const confirmed = await service.listByProvider(provider, {
        page: 0,
        size: 10,
        status: 'confirmed',
      });
      expect(confirmed.items.map((booking) => booking.id)).toEqual([
        accepted.id,
      ]);
      expect(confirmed.totalPages).toBe(1);
    });

    it('lists pending and upcoming bookings for the provider', async () => {
      const pending = await create(slot('2025-03-01T10:00:00Z'));
      const soon = await create(slot('2025-02-01T02:00:00Z'));
      const later = await create(slot('2025-03-05T10:00:00Z'));
      await service.respondToBooking(provider, soon.id, 'accept');
      await service.respondToBooking(provider, later.id, 'accept');

      const pendingList = await service.listPendingForProvider(provider);
      expect(pendingList.map((booking) => booking.id)).toEqual([pending.id]);

      clock.set('2025-02-01T03:00:00Z');
      const upcoming = await service.listUpcomingForProvider(provider);
      expect(upcoming.map((booking) => booking.id)).toEqual([later.id]);
    });

    it('keeps listings to the matching role', async () => {
      await expect(
        service.listByCustomer(provider, { page: 0, size: 10 }),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(
        service.listByProvider(customer, { page: 0, size: 10 }),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
      await expect(
        service.listPendingForProvider(customer),
      ).rejects.toBeInstanceOf(UnauthorizedActionError);
    });
  });
});
