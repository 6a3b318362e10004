import { Inject, Injectable } from '@nestjs/common';
import {
  and,
  asc,
  count,
  eq,
  gt,
  inArray,
  isNotNull,
  isNull,
  lt,
  ne,
  sql,
} from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import { DomainError, PersistenceError } from '../common/errors/domain-errors';
import { DRIZZLE_DB } from '../db/drizzle';
import type { DbExecutor } from '../db/drizzle';
import { bookings, customerProfiles, providerProfiles } from '../db/schema';
import type { BookingRow } from '../db/schema';
import { ACTIVE_BOOKING_STATUSES, isBookingStatus } from './bookings.types';
import type { Booking, BookingStatus } from './bookings.types';

export type NewBooking = Pick<
  Booking,
  | 'customerUserId'
  | 'providerUserId'
  | 'scheduledAt'
  | 'durationMinutes'
  | 'endsAt'
  | 'address'
  | 'notes'
  | 'quotedAmount'
  | 'idempotencyKey'
> & { status: 'pending'; createdAt: Date };

export type BookingPatch = Partial<
  Pick<
    Booking,
    | 'status'
    | 'respondedAt'
    | 'completedAt'
    | 'finalAmount'
    | 'cancellationReason'
    | 'rating'
    | 'review'
  >
>;

/** Conditions the stored record must still meet for a patch to apply. */
export type BookingExpectation = {
  status: BookingStatus;
  unrated?: boolean;
};

export type OverlapQuery = {
  providerUserId: string;
  start: Date;
  end: Date;
  excludeBookingId?: string;
};

export type Slice = {
  offset: number;
  limit: number;
};

export type BookingListQuery = Slice & {
  status?: BookingStatus;
};

export abstract class BookingsRepository {
  abstract create(values: NewBooking): Promise<Booking>;

  abstract findById(id: string): Promise<Booking | null>;

  abstract findByIdempotencyKey(params: {
    customerUserId: string;
    providerUserId: string;
    idempotencyKey: string;
  }): Promise<Booking | null>;

  /**
   * Applies `patch` only while the record still matches `expected`.
   * Returns null when nothing matched (missing or concurrently changed).
   */
  abstract compareAndSet(
    id: string,
    expected: BookingExpectation,
    patch: BookingPatch,
    now: Date,
  ): Promise<Booking | null>;

  abstract hasActiveOverlap(query: OverlapQuery): Promise<boolean>;

  abstract listByCustomer(
    customerUserId: string,
    query: BookingListQuery,
  ): Promise<{ items: Booking[]; total: number }>;

  abstract listByProvider(
    providerUserId: string,
    query: BookingListQuery,
  ): Promise<{ items: Booking[]; total: number }>;

  abstract listByProviderAndStatus(
    providerUserId: string,
    status: BookingStatus,
  ): Promise<Booking[]>;

  abstract listUpcomingForProvider(
    providerUserId: string,
    after: Date,
  ): Promise<Booking[]>;

  abstract customerExists(customerUserId: string): Promise<boolean>;

  /** Recomputes the provider's average rating from reviewed bookings. */
  abstract refreshProviderRating(
    providerUserId: string,
    now: Date,
  ): Promise<void>;

  /**
   * Runs `work` as one atomic unit that excludes every other unit for the
   * same provider. `work` must use the repository it is handed.
   */
  abstract withProviderLock<T>(
    providerUserId: string,
    work: (scoped: BookingsRepository) => Promise<T>,
  ): Promise<T>;
}

@Injectable()
export class DrizzleBookingsRepository extends BookingsRepository {
  constructor(@Inject(DRIZZLE_DB) private readonly db: DbExecutor) {
    super();
  }

  async create(values: NewBooking): Promise<Booking> {
    const [created] = await this.run('createBooking', () =>
      this.db
        .insert(bookings)
        .values({ ...values, updatedAt: values.createdAt })
        .returning(),
    );
    if (!created) {
      throw new PersistenceError(
        'createBooking',
        new Error('insert returned no row'),
      );
    }
    return toBooking(created);
  }

  async findById(id: string): Promise<Booking | null> {
    const [row] = await this.run('findBooking', () =>
      this.db.select().from(bookings).where(eq(bookings.id, id)).limit(1),
    );
    return row ? toBooking(row) : null;
  }

  async findByIdempotencyKey(params: {
    customerUserId: string;
    providerUserId: string;
    idempotencyKey: string;
  }): Promise<Booking | null> {
    const [row] = await this.run('findBookingByIdempotencyKey', () =>
      this.db
        .select()
        .from(bookings)
        .where(
          and(
            eq(bookings.providerUserId, params.providerUserId),
            eq(bookings.customerUserId, params.customerUserId),
            eq(bookings.idempotencyKey, params.idempotencyKey),
          ),
        )
        .limit(1),
    );
    return row ? toBooking(row) : null;
  }

  async compareAndSet(
    id: string,
    expected: BookingExpectation,
    patch: BookingPatch,
    now: Date,
  ): Promise<Booking | null> {
    const conditions: SQL[] = [
      eq(bookings.id, id),
      eq(bookings.status, expected.status),
    ];
    if (expected.unrated) {
      conditions.push(isNull(bookings.rating));
    }

    const [updated] = await this.run('updateBooking', () =>
      this.db
        .update(bookings)
        .set({ ...patch, updatedAt: now })
        .where(and(...conditions))
        .returning(),
    );
    return updated ? toBooking(updated) : null;
  }

  async hasActiveOverlap(query: OverlapQuery): Promise<boolean> {
    const conditions: SQL[] = [
      eq(bookings.providerUserId, query.providerUserId),
      inArray(bookings.status, [...ACTIVE_BOOKING_STATUSES]),
      lt(bookings.scheduledAt, query.end),
      gt(bookings.endsAt, query.start),
    ];
    if (query.excludeBookingId) {
      conditions.push(ne(bookings.id, query.excludeBookingId));
    }

    const [row] = await this.run('checkBookingOverlap', () =>
      this.db
        .select({ id: bookings.id })
        .from(bookings)
        .where(and(...conditions))
        .limit(1),
    );
    return Boolean(row);
  }

  listByCustomer(
    customerUserId: string,
    query: BookingListQuery,
  ): Promise<{ items: Booking[]; total: number }> {
    return this.listSlice(
      'listBookingsByCustomer',
      eq(bookings.customerUserId, customerUserId),
      query,
    );
  }

  listByProvider(
    providerUserId: string,
    query: BookingListQuery,
  ): Promise<{ items: Booking[]; total: number }> {
    return this.listSlice(
      'listBookingsByProvider',
      eq(bookings.providerUserId, providerUserId),
      query,
    );
  }

  async listByProviderAndStatus(
    providerUserId: string,
    status: BookingStatus,
  ): Promise<Booking[]> {
    const rows = await this.run('listBookingsByStatus', () =>
      this.db
        .select()
        .from(bookings)
        .where(
          and(
            eq(bookings.providerUserId, providerUserId),
            eq(bookings.status, status),
          ),
        )
        .orderBy(asc(bookings.scheduledAt), asc(bookings.id)),
    );
    return rows.map(toBooking);
  }

  async listUpcomingForProvider(
    providerUserId: string,
    after: Date,
  ): Promise<Booking[]> {
    const rows = await this.run('listUpcomingBookings', () =>
      this.db
        .select()
        .from(bookings)
        .where(
          and(
            eq(bookings.providerUserId, providerUserId),
            eq(bookings.status, 'confirmed'),
            gt(bookings.scheduledAt, after),
          ),
        )
        .orderBy(asc(bookings.scheduledAt), asc(bookings.id)),
    );
    return rows.map(toBooking);
  }

  async customerExists(customerUserId: string): Promise<boolean> {
    const [row] = await this.run('findCustomer', () =>
      this.db
        .select({ userId: customerProfiles.userId })
        .from(customerProfiles)
        .where(eq(customerProfiles.userId, customerUserId))
        .limit(1),
    );
    return Boolean(row);
  }

  async refreshProviderRating(
    providerUserId: string,
    now: Date,
  ): Promise<void> {
    await this.run('refreshProviderRating', async () => {
      const [aggregate] = await this.db
        .select({
          average: sql<string | null>`round(avg(${bookings.rating}), 1)`,
          total: count(bookings.rating),
        })
        .from(bookings)
        .where(
          and(
            eq(bookings.providerUserId, providerUserId),
            isNotNull(bookings.rating),
          ),
        );

      await this.db
        .update(providerProfiles)
        .set({
          rating: aggregate?.average ?? '0',
          totalRatings: aggregate?.total ?? 0,
          updatedAt: now,
        })
        .where(eq(providerProfiles.userId, providerUserId));
    });
  }

  async withProviderLock<T>(
    providerUserId: string,
    work: (scoped: BookingsRepository) => Promise<T>,
  ): Promise<T> {
    try {
      return await this.db.transaction(async (tx) => {
        await tx.execute(
          sql`select pg_advisory_xact_lock(hashtext(${providerUserId}))`,
        );
        return work(new DrizzleBookingsRepository(tx));
      });
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }
      throw new PersistenceError('providerTransaction', error);
    }
  }

  private async listSlice(
    operation: string,
    owner: SQL,
    query: BookingListQuery,
  ): Promise<{ items: Booking[]; total: number }> {
    const where = query.status
      ? and(owner, eq(bookings.status, query.status))
      : owner;

    return this.run(operation, async () => {
      const rows = await this.db
        .select()
        .from(bookings)
        .where(where)
        .orderBy(asc(bookings.scheduledAt), asc(bookings.id))
        .limit(query.limit)
        .offset(query.offset);

      const [totals] = await this.db
        .select({ total: count() })
        .from(bookings)
        .where(where);

      return { items: rows.map(toBooking), total: totals?.total ?? 0 };
    });
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      if (error instanceof DomainError) {
        throw error;
      }
      throw new PersistenceError(operation, error);
    }
  }
}

const toBooking = (row: BookingRow): Booking => {
  if (!isBookingStatus(row.status)) {
    throw new PersistenceError(
      'readBooking',
      new Error(`unknown booking status "${row.status}" on ${row.id}`),
    );
  }
  return { ...row, status: row.status };
};
