import { sql } from 'drizzle-orm';
import {
  boolean,
  index,
  integer,
  numeric,
  pgTable,
  serial,
  smallint,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';

export const users = pgTable(
  'users',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    name: text('name').notNull(),
    email: text('email').notNull(),
    phoneNumber: text('phone_number'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    emailUnique: uniqueIndex('users_email_unique').on(table.email),
  }),
);

export const categories = pgTable(
  'categories',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    slug: text('slug').notNull(),
    description: text('description'),
    icon: text('icon'),
    active: boolean('active').notNull().default(true),
    displayOrder: integer('display_order').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    nameUnique: uniqueIndex('categories_name_unique').on(table.name),
    slugUnique: uniqueIndex('categories_slug_unique').on(table.slug),
  }),
);

export const providerProfiles = pgTable(
  'provider_profiles',
  {
    userId: uuid('user_id')
      .primaryKey()
      .references(() => users.id, {
        onDelete: 'restrict',
        onUpdate: 'cascade',
      }),
    categoryId: integer('category_id')
      .notNull()
      .references(() => categories.id, {
        onDelete: 'restrict',
        onUpdate: 'cascade',
      }),
    businessName: text('business_name').notNull(),
    bio: text('bio'),
    hourlyRate: numeric('hourly_rate', { precision: 10, scale: 2 }),
    serviceArea: text('service_area'),
    experienceYears: integer('experience_years'),
    verified: boolean('verified').notNull().default(false),
    available: boolean('available').notNull().default(true),
    rating: numeric('rating', { precision: 2, scale: 1 })
      .notNull()
      .default('0'),
    totalRatings: integer('total_ratings').notNull().default(0),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    categoryIdIdx: index('provider_profiles_category_id_idx').on(
      table.categoryId,
    ),
  }),
);

export const customerProfiles = pgTable('customer_profiles', {
  userId: uuid('user_id')
    .primaryKey()
    .references(() => users.id, {
      onDelete: 'restrict',
      onUpdate: 'cascade',
    }),
  defaultAddress: text('default_address'),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const bookings = pgTable(
  'bookings',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    providerUserId: uuid('provider_user_id')
      .notNull()
      .references(() => providerProfiles.userId, {
        onDelete: 'restrict',
        onUpdate: 'cascade',
      }),
    customerUserId: uuid('customer_user_id')
      .notNull()
      .references(() => customerProfiles.userId, {
        onDelete: 'restrict',
        onUpdate: 'cascade',
      }),
    scheduledAt: timestamp('scheduled_at', { withTimezone: true }).notNull(),
    durationMinutes: integer('duration_minutes').notNull().default(60),
    endsAt: timestamp('ends_at', { withTimezone: true }).notNull(),
    status: text('status').notNull(),
    address: text('address').notNull(),
    notes: text('notes'),
    quotedAmount: numeric('quoted_amount', { precision: 10, scale: 2 }),
    finalAmount: numeric('final_amount', { precision: 10, scale: 2 }),
    respondedAt: timestamp('responded_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    rating: smallint('rating'),
    review: text('review'),
    cancellationReason: text('cancellation_reason'),
    idempotencyKey: text('idempotency_key'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => ({
    providerUserIdScheduledAtIdx: index(
      'bookings_provider_user_id_scheduled_at_idx',
    ).on(table.providerUserId, table.scheduledAt),
    customerUserIdScheduledAtIdx: index(
      'bookings_customer_user_id_scheduled_at_idx',
    ).on(table.customerUserId, table.scheduledAt),
    idempotencyKeyUnique: uniqueIndex('bookings_idempotency_key_unique')
      .on(table.providerUserId, table.customerUserId, table.idempotencyKey)
      .where(sql`${table.idempotencyKey} is not null`),
  }),
);

export type BookingRow = typeof bookings.$inferSelect;
export type ProviderRow = typeof providerProfiles.$inferSelect;
export type CategoryRow = typeof categories.$inferSelect;
