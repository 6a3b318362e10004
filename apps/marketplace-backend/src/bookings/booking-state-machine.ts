import type { UserRole } from '../auth/auth.types';
import type { BookingEvent, BookingStatus } from './bookings.types';

type Transition = {
  to: BookingStatus;
  roles: readonly UserRole[];
};

const PARTIES: readonly UserRole[] = ['customer', 'provider'];
const PROVIDER_ONLY: readonly UserRole[] = ['provider'];

/**
 * Every legal (status, event) pair. Anything missing here is an invalid
 * transition; terminal statuses have no entries at all.
 */
const TRANSITIONS: Readonly<
  Record<BookingStatus, Partial<Record<BookingEvent, Transition>>>
> = {
  pending: {
    accept: { to: 'confirmed', roles: PROVIDER_ONLY },
    reject: { to: 'rejected', roles: PROVIDER_ONLY },
    cancel: { to: 'cancelled', roles: PARTIES },
  },
  confirmed: {
    start: { to: 'in_progress', roles: PROVIDER_ONLY },
    cancel: { to: 'cancelled', roles: PARTIES },
  },
  in_progress: {
    complete: { to: 'completed', roles: PROVIDER_ONLY },
    cancel: { to: 'cancelled', roles: PARTIES },
  },
  rejected: {},
  completed: {},
  cancelled: {},
};

export const findTransition = (
  from: BookingStatus,
  event: BookingEvent,
): Transition | null => TRANSITIONS[from][event] ?? null;
