import { ForbiddenException } from '@nestjs/common';
import type { Actor } from '../bookings/bookings.types';
import type { AuthUser } from './auth.types';

/**
 * The services authorize against a single acting role; a token without an
 * active role cannot act at all.
 */
export const resolveActor = (user: AuthUser): Actor => {
  if (!user.activeRole) {
    throw new ForbiddenException({
      code: 'FORBIDDEN',
      message: 'Forbidden',
    });
  }
  return { userId: user.userId, role: user.activeRole };
};
