import { SetMetadata } from '@nestjs/common';
import type { UserRole } from './auth.types';

export const ROLES_KEY = 'roles';

/** Restricts a handler (or controller) to callers whose active role matches. */
export const roles = (...allowed: UserRole[]) =>
  SetMetadata(ROLES_KEY, allowed);
