export const USER_ROLES = ['admin', 'provider', 'customer'] as const;
export type UserRole = (typeof USER_ROLES)[number];

export type AuthUser = {
  userId: string;
  roles: UserRole[];
  activeRole: UserRole | null;
};

/**
 * Claims carried by bearer tokens. Tokens are minted by the identity
 * service; this backend only verifies them.
 */
export type JwtPayload = {
  sub: string;
  roles?: UserRole[];
  activeRole?: UserRole | null;
};

export const isUserRole = (value: unknown): value is UserRole =>
  typeof value === 'string' &&
  (USER_ROLES as readonly string[]).includes(value);
