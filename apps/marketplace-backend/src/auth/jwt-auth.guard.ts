import { Injectable, Logger, UnauthorizedException } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { AuthUser } from './auth.types';

@Injectable()
export class JwtAuthGuard extends AuthGuard('jwt') {
  private readonly logger = new Logger(JwtAuthGuard.name);

  override handleRequest<TUser = AuthUser>(
    err: unknown,
    user: TUser | false,
  ): TUser {
    if (err || !user) {
      if (err instanceof Error) {
        this.logger.error('handleRequest failed', err.stack);
      }
      throw new UnauthorizedException({
        code: 'UNAUTHENTICATED',
        message: 'Authentication required',
      });
    }
    return user;
  }
}
