import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  BookingValidationError,
  DomainError,
  InvalidOperationError,
  InvalidTransitionError,
  NotFoundError,
  PersistenceError,
  SchedulingConflictError,
  UnauthorizedActionError,
} from '../errors/domain-errors';

export const statusForDomainError = (error: DomainError): HttpStatus => {
  if (error instanceof NotFoundError) {
    return HttpStatus.NOT_FOUND;
  }
  if (error instanceof UnauthorizedActionError) {
    return HttpStatus.FORBIDDEN;
  }
  if (
    error instanceof InvalidTransitionError ||
    error instanceof SchedulingConflictError
  ) {
    return HttpStatus.CONFLICT;
  }
  if (error instanceof BookingValidationError) {
    return HttpStatus.BAD_REQUEST;
  }
  if (error instanceof InvalidOperationError) {
    return HttpStatus.UNPROCESSABLE_ENTITY;
  }
  if (error instanceof PersistenceError) {
    return HttpStatus.SERVICE_UNAVAILABLE;
  }
  return HttpStatus.INTERNAL_SERVER_ERROR;
};

@Catch(DomainError)
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(exception: DomainError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();
    const status = statusForDomainError(exception);

    if (exception instanceof PersistenceError) {
      this.logger.error(
        exception.message,
        exception.cause instanceof Error ? exception.cause.stack : undefined,
      );
    }

    response.status(status).json({
      code: exception.code,
      message: exception.message,
      ...(exception.details ? { details: exception.details } : {}),
    });
  }
}
