/**
 * Failures raised by the marketplace services. Each carries a stable `code`
 * that the HTTP layer exposes unchanged; none of them is fatal to the
 * process.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends DomainError {
  readonly code = 'NOT_FOUND';

  constructor(entity: string, id: string) {
    super(`${entity} not found`, { entity, id });
  }
}

export class InvalidTransitionError extends DomainError {
  readonly code = 'INVALID_TRANSITION';

  constructor(
    readonly currentStatus: string,
    readonly event: string,
  ) {
    super(`Cannot ${event} a booking that is ${currentStatus}`, {
      currentStatus,
      event,
    });
  }
}

export class UnauthorizedActionError extends DomainError {
  readonly code = 'FORBIDDEN';

  constructor(action: string) {
    super(`Not allowed to ${action}`, { action });
  }
}

export class SchedulingConflictError extends DomainError {
  readonly code = 'SCHEDULING_CONFLICT';

  constructor(providerUserId: string, start: Date, end: Date) {
    super('Provider already has an active booking in this time window', {
      providerUserId,
      start: start.toISOString(),
      end: end.toISOString(),
    });
  }
}

export class BookingValidationError extends DomainError {
  readonly code = 'VALIDATION_ERROR';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message, { field });
  }
}

export class InvalidOperationError extends DomainError {
  constructor(
    message: string,
    readonly code: string = 'INVALID_OPERATION',
  ) {
    super(message);
  }
}

/** A storage round trip failed after the request passed validation. */
export class PersistenceError extends DomainError {
  readonly code = 'PERSISTENCE_ERROR';

  constructor(operation: string, cause: unknown) {
    super(`Storage failure during ${operation}`, { operation }, { cause });
  }
}
