import { HttpStatus, Logger } from '@nestjs/common';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
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
import {
  DomainExceptionFilter,
  statusForDomainError,
} from './domain-exception.filter';

describe('statusForDomainError', () => {
  it.each([
    [new NotFoundError('Booking', 'b-1'), HttpStatus.NOT_FOUND],
    [new UnauthorizedActionError('start this booking'), HttpStatus.FORBIDDEN],
    [new InvalidTransitionError('pending', 'complete'), HttpStatus.CONFLICT],
    [
      new SchedulingConflictError(
        'p-1',
        new Date('2030-03-01T10:00:00.000Z'),
        new Date('2030-03-01T11:00:00.000Z'),
      ),
      HttpStatus.CONFLICT,
    ],
    [new BookingValidationError('reason', 'required'), HttpStatus.BAD_REQUEST],
    [new InvalidOperationError('no'), HttpStatus.UNPROCESSABLE_ENTITY],
    [
      new PersistenceError('findBooking', new Error('down')),
      HttpStatus.SERVICE_UNAVAILABLE,
    ],
  ])('maps %s', (error, status) => {
    expect(statusForDomainError(error)).toBe(status);
  });
});

describe('DomainExceptionFilter', () => {
  const respond = (exception: DomainError) => {
    const json = jest.fn();
    const status = jest.fn(() => ({ json }));
    new DomainExceptionFilter().catch(
      exception,
      new ExecutionContextHost([{}, { status }]),
    );
    return { status, json };
  };

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('renders the code, message and details', () => {
    const { status, json } = respond(
      new InvalidTransitionError('pending', 'complete'),
    );

    expect(status).toHaveBeenCalledWith(409);
    expect(json).toHaveBeenCalledWith({
      code: 'INVALID_TRANSITION',
      message: 'Cannot complete a booking that is pending',
      details: { currentStatus: 'pending', event: 'complete' },
    });
  });

  it('omits details when the error has none', () => {
    const { json } = respond(
      new InvalidOperationError('Booking has already been reviewed'),
    );

    expect(json).toHaveBeenCalledWith({
      code: 'INVALID_OPERATION',
      message: 'Booking has already been reviewed',
    });
  });

  it('logs storage failures with their cause', () => {
    const error = jest
      .spyOn(Logger.prototype, 'error')
      .mockImplementation(() => undefined);
    const cause = new Error('connection reset');

    const { status } = respond(new PersistenceError('updateBooking', cause));

    expect(status).toHaveBeenCalledWith(503);
    expect(error).toHaveBeenCalledWith(
      'Storage failure during updateBooking',
      cause.stack,
    );
  });
});
