import type { Reservation } from './types';

export type CalendarErrorCode =
  | 'invalid_request'
  | 'slot_unavailable'
  | 'not_found'
  | 'already_cancelled'
  | 'internal_error';

export class CalendarError extends Error {
  readonly code: CalendarErrorCode;
  readonly statusCode: number;

  constructor(message: string, code: CalendarErrorCode, statusCode: number) {
    super(message);
    this.name = 'CalendarError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class InvalidRequestError extends CalendarError {
  constructor(message: string) {
    super(message, 'invalid_request', 400);
    this.name = 'InvalidRequestError';
  }
}

export class SlotUnavailableError extends CalendarError {
  constructor(reason: string) {
    super(reason, 'slot_unavailable', 409);
    this.name = 'SlotUnavailableError';
  }
}

export class NotFoundError extends CalendarError {
  constructor(message: string) {
    super(message, 'not_found', 404);
    this.name = 'NotFoundError';
  }
}

// Not a failure: the caller asked for a state the record is already in.
export class AlreadyCancelledError extends CalendarError {
  readonly reservation: Reservation;

  constructor(reservation: Reservation) {
    super(`Reservation ${reservation.id} is already cancelled`, 'already_cancelled', 409);
    this.name = 'AlreadyCancelledError';
    this.reservation = reservation;
  }
}

export class InternalError extends CalendarError {
  constructor(message = 'An unexpected error occurred') {
    super(message, 'internal_error', 500);
    this.name = 'InternalError';
  }
}

export const isCalendarError = (err: unknown): err is CalendarError => err instanceof CalendarError;
