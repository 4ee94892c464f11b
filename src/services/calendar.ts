import { v4 as uuidv4 } from 'uuid';
import { Database } from '../store/db';
import { LockManager } from '../store/locks';
import { IdempotencyStore } from '../store/idempotency';
import {
  AlreadyCancelledError,
  InternalError,
  InvalidRequestError,
  NotFoundError,
  SlotUnavailableError,
} from '../domain/errors';
import type {
  Availability,
  CalendarDate,
  CalendarRules,
  NewReservation,
  Reservation,
  ReservationFilter,
  ReservationId,
  SlotTime,
} from '../domain/types';
import { toReservationId } from '../domain/types';
import {
  fromMinutes,
  isValidDate,
  isValidTime,
  slotTimes,
  toLocalDateTime,
  toMinutes,
} from '../utils/time';

/**
 * Everything the API and the agent tools need from a reservation calendar.
 * The in-memory implementation below is the only one today; a durable
 * backend only has to honour the same contract.
 */
export interface CalendarStore {
  checkAvailability(date: CalendarDate, time: SlotTime, partySize: number): Promise<Availability>;
  createReservation(input: NewReservation, idempotencyKey?: string): Promise<Reservation>;
  cancelReservation(id: ReservationId): Promise<Reservation>;
  listReservations(filter?: ReservationFilter): Promise<Iterable<Reservation>>;
  getReservation(id: ReservationId): Promise<Reservation | undefined>;
  getAvailableTimes(date: CalendarDate, partySize: number): Promise<SlotTime[]>;
}

interface CalendarServiceDeps {
  db: Database;
  lockManager: LockManager;
  idempotencyStore: IdempotencyStore<Reservation>;
  rules: CalendarRules;
  clock?: () => Date;
}

export function createCalendarService(deps: CalendarServiceDeps): CalendarStore {
  const { db, lockManager, idempotencyStore, rules } = deps;
  const clock = deps.clock ?? (() => new Date());

  const openingTime = fromMinutes(rules.openingHour * 60);
  const closingTime = fromMinutes(rules.closingHour * 60);

  function assertDate(date: string): void {
    if (!isValidDate(date)) {
      throw new InvalidRequestError(`"${date}" is not a valid date, use YYYY-MM-DD`);
    }
  }

  function assertPartySize(partySize: number): void {
    if (!Number.isInteger(partySize) || partySize < 1) {
      throw new InvalidRequestError('Party size must be a whole number of at least 1');
    }
  }

  function isPast(date: CalendarDate, time: SlotTime): boolean {
    return toLocalDateTime(date, time).getTime() <= clock().getTime();
  }

  function assertSlot(date: string, time: string, partySize: number): void {
    assertDate(date);
    if (!isValidTime(time)) {
      throw new InvalidRequestError(`"${time}" is not a valid time, use HH:MM`);
    }
    assertPartySize(partySize);

    const minutes = toMinutes(time);
    if (minutes % rules.slotMinutes !== 0) {
      throw new InvalidRequestError(`Reservations start every ${rules.slotMinutes} minutes`);
    }
    if (minutes < rules.openingHour * 60 || minutes >= rules.closingHour * 60) {
      throw new InvalidRequestError(
        `Reservations are taken between ${openingTime} and ${closingTime}`
      );
    }
    if (isPast(date, time)) {
      throw new InvalidRequestError(`${date} at ${time} is in the past`);
    }
  }

  // no validation, no side effects; callers validate first
  function evaluate(date: CalendarDate, time: SlotTime, partySize: number): Availability {
    if (partySize > rules.maxPartySize) {
      return {
        available: false,
        reason: `We can seat at most ${rules.maxPartySize} guests per reservation`,
      };
    }

    const occupancy = db.countConfirmedAt(date, time);
    if (occupancy >= rules.slotCapacity) {
      return { available: false, reason: `${time} on ${date} is fully booked` };
    }

    return { available: true };
  }

  async function checkAvailability(
    date: CalendarDate,
    time: SlotTime,
    partySize: number
  ): Promise<Availability> {
    assertSlot(date, time, partySize);
    return evaluate(date, time, partySize);
  }

  async function createReservation(
    input: NewReservation,
    idempotencyKey?: string
  ): Promise<Reservation> {
    const name = input.name.trim();
    if (!name) {
      throw new InvalidRequestError('A name is required for the reservation');
    }

    const phone = input.phone?.trim();
    if (input.phone !== undefined && !phone) {
      throw new InvalidRequestError('Phone number cannot be empty');
    }

    assertSlot(input.date, input.time, input.partySize);

    return lockManager.acquire(input.date, input.time, async () => {
      if (idempotencyKey) {
        const cached = idempotencyStore.get(idempotencyKey);
        // the record may have been cancelled since; answer with its current state
        if (cached) return db.getReservation(cached.id) ?? cached;
      }

      const availability = evaluate(input.date, input.time, input.partySize);
      if (!availability.available) {
        throw new SlotUnavailableError(availability.reason ?? 'That time is not available');
      }

      const timestamp = clock().toISOString();
      const reservation: Reservation = {
        id: toReservationId(uuidv4()),
        name,
        partySize: input.partySize,
        date: input.date,
        time: input.time,
        ...(phone ? { phone } : {}),
        status: 'CONFIRMED',
        createdAt: timestamp,
        updatedAt: timestamp,
      };

      const created = db.createReservation(reservation);

      if (idempotencyKey) {
        idempotencyStore.set(idempotencyKey, created);
      }

      return created;
    });
  }

  async function cancelReservation(id: ReservationId): Promise<Reservation> {
    const reservation = db.getReservation(id);
    if (!reservation) {
      throw new NotFoundError(`No reservation found with id ${id}`);
    }

    if (reservation.status === 'CANCELLED') {
      throw new AlreadyCancelledError(reservation);
    }

    const updated = db.updateReservation(id, {
      status: 'CANCELLED',
      updatedAt: clock().toISOString(),
    });
    if (!updated) {
      throw new InternalError('Failed to cancel reservation');
    }

    return updated;
  }

  async function listReservations(filter: ReservationFilter = {}): Promise<Iterable<Reservation>> {
    const snapshot = db.getAllReservations();
    const matches = (r: Reservation) =>
      (filter.date === undefined || r.date === filter.date) &&
      (filter.status === undefined || r.status === filter.status);

    return {
      *[Symbol.iterator]() {
        for (const r of snapshot) {
          if (matches(r)) yield r;
        }
      },
    };
  }

  async function getReservation(id: ReservationId): Promise<Reservation | undefined> {
    return db.getReservation(id);
  }

  async function getAvailableTimes(date: CalendarDate, partySize: number): Promise<SlotTime[]> {
    assertDate(date);
    assertPartySize(partySize);

    return slotTimes(rules.openingHour, rules.closingHour, rules.slotMinutes).filter(
      time => !isPast(date, time) && evaluate(date, time, partySize).available
    );
  }

  return {
    checkAvailability,
    createReservation,
    cancelReservation,
    listReservations,
    getReservation,
    getAvailableTimes,
  };
}
