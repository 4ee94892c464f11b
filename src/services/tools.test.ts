import { describe, it, expect, beforeEach, vi } from 'vitest';
import pino from 'pino';
import { Database } from '../store/db';
import { LockManager } from '../store/locks';
import { IdempotencyStore } from '../store/idempotency';
import { createCalendarService, type CalendarStore } from './calendar';
import { createToolAdapter, type ToolAdapter } from './tools';
import type { Reservation } from '../domain/types';

const clock = () => new Date('2024-05-01T09:00:00');

describe('reservation tools', () => {
  let db: Database;
  let calendar: CalendarStore;
  let tools: ToolAdapter;

  beforeEach(() => {
    db = new Database();
    calendar = createCalendarService({
      db,
      lockManager: new LockManager(),
      idempotencyStore: new IdempotencyStore<Reservation>(),
      rules: { slotCapacity: 1, maxPartySize: 8, slotMinutes: 30, openingHour: 18, closingHour: 20 },
      clock,
    });
    tools = createToolAdapter({ calendar, logger: pino({ level: 'silent' }) });
  });

  describe('check_availability', () => {
    it('accepts snake_case arguments and numeric strings', async () => {
      const result = await tools.checkAvailability({ date: '2024-06-01', time: '19:00', party_size: '4' });
      expect(result).toEqual({
        status: 'available',
        message: 'A table for 4 is available on 2024-06-01 at 19:00.',
      });
    });

    it('suggests other times when the slot is taken', async () => {
      await calendar.createReservation({ name: 'Ada', partySize: 2, date: '2024-06-01', time: '19:00' });

      const result = await tools.checkAvailability({ date: '2024-06-01', time: '19:00', party_size: 2 });
      expect(result).toEqual({
        status: 'unavailable',
        message: '19:00 on 2024-06-01 is fully booked. Other open times that day: 18:00, 18:30, 19:30.',
        suggested_times: ['18:00', '18:30', '19:30'],
      });
    });

    it('returns an error status for malformed arguments', async () => {
      const result = await tools.checkAvailability({ date: 'invalid-date', time: '19:00', party_size: 2 });
      expect(result).toEqual({
        status: 'error',
        message: "I couldn't read that request (date: date must be YYYY-MM-DD).",
      });
    });

    it('returns an error status for arguments that are not an object', async () => {
      const result = await tools.checkAvailability('tomorrow at seven');
      expect(result.status).toBe('error');
    });

    it('narrates store-level validation failures', async () => {
      const result = await tools.checkAvailability({ date: '2024-06-01', time: '21:00', party_size: 2 });
      expect(result).toEqual({
        status: 'error',
        message: 'Reservations are taken between 18:00 and 20:00.',
      });
    });
  });

  describe('book_table', () => {
    it('confirms and returns the reservation id', async () => {
      const result = await tools.bookTable({
        customer_name: 'Ada Guest',
        party_size: 4,
        date: '2024-06-01',
        time: '19:00',
        phone_number: '+15550100',
      });

      expect(result.status).toBe('confirmed');
      const stored = [...(await calendar.listReservations())];
      expect(stored).toHaveLength(1);
      expect(result.reservation_id).toBe(stored[0].id);
      expect(stored[0].phone).toBe('+15550100');
      expect(result.message).toBe(
        `Your table for 4 on 2024-06-01 at 19:00 is confirmed under Ada Guest. Your reservation number is ${stored[0].id}.`
      );
    });

    it('reports unavailable for a full slot', async () => {
      await tools.bookTable({ name: 'Ada', party_size: 4, date: '2024-06-01', time: '19:00' });
      const result = await tools.bookTable({ name: 'Bo', party_size: 1, date: '2024-06-01', time: '19:00' });

      expect(result).toEqual({ status: 'unavailable', message: '19:00 on 2024-06-01 is fully booked.' });
    });

    it('rejects party size 0 without creating a record', async () => {
      const result = await tools.bookTable({ name: 'Ada', party_size: 0, date: '2024-06-01', time: '19:00' });

      expect(result).toEqual({
        status: 'error',
        message: "I couldn't read that request (partySize: party size must be at least 1).",
      });
      expect(db.size).toBe(0);
    });

    it('refuses party sizes that are not numbers', async () => {
      const fromBoolean = await tools.bookTable({ name: 'Ada', party_size: true, date: '2024-06-01', time: '19:00' });
      const fromArray = await tools.bookTable({ name: 'Ada', party_size: [3], date: '2024-06-01', time: '19:30' });

      expect(fromBoolean.status).toBe('error');
      expect(fromArray.status).toBe('error');
      expect(db.size).toBe(0);
    });

    it('hides unexpected failures behind a generic message and logs them', async () => {
      const logger = pino({ level: 'silent' });
      const errorSpy = vi.spyOn(logger, 'error');
      const failing: CalendarStore = {
        ...calendar,
        createReservation: async () => {
          throw new Error('disk on fire');
        },
      };
      const adapter = createToolAdapter({ calendar: failing, logger });

      const result = await adapter.bookTable({ name: 'Ada', party_size: 2, date: '2024-06-01', time: '19:00' });

      expect(result).toEqual({
        status: 'error',
        message: 'Something went wrong on our side. Please try again in a moment.',
      });
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancel_reservation', () => {
    it('cancels, then reports an already cancelled reservation', async () => {
      const booked = await tools.bookTable({ name: 'Ada', party_size: 2, date: '2024-06-01', time: '19:00' });
      const id = booked.reservation_id;

      const first = await tools.cancelReservation({ reservation_id: id });
      expect(first).toEqual({
        status: 'cancelled',
        message: 'The reservation for Ada on 2024-06-01 at 19:00 has been cancelled.',
      });

      const second = await tools.cancelReservation({ reservation_id: id });
      expect(second).toEqual({ status: 'cancelled', message: `Reservation ${id} was already cancelled.` });
    });

    it('reports not_found for an unknown id', async () => {
      const result = await tools.cancelReservation({ reservation_id: 'nope' });
      expect(result).toEqual({
        status: 'not_found',
        message: "I couldn't find a reservation with number nope.",
      });
    });

    it('requires an id', async () => {
      const result = await tools.cancelReservation({});
      expect(result.status).toBe('error');
    });
  });

  describe('list_available_times', () => {
    it('lists the open slots', async () => {
      const result = await tools.listAvailableTimes({ date: '2024-06-01', party_size: 2 });
      expect(result).toEqual({
        status: 'available',
        times: ['18:00', '18:30', '19:00', '19:30'],
        message: 'Open times for 2 on 2024-06-01: 18:00, 18:30, 19:00, 19:30.',
      });
    });

    it('is unavailable for oversized parties', async () => {
      const result = await tools.listAvailableTimes({ date: '2024-06-01', party_size: 20 });
      expect(result).toEqual({
        status: 'unavailable',
        times: [],
        message: 'There are no open tables for 20 on 2024-06-01.',
      });
    });
  });

  describe('invoke', () => {
    it('dispatches by tool name', async () => {
      const result = await tools.invoke('check_availability', { date: '2024-06-01', time: '18:00', people: 2 });
      expect(result.status).toBe('available');
    });

    it('rejects unknown tools', async () => {
      expect(await tools.invoke('order_pizza', {})).toEqual({
        status: 'error',
        message: 'Unknown tool "order_pizza".',
      });
    });
  });

  it('books, refuses, cancels and rebooks the same slot', async () => {
    const slot = { date: '2024-06-01', time: '19:00' };

    const first = await tools.bookTable({ name: 'Ada', party_size: 4, ...slot });
    expect(first.status).toBe('confirmed');
    expect(first.reservation_id).toBeDefined();

    const second = await tools.bookTable({ name: 'Bo', party_size: 6, ...slot });
    expect(second.status).toBe('unavailable');

    const cancelled = await tools.cancelReservation({ reservation_id: first.reservation_id });
    expect(cancelled.status).toBe('cancelled');

    const rebooked = await tools.bookTable({ name: 'Bo', party_size: 6, ...slot });
    expect(rebooked.status).toBe('confirmed');
  });
});
