import type { FastifyBaseLogger } from 'fastify';
import type { CalendarStore } from './calendar';
import {
  AlreadyCancelledError,
  NotFoundError,
  SlotUnavailableError,
  isCalendarError,
} from '../domain/errors';
import { toReservationId } from '../domain/types';
import {
  bookTableArgs,
  cancelReservationArgs,
  checkAvailabilityArgs,
  formatIssue,
  listAvailableTimesArgs,
  normalizeToolArgs,
} from '../schemas';
import type { z } from 'zod';

export const TOOL_NAMES = [
  'check_availability',
  'book_table',
  'cancel_reservation',
  'list_available_times',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const isToolName = (name: string): name is ToolName =>
  TOOL_NAMES.some(tool => tool === name);

export interface CheckAvailabilityResult {
  status: 'available' | 'unavailable' | 'error';
  message: string;
  suggested_times?: string[];
}

export interface BookTableResult {
  status: 'confirmed' | 'unavailable' | 'error';
  reservation_id?: string;
  message: string;
}

export interface CancelReservationResult {
  status: 'cancelled' | 'not_found' | 'error';
  message: string;
}

export interface ListAvailableTimesResult {
  status: 'available' | 'unavailable' | 'error';
  times: string[];
  message: string;
}

export type ToolResult =
  | CheckAvailabilityResult
  | BookTableResult
  | CancelReservationResult
  | ListAvailableTimesResult;

interface ToolAdapterDeps {
  calendar: CalendarStore;
  logger: FastifyBaseLogger;
}

const GENERIC_FAILURE = 'Something went wrong on our side. Please try again in a moment.';

export type ToolAdapter = ReturnType<typeof createToolAdapter>;

/**
 * Agent-facing wrapper around the calendar. Arguments arrive untyped from
 * the model; every tool validates them, and every outcome, including
 * unexpected failures, comes back as a status plus a sentence the agent
 * can read out to the caller.
 */
export function createToolAdapter(deps: ToolAdapterDeps) {
  const { calendar, logger } = deps;

  function parseArgs<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    args: unknown
  ): { ok: true; data: T } | { ok: false; message: string } {
    const parsed = schema.safeParse(normalizeToolArgs(args));
    if (!parsed.success) {
      return { ok: false, message: `I couldn't read that request (${formatIssue(parsed.error)}).` };
    }
    return { ok: true, data: parsed.data };
  }

  function describeError(err: unknown, tool: ToolName): string {
    if (isCalendarError(err) && err.code !== 'internal_error') {
      return `${err.message}.`;
    }
    logger.error({ err, tool }, 'tool call failed');
    return GENERIC_FAILURE;
  }

  async function checkAvailability(args: unknown): Promise<CheckAvailabilityResult> {
    const parsed = parseArgs(checkAvailabilityArgs, args);
    if (!parsed.ok) return { status: 'error', message: parsed.message };
    const { date, time, partySize } = parsed.data;

    try {
      const result = await calendar.checkAvailability(date, time, partySize);
      if (result.available) {
        return {
          status: 'available',
          message: `A table for ${partySize} is available on ${date} at ${time}.`,
        };
      }

      const reason = `${result.reason ?? 'That time is not available'}.`;
      const suggested = await calendar.getAvailableTimes(date, partySize);
      if (suggested.length === 0) {
        return { status: 'unavailable', message: reason };
      }
      return {
        status: 'unavailable',
        message: `${reason} Other open times that day: ${suggested.slice(0, 3).join(', ')}.`,
        suggested_times: suggested,
      };
    } catch (err) {
      return { status: 'error', message: describeError(err, 'check_availability') };
    }
  }

  async function bookTable(args: unknown): Promise<BookTableResult> {
    const parsed = parseArgs(bookTableArgs, args);
    if (!parsed.ok) return { status: 'error', message: parsed.message };
    const { name, partySize, date, time, phone } = parsed.data;

    try {
      const reservation = await calendar.createReservation({ name, partySize, date, time, phone });
      logger.info({ reservationId: reservation.id, date, time }, 'reservation booked');
      return {
        status: 'confirmed',
        reservation_id: reservation.id,
        message:
          `Your table for ${partySize} on ${date} at ${time} is confirmed under ${reservation.name}. ` +
          `Your reservation number is ${reservation.id}.`,
      };
    } catch (err) {
      if (err instanceof SlotUnavailableError) {
        return { status: 'unavailable', message: `${err.message}.` };
      }
      return { status: 'error', message: describeError(err, 'book_table') };
    }
  }

  async function cancelReservation(args: unknown): Promise<CancelReservationResult> {
    const parsed = parseArgs(cancelReservationArgs, args);
    if (!parsed.ok) return { status: 'error', message: parsed.message };
    const id = toReservationId(parsed.data.reservationId);

    try {
      const reservation = await calendar.cancelReservation(id);
      logger.info({ reservationId: id }, 'reservation cancelled');
      return {
        status: 'cancelled',
        message: `The reservation for ${reservation.name} on ${reservation.date} at ${reservation.time} has been cancelled.`,
      };
    } catch (err) {
      if (err instanceof AlreadyCancelledError) {
        return { status: 'cancelled', message: `Reservation ${id} was already cancelled.` };
      }
      if (err instanceof NotFoundError) {
        return { status: 'not_found', message: `I couldn't find a reservation with number ${id}.` };
      }
      return { status: 'error', message: describeError(err, 'cancel_reservation') };
    }
  }

  async function listAvailableTimes(args: unknown): Promise<ListAvailableTimesResult> {
    const parsed = parseArgs(listAvailableTimesArgs, args);
    if (!parsed.ok) return { status: 'error', times: [], message: parsed.message };
    const { date, partySize } = parsed.data;

    try {
      const times = await calendar.getAvailableTimes(date, partySize);
      if (times.length === 0) {
        return {
          status: 'unavailable',
          times,
          message: `There are no open tables for ${partySize} on ${date}.`,
        };
      }
      return {
        status: 'available',
        times,
        message: `Open times for ${partySize} on ${date}: ${times.join(', ')}.`,
      };
    } catch (err) {
      return { status: 'error', times: [], message: describeError(err, 'list_available_times') };
    }
  }

  async function invoke(name: string, args: unknown): Promise<ToolResult> {
    if (!isToolName(name)) {
      return { status: 'error', message: `Unknown tool "${name}".` };
    }
    switch (name) {
      case 'check_availability':
        return checkAvailability(args);
      case 'book_table':
        return bookTable(args);
      case 'cancel_reservation':
        return cancelReservation(args);
      case 'list_available_times':
        return listAvailableTimes(args);
    }
  }

  return { checkAvailability, bookTable, cancelReservation, listAvailableTimes, invoke };
}
