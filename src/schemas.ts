import { z } from 'zod';
import { DATE_PATTERN, TIME_PATTERN } from './utils/time';

const date = z.string().trim().regex(DATE_PATTERN, 'date must be YYYY-MM-DD');
const time = z.string().trim().regex(TIME_PATTERN, 'time must be HH:MM');
const status = z
  .string()
  .transform(s => s.toUpperCase())
  .pipe(z.enum(['CONFIRMED', 'CANCELLED']));

// HTTP

export const availabilityBody = z.object({
  date,
  time,
  partySize: z.number().int().positive(),
});

export const availableTimesQuery = z.object({
  date,
  partySize: z.coerce.number().int().positive(),
});

export const reservationBody = z.object({
  name: z.string().trim().min(1, 'name is required'),
  partySize: z.number().int().positive(),
  date,
  time,
  phone: z.string().trim().min(1).optional(),
});

export const listQuery = z.object({
  date: date.optional(),
  status: status.optional(),
});

export const reservationIdParam = z.object({
  id: z.string().min(1),
});

export const toolNameParam = z.object({
  name: z.string().min(1),
});

export const callEventBody = z.record(z.unknown());

// Agent tool arguments. Models emit snake_case and the odd synonym, so keys
// are folded onto the camelCase names before validation.

const argAliases: Record<string, string> = {
  party_size: 'partySize',
  people: 'partySize',
  guests: 'partySize',
  reservation_id: 'reservationId',
  id: 'reservationId',
  customer_name: 'name',
  phone_number: 'phone',
};

export function normalizeToolArgs(args: unknown): unknown {
  if (typeof args !== 'object' || args === null || Array.isArray(args)) return args;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(args)) {
    const target = argAliases[key] ?? key;
    if (!(target in out)) out[target] = value;
  }
  return out;
}

// plain numbers or digit strings only; booleans and arrays are not party sizes
const partySizeArg = z
  .union([z.number(), z.string().trim().regex(/^\d+$/, 'party size must be a number')])
  .pipe(z.coerce.number().int().positive('party size must be at least 1'));

export const checkAvailabilityArgs = z.object({
  date,
  time,
  partySize: partySizeArg,
});

export const bookTableArgs = z.object({
  name: z.string().trim().min(1, 'name is required'),
  partySize: partySizeArg,
  date,
  time,
  phone: z.string().trim().min(1).optional(),
});

export const cancelReservationArgs = z.object({
  reservationId: z.string().trim().min(1, 'reservation id is required'),
});

export const listAvailableTimesArgs = z.object({
  date,
  partySize: partySizeArg,
});

export function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  const field = issue?.path?.join('.') || 'input';
  return `${field}: ${issue?.message || 'Invalid value'}`;
}

export type AvailabilityBody = z.infer<typeof availabilityBody>;
export type ReservationBody = z.infer<typeof reservationBody>;
export type ListQuery = z.infer<typeof listQuery>;
export type CheckAvailabilityArgs = z.infer<typeof checkAvailabilityArgs>;
export type BookTableArgs = z.infer<typeof bookTableArgs>;
export type CancelReservationArgs = z.infer<typeof cancelReservationArgs>;
export type ListAvailableTimesArgs = z.infer<typeof listAvailableTimesArgs>;
