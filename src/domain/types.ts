declare const reservationIdBrand: unique symbol;
export type ReservationId = string & { [reservationIdBrand]: true };

export type ISODateTime = string;

// YYYY-MM-DD
export type CalendarDate = string;

// HH:MM, on the slot grid
export type SlotTime = string;

export type ReservationStatus = 'CONFIRMED' | 'CANCELLED';

export interface Reservation {
  readonly id: ReservationId;
  readonly name: string;
  readonly partySize: number;
  readonly date: CalendarDate;
  readonly time: SlotTime;
  readonly phone?: string;
  readonly status: ReservationStatus;
  readonly createdAt: ISODateTime;
  readonly updatedAt: ISODateTime;
}

export interface NewReservation {
  name: string;
  partySize: number;
  date: CalendarDate;
  time: SlotTime;
  phone?: string;
}

export interface Availability {
  available: boolean;
  reason?: string;
}

export interface ReservationFilter {
  date?: CalendarDate;
  status?: ReservationStatus;
}

export interface CalendarRules {
  slotCapacity: number;
  maxPartySize: number;
  slotMinutes: number;
  openingHour: number;
  closingHour: number;
}

export const toReservationId = (id: string): ReservationId => id as ReservationId;
