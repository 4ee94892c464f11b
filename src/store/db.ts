import type {
  CalendarDate,
  Reservation,
  ReservationId,
  SlotTime,
} from '../domain/types';

/**
 * Reservation records, kept in creation order. Records are replaced on
 * update rather than mutated, so an array handed out earlier stays a
 * consistent snapshot.
 */
export class Database {
  private reservations = new Map<ReservationId, Reservation>();

  getReservation(id: ReservationId): Reservation | undefined {
    return this.reservations.get(id);
  }

  getAllReservations(): Reservation[] {
    return Array.from(this.reservations.values());
  }

  countConfirmedAt(date: CalendarDate, time: SlotTime): number {
    let count = 0;
    for (const r of this.reservations.values()) {
      if (r.status === 'CONFIRMED' && r.date === date && r.time === time) count++;
    }
    return count;
  }

  createReservation(reservation: Reservation): Reservation {
    this.reservations.set(reservation.id, reservation);
    return reservation;
  }

  updateReservation(
    id: ReservationId,
    updates: Partial<Omit<Reservation, 'id'>>
  ): Reservation | undefined {
    const existing = this.reservations.get(id);
    if (!existing) return undefined;
    const updated: Reservation = { ...existing, ...updates };
    // Map.set on an existing key keeps its position
    this.reservations.set(id, updated);
    return updated;
  }

  get size(): number {
    return this.reservations.size;
  }
}
