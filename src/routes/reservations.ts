import type { FastifyInstance } from 'fastify';
import { listQuery, reservationBody, reservationIdParam } from '../schemas';
import type { CalendarStore } from '../services/calendar';
import { AlreadyCancelledError } from '../domain/errors';
import type { Reservation } from '../domain/types';
import { toReservationId } from '../domain/types';
import { sendError, sendInvalidInput } from './errors';

interface ReservationRoutesOpts {
  calendar: CalendarStore;
}

const toResponse = (r: Reservation) => ({
  id: r.id,
  name: r.name,
  partySize: r.partySize,
  date: r.date,
  time: r.time,
  phone: r.phone ?? null,
  status: r.status,
  createdAt: r.createdAt,
  updatedAt: r.updatedAt,
});

export async function reservationRoutes(app: FastifyInstance, opts: ReservationRoutesOpts) {
  const { calendar } = opts;

  app.post('/reservations', async (req, reply) => {
    const parsed = reservationBody.safeParse(req.body);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const header = req.headers['idempotency-key'];
    const idempotencyKey = typeof header === 'string' && header.trim() ? header : undefined;

    try {
      const reservation = await calendar.createReservation(parsed.data, idempotencyKey);
      return reply.status(201).send(toResponse(reservation));
    } catch (error) {
      return sendError(reply, req.log, error);
    }
  });

  app.get('/reservations', async (req, reply) => {
    const parsed = listQuery.safeParse(req.query);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const reservations = await calendar.listReservations(parsed.data);
    const items = Array.from(reservations, toResponse);

    return reply.status(200).send({ count: items.length, items });
  });

  app.get('/reservations/:id', async (req, reply) => {
    const parsed = reservationIdParam.safeParse(req.params);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const reservation = await calendar.getReservation(toReservationId(parsed.data.id));
    if (!reservation) {
      return reply.status(404).send({
        error: 'not_found',
        detail: `No reservation found with id ${parsed.data.id}`,
      });
    }

    return reply.status(200).send(toResponse(reservation));
  });

  app.delete('/reservations/:id', async (req, reply) => {
    const parsed = reservationIdParam.safeParse(req.params);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    try {
      const cancelled = await calendar.cancelReservation(toReservationId(parsed.data.id));
      return reply.status(200).send({ ...toResponse(cancelled), alreadyCancelled: false });
    } catch (error) {
      if (error instanceof AlreadyCancelledError) {
        return reply.status(200).send({ ...toResponse(error.reservation), alreadyCancelled: true });
      }
      return sendError(reply, req.log, error);
    }
  });
}
