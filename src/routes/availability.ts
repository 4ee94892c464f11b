import type { FastifyInstance } from 'fastify';
import { availabilityBody, availableTimesQuery } from '../schemas';
import type { CalendarStore } from '../services/calendar';
import { sendError, sendInvalidInput } from './errors';

interface AvailabilityRoutesOpts {
  calendar: CalendarStore;
}

export async function availabilityRoutes(app: FastifyInstance, opts: AvailabilityRoutesOpts) {
  const { calendar } = opts;

  app.post('/availability', async (req, reply) => {
    const parsed = availabilityBody.safeParse(req.body);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const { date, time, partySize } = parsed.data;
    try {
      const availability = await calendar.checkAvailability(date, time, partySize);
      return reply.status(200).send({ date, time, partySize, ...availability });
    } catch (error) {
      return sendError(reply, req.log, error);
    }
  });

  app.get('/availability/times', async (req, reply) => {
    const parsed = availableTimesQuery.safeParse(req.query);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const { date, partySize } = parsed.data;
    try {
      const times = await calendar.getAvailableTimes(date, partySize);
      return reply.status(200).send({ date, partySize, times });
    } catch (error) {
      return sendError(reply, req.log, error);
    }
  });
}
