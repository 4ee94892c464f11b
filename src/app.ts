import Fastify, { type FastifyBaseLogger } from 'fastify';
import cors from '@fastify/cors';
import { version } from '../package.json';
import type { CalendarStore } from './services/calendar';
import type { ToolAdapter } from './services/tools';
import type { ConversationAgent } from './services/agent';
import { healthRoutes } from './routes/health';
import { availabilityRoutes } from './routes/availability';
import { reservationRoutes } from './routes/reservations';
import { callRoutes } from './routes/calls';

export interface AppDeps {
  calendar: CalendarStore;
  adapter: ToolAdapter;
  agent: ConversationAgent;
  restaurantName: string;
  logger?: FastifyBaseLogger;
}

export function buildApp(deps: AppDeps) {
  const { calendar, adapter, agent, restaurantName } = deps;
  const app = Fastify({ logger: deps.logger ?? false });

  app.register(cors, { origin: '*' });

  app.register(healthRoutes, { restaurantName, version });
  app.register(availabilityRoutes, { calendar });
  app.register(reservationRoutes, { calendar });
  app.register(callRoutes, { agent, adapter });

  return app;
}
