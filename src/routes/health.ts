import type { FastifyInstance } from 'fastify';

interface HealthRoutesOpts {
  restaurantName: string;
  version: string;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRoutesOpts) {
  const { restaurantName, version } = opts;

  app.get('/', async () => {
    return { message: `Reservations for ${restaurantName}`, status: 'operational' };
  });

  app.get('/health', async () => {
    return { status: 'healthy', version };
  });
}
