import pino from 'pino';
import { createOpenAI } from '@ai-sdk/openai';
import { loadConfig, loadEnvFile } from './config';
import { createLoggerOptions } from './middleware/logger';
import { Database } from './store/db';
import { LockManager } from './store/locks';
import { IdempotencyStore } from './store/idempotency';
import { createCalendarService } from './services/calendar';
import { createToolAdapter } from './services/tools';
import { createReservationAgent } from './services/agent';
import type { Reservation } from './domain/types';
import { buildApp } from './app';

loadEnvFile();
const config = loadConfig();
const logger = pino(createLoggerOptions(config.server));

const db = new Database();
const lockManager = new LockManager();
const idempotencyStore = new IdempotencyStore<Reservation>();

const calendar = createCalendarService({
  db,
  lockManager,
  idempotencyStore,
  rules: config.restaurant,
});
const adapter = createToolAdapter({ calendar, logger: logger.child({ module: 'tools' }) });

if (!config.agent.apiKey) {
  logger.warn('OPENROUTER_API_KEY is not set; the call webhook will fail until it is');
}
const openrouter = createOpenAI({
  apiKey: config.agent.apiKey,
  baseURL: config.agent.baseUrl,
  compatibility: 'compatible',
});
const agent = createReservationAgent({
  model: openrouter(config.agent.model),
  adapter,
  restaurantName: config.restaurant.name,
  maxSteps: config.agent.maxSteps,
  logger: logger.child({ module: 'agent' }),
});

const app = buildApp({ calendar, adapter, agent, restaurantName: config.restaurant.name, logger });

const start = async () => {
  try {
    await app.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
