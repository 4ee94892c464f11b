import dotenv from 'dotenv';
import { z } from 'zod';

const int = (fallback: number) => z.coerce.number().int().default(fallback);

const ConfigSchema = z
  .object({
    server: z.object({
      host: z.string().min(1).default('0.0.0.0'),
      port: int(8000).pipe(z.number().min(1).max(65535)),
      logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
      production: z.boolean(),
    }),
    agent: z.object({
      apiKey: z.string().default(''),
      baseUrl: z.string().url().default('https://openrouter.ai/api/v1'),
      model: z.string().min(1).default('openai/gpt-4o-mini'),
      maxSteps: int(5).pipe(z.number().min(1).max(20)),
    }),
    restaurant: z.object({
      name: z.string().min(1).default('The Restaurant'),
      slotCapacity: int(1).pipe(z.number().min(1)),
      maxPartySize: int(8).pipe(z.number().min(1)),
      slotMinutes: int(30).pipe(z.number().min(5).max(60)),
      openingHour: int(11).pipe(z.number().min(0).max(23)),
      closingHour: int(22).pipe(z.number().min(1).max(24)),
    }),
  })
  .superRefine((config, ctx) => {
    const { slotMinutes, openingHour, closingHour } = config.restaurant;
    if (60 % slotMinutes !== 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['restaurant', 'slotMinutes'],
        message: 'SLOT_MINUTES must divide 60',
      });
    }
    if (closingHour <= openingHour) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['restaurant', 'closingHour'],
        message: 'CLOSING_HOUR must be after OPENING_HOUR',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return ConfigSchema.parse({
    server: {
      host: env.HOST,
      port: env.PORT,
      logLevel: env.LOG_LEVEL,
      production: env.NODE_ENV === 'production',
    },
    agent: {
      apiKey: env.OPENROUTER_API_KEY,
      baseUrl: env.OPENROUTER_BASE_URL,
      model: env.AGENT_MODEL,
      maxSteps: env.AGENT_MAX_STEPS,
    },
    restaurant: {
      name: env.RESTAURANT_NAME,
      slotCapacity: env.SLOT_CAPACITY,
      maxPartySize: env.MAX_PARTY_SIZE,
      slotMinutes: env.SLOT_MINUTES,
      openingHour: env.OPENING_HOUR,
      closingHour: env.CLOSING_HOUR,
    },
  });
}

// .env first, real environment wins
export function loadEnvFile(): void {
  dotenv.config();
}
