import { generateText, jsonSchema, tool, type LanguageModel } from 'ai';
import type { FastifyBaseLogger } from 'fastify';
import type { ToolAdapter } from './tools';
import { toLocalDate } from '../utils/time';

export type CallEvent = Record<string, unknown>;

export interface AgentToolCall {
  name: string;
  result: unknown;
}

export interface AgentReply {
  reply: string;
  toolCalls: AgentToolCall[];
}

export interface ConversationAgent {
  respond(event: CallEvent): Promise<AgentReply>;
}

interface ReservationAgentDeps {
  model: LanguageModel;
  adapter: ToolAdapter;
  restaurantName: string;
  maxSteps: number;
  logger: FastifyBaseLogger;
  clock?: () => Date;
}

const stringProp = (description: string) => ({ type: 'string' as const, description });
const integerProp = (description: string) => ({ type: 'integer' as const, minimum: 1, description });

export function buildSystemPrompt(restaurantName: string, today: Date): string {
  return [
    `You are a helpful reservation assistant answering the phone for ${restaurantName}.`,
    'Your goal is to help callers book, check and cancel table reservations.',
    'Always be polite and professional, and keep replies short enough to be spoken aloud.',
    'Ask for any missing details (name, party size, date, time) before booking.',
    'Always check availability with a tool before promising a table, and read back the reservation number after booking.',
    'You receive call events from the phone system as JSON; reply with what should be said to the caller.',
    `Today is ${toLocalDate(today)}. Dates are YYYY-MM-DD and times are 24-hour HH:MM.`,
  ].join('\n');
}

// Argument schemas are descriptive only; the adapter does the validation so
// malformed calls come back as narratable errors instead of SDK exceptions.
export function buildReservationTools(adapter: ToolAdapter) {
  return {
    check_availability: tool({
      description: 'Check whether a table is free for a party at a specific date and time.',
      parameters: jsonSchema<Record<string, unknown>>({
        type: 'object',
        properties: {
          date: stringProp('Reservation date, YYYY-MM-DD'),
          time: stringProp('Reservation time, HH:MM'),
          party_size: integerProp('Number of guests'),
        },
        required: ['date', 'time', 'party_size'],
      }),
      execute: async args => adapter.checkAvailability(args),
    }),
    book_table: tool({
      description: 'Book a table. Only call after the caller has confirmed the details.',
      parameters: jsonSchema<Record<string, unknown>>({
        type: 'object',
        properties: {
          name: stringProp('Guest name for the reservation'),
          party_size: integerProp('Number of guests'),
          date: stringProp('Reservation date, YYYY-MM-DD'),
          time: stringProp('Reservation time, HH:MM'),
          phone: stringProp('Contact phone number, if the caller gave one'),
        },
        required: ['name', 'party_size', 'date', 'time'],
      }),
      execute: async args => adapter.bookTable(args),
    }),
    cancel_reservation: tool({
      description: 'Cancel an existing reservation by its reservation number.',
      parameters: jsonSchema<Record<string, unknown>>({
        type: 'object',
        properties: {
          reservation_id: stringProp('Reservation number given at booking time'),
        },
        required: ['reservation_id'],
      }),
      execute: async args => adapter.cancelReservation(args),
    }),
    list_available_times: tool({
      description: 'List the times still open on a date for a party, to offer alternatives.',
      parameters: jsonSchema<Record<string, unknown>>({
        type: 'object',
        properties: {
          date: stringProp('Reservation date, YYYY-MM-DD'),
          party_size: integerProp('Number of guests'),
        },
        required: ['date', 'party_size'],
      }),
      execute: async args => adapter.listAvailableTimes(args),
    }),
  };
}

export function createReservationAgent(deps: ReservationAgentDeps): ConversationAgent {
  const { model, adapter, restaurantName, maxSteps, logger } = deps;
  const clock = deps.clock ?? (() => new Date());
  const tools = buildReservationTools(adapter);

  async function respond(event: CallEvent): Promise<AgentReply> {
    const { text, steps } = await generateText({
      model,
      system: buildSystemPrompt(restaurantName, clock()),
      prompt: JSON.stringify(event),
      tools,
      maxSteps,
    });

    const toolCalls = steps.flatMap(step =>
      step.toolResults.map(r => ({ name: r.toolName, result: r.result }))
    );
    logger.debug({ steps: steps.length, toolCalls: toolCalls.map(c => c.name) }, 'agent replied');

    return { reply: text, toolCalls };
  }

  return { respond };
}
