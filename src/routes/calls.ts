import type { FastifyInstance } from 'fastify';
import { callEventBody, toolNameParam } from '../schemas';
import type { ConversationAgent } from '../services/agent';
import { isToolName, type ToolAdapter } from '../services/tools';
import { sendError, sendInvalidInput } from './errors';

interface CallRoutesOpts {
  agent: ConversationAgent;
  adapter: ToolAdapter;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export async function callRoutes(app: FastifyInstance, opts: CallRoutesOpts) {
  const { agent, adapter } = opts;

  // call-session events from the voice provider; the payload goes to the agent as-is
  app.post('/calls/webhook', async (req, reply) => {
    const parsed = callEventBody.safeParse(req.body);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    try {
      const result = await agent.respond(parsed.data);
      return reply.status(200).send(result);
    } catch (error) {
      return sendError(reply, req.log, error);
    }
  });

  // provider-side function calls, e.g. { call: {...}, name, args: {...} } or bare args
  app.post('/calls/tools/:name', async (req, reply) => {
    const parsed = toolNameParam.safeParse(req.params);
    if (!parsed.success) return sendInvalidInput(reply, parsed.error);

    const { name } = parsed.data;
    if (!isToolName(name)) {
      return reply.status(404).send({ error: 'not_found', detail: `Unknown tool "${name}"` });
    }

    const body = req.body;
    const args = isRecord(body) && isRecord(body.args) ? body.args : body;
    const result = await adapter.invoke(name, args);
    return reply.status(200).send(result);
  });
}
