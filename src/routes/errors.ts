import type { FastifyBaseLogger, FastifyReply } from 'fastify';
import type { ZodError } from 'zod';
import { isCalendarError } from '../domain/errors';
import { formatIssue } from '../schemas';

export function sendInvalidInput(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: 'invalid_request',
    detail: formatIssue(error),
  });
}

export function sendError(reply: FastifyReply, log: FastifyBaseLogger, error: unknown) {
  if (isCalendarError(error) && error.code !== 'internal_error') {
    return reply.status(error.statusCode).send({
      error: error.code,
      detail: error.message,
    });
  }

  log.error(error);
  return reply.status(500).send({
    error: 'internal_error',
    detail: 'An unexpected error occurred',
  });
}
