import type { FastifyReply } from 'fastify';
import type { ZodError } from 'zod';

import { ValidationError, type AppError } from '@leadflow/core';
import { isOk, type Result } from '@leadflow/application';

export function sendError(reply: FastifyReply, error: AppError, correlationId: string): FastifyReply {
  const safe = error.toSafeError();
  return reply.status(safe.statusCode).send({ code: safe.code, message: safe.message, correlationId });
}

export function sendInvalid(
  reply: FastifyReply,
  error: ZodError,
  correlationId: string,
  message = 'Invalid request'
): FastifyReply {
  const validation = new ValidationError(message, error.flatten().fieldErrors);
  return reply.status(400).send({
    code: validation.code,
    message: validation.message,
    details: validation.details,
    correlationId,
  });
}

/**
 * Map a use-case result onto the reply, putting the value under `key`
 */
export function sendResult<T>(
  reply: FastifyReply,
  result: Result<T, AppError>,
  correlationId: string,
  key: string,
  successStatus = 200
): FastifyReply {
  if (!isOk(result)) {
    return sendError(reply, result.error, correlationId);
  }
  return reply.status(successStatus).send({ [key]: result.value, correlationId });
}
