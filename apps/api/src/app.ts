import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';

import type { ILeadWorkflowUseCase } from '@leadflow/application';
import { createLogger, toSafeErrorResponse } from '@leadflow/core';

import correlationPlugin, { CORRELATION_HEADER } from './plugins/correlation.js';
import { createApprovalRoutes, createLeadRoutes, createReportRoutes, healthRoutes } from './routes/index.js';

/**
 * Leadflow API
 *
 * Operator surface of the workflow: lead intake, the approval inbox, status
 * lookups and stage reports. Advancing leads is the scheduler's job, not a
 * request's.
 */

const logger = createLogger({ name: 'api' });

export interface BuildAppOptions {
  useCase: ILeadWorkflowUseCase;
  logger?: FastifyServerOptions['logger'];
  bodyLimit?: number;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? false,
    bodyLimit: options.bodyLimit ?? 1024 * 1024,
    requestIdHeader: CORRELATION_HEADER,
  });

  await fastify.register(correlationPlugin);

  await fastify.register(healthRoutes);
  await fastify.register(createLeadRoutes(options.useCase));
  await fastify.register(createApprovalRoutes(options.useCase));
  await fastify.register(createReportRoutes(options.useCase));

  fastify.setErrorHandler((error, request, reply) => {
    const { correlationId } = request;

    // Malformed JSON bodies and oversized payloads arrive here with a 4xx status
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        code: error.code,
        message: error.message,
        correlationId,
      });
    }

    logger.error({ correlationId, err: error }, 'Unhandled error');
    const safe = toSafeErrorResponse(error);
    return reply.status(safe.statusCode).send({
      code: safe.code,
      message: safe.message,
      correlationId,
    });
  });

  fastify.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      code: 'NOT_FOUND',
      message: 'Route not found',
      correlationId: request.correlationId,
    });
  });

  return fastify;
}
