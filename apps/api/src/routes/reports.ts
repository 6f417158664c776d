/**
 * Reporting API Routes
 *
 * ENDPOINTS:
 * - GET /reports/stage-counts - Number of active leads per stage
 */

import type { FastifyPluginAsync } from 'fastify';

import type { ILeadWorkflowUseCase } from '@leadflow/application';

import { sendResult } from './respond.js';

export function createReportRoutes(useCase: ILeadWorkflowUseCase): FastifyPluginAsync {
  const reportRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.get('/reports/stage-counts', async (request, reply) => {
      const { correlationId } = request;
      return sendResult(reply, await useCase.stageCounts(), correlationId, 'counts');
    });
  };

  return reportRoutes;
}
