/**
 * Approval API Routes
 *
 * ENDPOINTS:
 * - GET  /approvals                 - Pending approval requests
 * - POST /approvals/:token/resolve  - Approve or reject a request by token
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import type { ILeadWorkflowUseCase } from '@leadflow/application';
import { ResolveApprovalInputSchema } from '@leadflow/types';

import { sendInvalid, sendResult } from './respond.js';

const TokenParamSchema = z.object({
  token: z.string().min(1).max(255),
});

export function createApprovalRoutes(useCase: ILeadWorkflowUseCase): FastifyPluginAsync {
  const approvalRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.get('/approvals', async (request, reply) => {
      const { correlationId } = request;
      return sendResult(reply, await useCase.listPendingApprovals(), correlationId, 'approvals');
    });

    fastify.post('/approvals/:token/resolve', async (request, reply) => {
      const { correlationId } = request;
      const params = TokenParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId, 'Invalid approval token');
      }
      const body = ResolveApprovalInputSchema.safeParse(request.body ?? {});
      if (!body.success) {
        return sendInvalid(reply, body.error, correlationId, 'Invalid approval decision');
      }

      const result = await useCase.resolveApproval(params.data.token, body.data);
      return sendResult(reply, result, correlationId, 'approval');
    });
  };

  return approvalRoutes;
}
