/**
 * Lead API Routes
 *
 * ENDPOINTS:
 * - POST   /leads                                  - Register a discovered lead
 * - GET    /leads?stage=                           - Leads in one stage
 * - GET    /leads/:leadId/status                   - Stage, retries, last error, pending action
 * - POST   /leads/:leadId/approvals/:gate/resolve  - Resolve the lead's pending approval
 * - POST   /leads/:leadId/transcript               - Attach a call transcript
 * - POST   /leads/:leadId/abandon                  - Force ABANDONED
 * - POST   /leads/:leadId/reset                    - Return a halted lead to its last stage
 * - DELETE /leads/:leadId                          - Archive
 */

import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';

import { isOk, type ILeadWorkflowUseCase } from '@leadflow/application';
import { ApprovalGateSchema, ResolveApprovalInputSchema, StageSchema } from '@leadflow/types';

import { sendError, sendInvalid, sendResult } from './respond.js';

const LeadParamSchema = z.object({
  leadId: z.string().min(1).max(255),
});

const GateParamSchema = LeadParamSchema.extend({
  gate: ApprovalGateSchema,
});

const StageQuerySchema = z.object({
  stage: StageSchema,
});

const AbandonBodySchema = z.object({
  reason: z.string().min(1).max(500).optional(),
});

const TranscriptBodySchema = z.object({
  transcriptRef: z.string().min(1).max(2000),
});

export function createLeadRoutes(useCase: ILeadWorkflowUseCase): FastifyPluginAsync {
  const leadRoutes: FastifyPluginAsync = async (fastify) => {
    fastify.post('/leads', async (request, reply) => {
      const { correlationId } = request;
      return sendResult(reply, await useCase.discoverLead(request.body), correlationId, 'lead', 201);
    });

    fastify.get('/leads', async (request, reply) => {
      const { correlationId } = request;
      const query = StageQuerySchema.safeParse(request.query);
      if (!query.success) {
        return sendInvalid(reply, query.error, correlationId, 'Query parameter stage is required');
      }
      return sendResult(reply, await useCase.listByStage(query.data.stage), correlationId, 'leads');
    });

    fastify.get('/leads/:leadId/status', async (request, reply) => {
      const { correlationId } = request;
      const params = LeadParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }
      return sendResult(reply, await useCase.getStatus(params.data.leadId), correlationId, 'status');
    });

    fastify.post('/leads/:leadId/approvals/:gate/resolve', async (request, reply) => {
      const { correlationId } = request;
      const params = GateParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }
      const body = ResolveApprovalInputSchema.safeParse(request.body ?? {});
      if (!body.success) {
        return sendInvalid(reply, body.error, correlationId, 'Invalid approval decision');
      }

      const result = await useCase.resolveLeadApproval(params.data.leadId, params.data.gate, body.data);
      return sendResult(reply, result, correlationId, 'approval');
    });

    fastify.post('/leads/:leadId/transcript', async (request, reply) => {
      const { correlationId } = request;
      const params = LeadParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }
      const body = TranscriptBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        return sendInvalid(reply, body.error, correlationId);
      }

      const result = await useCase.attachTranscript(params.data.leadId, body.data.transcriptRef);
      return sendResult(reply, result, correlationId, 'status');
    });

    fastify.post('/leads/:leadId/abandon', async (request, reply) => {
      const { correlationId } = request;
      const params = LeadParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }
      const body = AbandonBodySchema.safeParse(request.body ?? {});
      if (!body.success) {
        return sendInvalid(reply, body.error, correlationId);
      }

      const result = await useCase.abandonLead(params.data.leadId, body.data.reason);
      return sendResult(reply, result, correlationId, 'status');
    });

    fastify.post('/leads/:leadId/reset', async (request, reply) => {
      const { correlationId } = request;
      const params = LeadParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }
      return sendResult(reply, await useCase.resetLead(params.data.leadId), correlationId, 'status');
    });

    fastify.delete('/leads/:leadId', async (request, reply) => {
      const { correlationId } = request;
      const params = LeadParamSchema.safeParse(request.params);
      if (!params.success) {
        return sendInvalid(reply, params.error, correlationId);
      }

      const result = await useCase.archiveLead(params.data.leadId);
      if (!isOk(result)) {
        return sendError(reply, result.error, correlationId);
      }
      return reply.status(204).send();
    });
  };

  return leadRoutes;
}
