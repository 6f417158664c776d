/**
 * @fileoverview LeadWorkflowService
 *
 * Implements the LeadWorkflowUseCase primary port on top of the orchestrator
 * and the approval gate.
 *
 * @module application/use-cases/workflow/LeadWorkflowService
 */

import { NotFoundError, ValidationError, createLogger, type AppError, type Logger } from '@leadflow/core';
import type { ApprovalGate } from '@leadflow/domain';
import {
  ResolveApprovalInputSchema,
  type ApprovalGate as Gate,
  type ApprovalRequest,
  type ResolveApprovalInput,
  type Stage,
} from '@leadflow/types';

import {
  toLeadStatus,
  type ILeadWorkflowUseCase,
  type LeadStatus,
  type StageCountsReport,
} from '../../ports/primary/LeadWorkflowUseCase.js';
import { tryCatch, type Result } from '../../shared/Result.js';
import type { WorkflowOrchestrator } from './WorkflowOrchestrator.js';

export interface LeadWorkflowServiceOptions {
  orchestrator: WorkflowOrchestrator;
  approvals: ApprovalGate;
  logger?: Logger;
}

export class LeadWorkflowService implements ILeadWorkflowUseCase {
  private readonly orchestrator: WorkflowOrchestrator;
  private readonly approvals: ApprovalGate;
  private readonly logger: Logger;

  constructor(options: LeadWorkflowServiceOptions) {
    this.orchestrator = options.orchestrator;
    this.approvals = options.approvals;
    this.logger = options.logger ?? createLogger({ name: 'lead-workflow-service' });
  }

  discoverLead(input: unknown): Promise<Result<LeadStatus, AppError>> {
    return this.run('discoverLead', async () => toLeadStatus(await this.orchestrator.discover(input)));
  }

  listPendingApprovals(): Promise<Result<ApprovalRequest[], AppError>> {
    return this.run('listPendingApprovals', () => this.approvals.listPending());
  }

  resolveApproval(token: string, input: ResolveApprovalInput): Promise<Result<ApprovalRequest, AppError>> {
    return this.run('resolveApproval', () => {
      const decision = parseDecision(input);
      return this.approvals.resolve(token, decision.approved, decision);
    });
  }

  resolveLeadApproval(
    leadId: string,
    gate: Gate,
    input: ResolveApprovalInput
  ): Promise<Result<ApprovalRequest, AppError>> {
    return this.run('resolveLeadApproval', async () => {
      const decision = parseDecision(input);
      const record = await this.orchestrator.get(leadId);
      // Only the request of the current stage instance can still move the lead
      const pending = await this.approvals.findPending(leadId, gate, record.resets);
      if (pending === null) {
        throw new NotFoundError(`Pending ${gate} approval for lead ${leadId}`);
      }
      return this.approvals.resolve(pending.token, decision.approved, decision);
    });
  }

  getStatus(leadId: string): Promise<Result<LeadStatus, AppError>> {
    return this.run('getStatus', async () => toLeadStatus(await this.orchestrator.get(leadId)));
  }

  listByStage(stage: Stage): Promise<Result<LeadStatus[], AppError>> {
    return this.run('listByStage', async () =>
      (await this.orchestrator.listByStage(stage)).map(toLeadStatus)
    );
  }

  stageCounts(): Promise<Result<StageCountsReport, AppError>> {
    return this.run('stageCounts', () => this.orchestrator.stageCounts());
  }

  attachTranscript(leadId: string, transcriptRef: string): Promise<Result<LeadStatus, AppError>> {
    return this.run('attachTranscript', async () =>
      toLeadStatus((await this.orchestrator.attachTranscript(leadId, transcriptRef)).record)
    );
  }

  abandonLead(leadId: string, reason?: string): Promise<Result<LeadStatus, AppError>> {
    return this.run('abandonLead', async () =>
      toLeadStatus((await this.orchestrator.abandon(leadId, reason)).record)
    );
  }

  resetLead(leadId: string): Promise<Result<LeadStatus, AppError>> {
    return this.run('resetLead', async () => toLeadStatus((await this.orchestrator.reset(leadId)).record));
  }

  archiveLead(leadId: string): Promise<Result<void, AppError>> {
    return this.run('archiveLead', () => this.orchestrator.archive(leadId));
  }

  private run<T>(operation: string, fn: () => Promise<T>): Promise<Result<T, AppError>> {
    return tryCatch(fn, (error) => {
      this.logger.error({ err: error, operation }, 'Unexpected error in use case');
    });
  }
}

function parseDecision(input: ResolveApprovalInput): ResolveApprovalInput {
  const parsed = ResolveApprovalInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid approval decision', parsed.error.flatten().fieldErrors);
  }
  return parsed.data;
}

export function createLeadWorkflowService(options: LeadWorkflowServiceOptions): LeadWorkflowService {
  return new LeadWorkflowService(options);
}
