/**
 * @fileoverview Primary Port - LeadWorkflowUseCase
 *
 * What the application offers to driving adapters (REST API, CLI): lead
 * intake, the approval surface, reporting queries and operator overrides.
 * Pipeline progress itself is driven by the WorkflowScheduler.
 *
 * @module application/ports/primary/LeadWorkflowUseCase
 */

import type { AppError } from '@leadflow/core';
import type {
  ApprovalGate,
  ApprovalRequest,
  LastError,
  LeadRecord,
  PendingAction,
  ResolveApprovalInput,
  Stage,
  StageCounter,
} from '@leadflow/types';

import type { Result } from '../../shared/Result.js';

/**
 * Reporting view of a lead. Carries no contact details.
 */
export interface LeadStatus {
  readonly leadId: string;
  readonly stage: Stage;
  readonly intentScore: number | null;
  readonly retryCounts: StageCounter;
  readonly lastError: LastError | null;
  readonly pendingAction: PendingAction;
  /** ISO 8601; set while a retry backoff holds the lead */
  readonly retryNotBefore: string | null;
  readonly haltedAt: Stage | null;
  readonly resets: number;
  readonly version: number;
  readonly updatedAt: string;
}

export type StageCountsReport = Readonly<Record<Stage, number>>;

export interface ILeadWorkflowUseCase {
  /**
   * Register a discovered lead
   */
  discoverLead(input: unknown): Promise<Result<LeadStatus, AppError>>;

  listPendingApprovals(): Promise<Result<ApprovalRequest[], AppError>>;

  /**
   * Resolve an approval request by its token
   */
  resolveApproval(token: string, input: ResolveApprovalInput): Promise<Result<ApprovalRequest, AppError>>;

  /**
   * Resolve the pending request of a lead at one gate
   */
  resolveLeadApproval(
    leadId: string,
    gate: ApprovalGate,
    input: ResolveApprovalInput
  ): Promise<Result<ApprovalRequest, AppError>>;

  getStatus(leadId: string): Promise<Result<LeadStatus, AppError>>;

  listByStage(stage: Stage): Promise<Result<LeadStatus[], AppError>>;

  stageCounts(): Promise<Result<StageCountsReport, AppError>>;

  attachTranscript(leadId: string, transcriptRef: string): Promise<Result<LeadStatus, AppError>>;

  abandonLead(leadId: string, reason?: string): Promise<Result<LeadStatus, AppError>>;

  resetLead(leadId: string): Promise<Result<LeadStatus, AppError>>;

  archiveLead(leadId: string): Promise<Result<void, AppError>>;
}

export function toLeadStatus(record: LeadRecord): LeadStatus {
  return {
    leadId: record.id,
    stage: record.stage,
    intentScore: record.intentScore,
    retryCounts: record.retryCounts,
    lastError: record.lastError,
    pendingAction: record.run.pendingAction,
    retryNotBefore: record.run.retryNotBefore,
    haltedAt: record.haltedAt,
    resets: record.resets,
    version: record.version,
    updatedAt: record.updatedAt,
  };
}
