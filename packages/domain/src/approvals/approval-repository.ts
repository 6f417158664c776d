/**
 * Approval Repository Interface (Port)
 *
 * Available Adapters (in @leadflow/infrastructure):
 * - InMemoryApprovalRepository
 * - PostgresApprovalRepository
 *
 * @module @leadflow/domain/approvals/approval-repository
 */

import type { ApprovalRequest, ApprovalStatus } from '@leadflow/types';

export interface ApprovalResolution {
  status: Exclude<ApprovalStatus, 'PENDING'>;
  resolvedAt: string;
  resolvedBy: string | null;
  note: string | null;
}

export interface ApprovalRepository {
  findByToken(token: string): Promise<ApprovalRequest | null>;

  /**
   * Insert a request, or return the stored one when the token already exists
   */
  insertIfAbsent(request: ApprovalRequest): Promise<{ request: ApprovalRequest; wasCreated: boolean }>;

  /**
   * Resolve a PENDING request. Returns null when the request is missing or
   * was already resolved; the stored request is never overwritten.
   */
  resolvePending(token: string, resolution: ApprovalResolution): Promise<ApprovalRequest | null>;

  listPending(): Promise<ApprovalRequest[]>;

  listByLead(leadId: string): Promise<ApprovalRequest[]>;
}
