/**
 * @fileoverview In-Memory Approval Repository (Infrastructure Layer)
 *
 * @module @leadflow/infrastructure/repositories/in-memory-approval-repository
 */

import type { ApprovalRepository, ApprovalResolution } from '@leadflow/domain';
import type { ApprovalRequest } from '@leadflow/types';

export class InMemoryApprovalRepository implements ApprovalRepository {
  private requests = new Map<string, ApprovalRequest>();

  findByToken(token: string): Promise<ApprovalRequest | null> {
    const request = this.requests.get(token);
    return Promise.resolve(request ? structuredClone(request) : null);
  }

  insertIfAbsent(request: ApprovalRequest): Promise<{ request: ApprovalRequest; wasCreated: boolean }> {
    const existing = this.requests.get(request.token);
    if (existing) {
      return Promise.resolve({ request: structuredClone(existing), wasCreated: false });
    }
    this.requests.set(request.token, structuredClone(request));
    return Promise.resolve({ request: structuredClone(request), wasCreated: true });
  }

  resolvePending(token: string, resolution: ApprovalResolution): Promise<ApprovalRequest | null> {
    const existing = this.requests.get(token);
    if (!existing || existing.status !== 'PENDING') {
      return Promise.resolve(null);
    }
    const resolved: ApprovalRequest = { ...existing, ...resolution };
    this.requests.set(token, resolved);
    return Promise.resolve(structuredClone(resolved));
  }

  listPending(): Promise<ApprovalRequest[]> {
    return Promise.resolve(this.filter((r) => r.status === 'PENDING'));
  }

  listByLead(leadId: string): Promise<ApprovalRequest[]> {
    return Promise.resolve(this.filter((r) => r.leadId === leadId));
  }

  clear(): void {
    this.requests.clear();
  }

  private filter(predicate: (request: ApprovalRequest) => boolean): ApprovalRequest[] {
    return [...this.requests.values()]
      .filter(predicate)
      .sort((a, b) => a.requestedAt.localeCompare(b.requestedAt))
      .map((r) => structuredClone(r));
  }
}

export function createInMemoryApprovalRepository(): InMemoryApprovalRepository {
  return new InMemoryApprovalRepository();
}
