/**
 * Approval Gate
 *
 * Records human decisions on the SEND and SCHEDULE checkpoints. The gate only
 * stores and reports decisions; the orchestrator decides what they mean for
 * the lead.
 *
 * @module @leadflow/domain/approvals/approval-gate
 */

import { randomUUID } from 'node:crypto';

import {
  ConflictError,
  IdempotencyKeys,
  NotFoundError,
  ValidationError,
  createLogger,
  type Logger,
} from '@leadflow/core';
import {
  gateForStage,
  type ApprovalGate as Gate,
  type ApprovalRequest,
  type ApprovalStatus,
  type Stage,
} from '@leadflow/types';

import type { ApprovalRepository } from './approval-repository.js';

export type ApprovalEventType = 'approval.requested' | 'approval.resolved' | 'approval.superseded';

export interface ApprovalEvent {
  type: ApprovalEventType;
  payload: ApprovalRequest;
  metadata: {
    eventId: string;
    occurredAt: string;
    /** Lead id, matching the `leadId` field of the workflow's log entries */
    correlationId: string;
  };
}

/**
 * Outbound hook for approval traffic (chat message, dashboard push, mail)
 */
export interface ApprovalNotifier {
  notify(event: ApprovalEvent): Promise<void>;
}

export interface ApprovalGateOptions {
  repository: ApprovalRepository;
  notifier?: ApprovalNotifier;
  clock?: () => Date;
  logger?: Logger;
}

export interface ResolveOptions {
  resolvedBy?: string;
  note?: string;
}

export class ApprovalGate {
  private readonly repository: ApprovalRepository;
  private readonly notifier: ApprovalNotifier | undefined;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: ApprovalGateOptions) {
    this.repository = options.repository;
    this.notifier = options.notifier;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'approval-gate' });
  }

  /**
   * Register a request for the gate guarding `stage`.
   *
   * Idempotent per lead, gate and stage instance: asking again returns the
   * token of the existing request, whatever its status.
   */
  async requestApproval(
    leadId: string,
    stage: Stage,
    payload: Record<string, unknown>,
    instance = 0
  ): Promise<string> {
    const gate = gateForStage(stage);
    if (gate === null) {
      throw new ValidationError(`Stage ${stage} has no approval gate`);
    }

    const token = IdempotencyKeys.approval(leadId, gate, instance);
    const { request, wasCreated } = await this.repository.insertIfAbsent({
      token,
      leadId,
      gate,
      stage,
      instance,
      payload,
      status: 'PENDING',
      requestedAt: this.clock().toISOString(),
      resolvedAt: null,
      resolvedBy: null,
      note: null,
    });

    if (wasCreated) {
      this.logger.info({ leadId, gate, instance }, 'Approval requested');
      await this.publish('approval.requested', request);
    }
    return request.token;
  }

  /**
   * @throws NotFoundError for an unknown token
   * @throws ConflictError when the token was already resolved
   */
  async resolve(token: string, approved: boolean, options: ResolveOptions = {}): Promise<ApprovalRequest> {
    const resolved = await this.repository.resolvePending(token, {
      status: approved ? 'APPROVED' : 'REJECTED',
      resolvedAt: this.clock().toISOString(),
      resolvedBy: options.resolvedBy ?? null,
      note: options.note ?? null,
    });

    if (resolved === null) {
      const existing = await this.repository.findByToken(token);
      if (existing === null) {
        throw new NotFoundError(`Approval request ${token}`);
      }
      throw new ConflictError('ApprovalRequest', token);
    }

    this.logger.info(
      { leadId: resolved.leadId, gate: resolved.gate, status: resolved.status },
      'Approval resolved'
    );
    await this.publish('approval.resolved', resolved);
    return resolved;
  }

  /**
   * @throws NotFoundError for an unknown token
   */
  async status(token: string): Promise<ApprovalStatus> {
    const request = await this.get(token);
    return request.status;
  }

  async get(token: string): Promise<ApprovalRequest> {
    const request = await this.repository.findByToken(token);
    if (request === null) {
      throw new NotFoundError(`Approval request ${token}`);
    }
    return request;
  }

  /**
   * Retire a request whose lead left the gate without a decision.
   * Returns false when the request was already settled.
   */
  async supersede(token: string): Promise<boolean> {
    const superseded = await this.repository.resolvePending(token, {
      status: 'SUPERSEDED',
      resolvedAt: this.clock().toISOString(),
      resolvedBy: null,
      note: null,
    });
    if (superseded === null) return false;

    this.logger.info({ leadId: superseded.leadId, gate: superseded.gate }, 'Approval superseded');
    await this.publish('approval.superseded', superseded);
    return true;
  }

  listPending(): Promise<ApprovalRequest[]> {
    return this.repository.listPending();
  }

  /**
   * The PENDING request of one stage instance of a lead, if any
   */
  async findPending(leadId: string, gate: Gate, instance: number): Promise<ApprovalRequest | null> {
    const requests = await this.repository.listByLead(leadId);
    return requests.find((r) => r.gate === gate && r.instance === instance && r.status === 'PENDING') ?? null;
  }

  private async publish(type: ApprovalEventType, request: ApprovalRequest): Promise<void> {
    if (!this.notifier) return;

    const event: ApprovalEvent = {
      type,
      payload: request,
      metadata: { eventId: randomUUID(), occurredAt: this.clock().toISOString(), correlationId: request.leadId },
    };
    try {
      await this.notifier.notify(event);
    } catch (error) {
      // Delivery is best effort; the decision is already stored
      this.logger.warn({ err: error, leadId: request.leadId, type }, 'Approval notification failed');
    }
  }
}

export function createApprovalGate(options: ApprovalGateOptions): ApprovalGate {
  return new ApprovalGate(options);
}
