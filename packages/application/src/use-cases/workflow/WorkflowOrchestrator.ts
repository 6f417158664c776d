/**
 * @fileoverview Workflow Orchestrator
 *
 * Drives one lead at a time through the pipeline. Every step follows the same
 * shape: read the record, decide the eligible transition, make at most one
 * port call, then write the result with an optimistic save. A save that loses
 * a race is thrown away and the step is re-evaluated from a fresh read.
 *
 * Side-effecting calls carry an idempotency token derived from the lead, the
 * target stage and that stage's attempt counter. Re-running a step after a
 * lost save hands the port the same token, so the effect happens once.
 *
 * @module application/use-cases/workflow/WorkflowOrchestrator
 */

import {
  ApprovalRejectedError,
  ConflictError,
  IdempotencyKeys,
  NotFoundError,
  ServiceError,
  ValidationError,
  createLogger,
  withTimeout,
  type Logger,
  type RetryBudgetKey,
  type WorkflowConfig,
} from '@leadflow/core';
import {
  AUTONOMOUS_STAGES,
  counterValue,
  createLeadRecord,
  haltLead,
  isAnalyticsEligible,
  isBackingOff,
  isMeaningfulReply,
  isRetryBudgetSpent,
  recordFailure,
  resetLead,
  selectShortlist,
  touchLead,
  transitionLead,
  type ApprovalGate,
  type LeadPatch,
  type LeadRecordStore,
  type StageCounts,
} from '@leadflow/domain';
import {
  AnalyticsSummarySchema,
  DiscoverLeadInputSchema,
  DraftSchema,
  GATE_STAGE,
  IsoTimestampSchema,
  UnitScoreSchema,
  isTerminalStage,
  type AnalyticsSummary,
  type ApprovalGate as Gate,
  type Draft,
  type LeadRecord,
  type Reply,
  type Stage,
} from '@leadflow/types';

import type { AnalyticsPort } from '../../ports/secondary/external/AnalyticsPort.js';
import type { OutreachPort, SendOutcome } from '../../ports/secondary/external/OutreachPort.js';
import type { ReplyReading, SchedulingPort } from '../../ports/secondary/external/SchedulingPort.js';
import type { ScoringPort } from '../../ports/secondary/external/ScoringPort.js';

// =============================================================================
// Types
// =============================================================================

export interface WorkflowPorts {
  scoring: ScoringPort;
  outreach: OutreachPort;
  scheduling: SchedulingPort;
  analytics: AnalyticsPort;
}

export interface WorkflowOrchestratorOptions {
  store: LeadRecordStore;
  approvals: ApprovalGate;
  ports: WorkflowPorts;
  config: WorkflowConfig;
  clock?: () => Date;
  logger?: Logger;
}

export interface StepResult {
  leadId: string;
  from: Stage;
  to: Stage;
  changed: boolean;
  record: LeadRecord;
}

export type ShortlistStatus = 'waiting_for_scoring' | 'idle' | 'applied' | 'conflict';

export interface ShortlistOutcome {
  status: ShortlistStatus;
  selected: string[];
  passedOver: string[];
}

export interface ReplyPollSummary {
  received: number;
  screenedOut: number;
  ignored: number;
  conflicts: number;
}

type GateDecision =
  | { decision: 'approved' }
  | { decision: 'rejected' }
  | { decision: 'pending'; record: LeadRecord | null };

/** Stage whose counters key the retry budget of each port call */
const BUDGET_STAGE = {
  scoring: 'SCORED',
  drafting: 'DRAFTED',
  sending: 'SENT',
  followUp: 'AWAITING_REPLY',
  slotExtraction: 'AWAITING_SCHEDULE_APPROVAL',
  booking: 'SCHEDULED',
  analytics: 'ANALYZED',
} as const satisfies Record<RetryBudgetKey, Stage>;

// =============================================================================
// Orchestrator
// =============================================================================

export class WorkflowOrchestrator {
  private readonly store: LeadRecordStore;
  private readonly approvals: ApprovalGate;
  private readonly ports: WorkflowPorts;
  private readonly config: WorkflowConfig;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(options: WorkflowOrchestratorOptions) {
    this.store = options.store;
    this.approvals = options.approvals;
    this.ports = options.ports;
    this.config = options.config;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'workflow-orchestrator' });
  }

  // ===========================================================================
  // Lifecycle operations
  // ===========================================================================

  /**
   * Register a newly discovered lead at DISCOVERED
   *
   * @throws ValidationError for a malformed profile
   * @throws ConflictError when the id is taken
   */
  async discover(input: unknown): Promise<LeadRecord> {
    const parsed = DiscoverLeadInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Invalid lead input', parsed.error.flatten().fieldErrors);
    }

    const record = await this.store.create(createLeadRecord(parsed.data, this.clock()));
    this.logger.info({ leadId: record.id, version: record.version }, 'Lead discovered');
    return record;
  }

  async get(leadId: string): Promise<LeadRecord> {
    const record = await this.store.get(leadId);
    if (record === null) {
      throw new NotFoundError(`Lead ${leadId}`);
    }
    return record;
  }

  /**
   * Take the next eligible transition for one lead, if any
   */
  advance(leadId: string): Promise<StepResult> {
    return this.mutate(leadId, (record, now) => this.step(record, now));
  }

  /**
   * Attach a call transcript; analytics runs on a later advance
   */
  attachTranscript(leadId: string, transcriptRef: string): Promise<StepResult> {
    const ref = transcriptRef.trim();
    if (ref === '') {
      return Promise.reject(new ValidationError('Transcript reference must not be empty'));
    }

    return this.mutate(leadId, (record, now) =>
      Promise.resolve(record.transcriptRef === ref ? null : touchLead(record, { transcriptRef: ref }, now))
    );
  }

  /**
   * Force ABANDONED from any non-terminal stage
   */
  abandon(leadId: string, reason = 'Abandoned by operator'): Promise<StepResult> {
    return this.mutate(leadId, (record, now) =>
      Promise.resolve(
        haltLead(record, 'ABANDONED', { kind: 'MANUAL_ABANDON', code: 'MANUAL_ABANDON', message: reason }, now)
      )
    );
  }

  /**
   * Return a FAILED or ABANDONED lead to the stage it stopped in
   */
  reset(leadId: string): Promise<StepResult> {
    return this.mutate(leadId, (record, now) => Promise.resolve(resetLead(record, now)));
  }

  async archive(leadId: string): Promise<void> {
    const removed = await this.store.archive(leadId);
    if (!removed) {
      throw new NotFoundError(`Lead ${leadId}`);
    }
    this.logger.info({ leadId }, 'Lead archived');
  }

  // ===========================================================================
  // Batch operations
  // ===========================================================================

  /**
   * Promote the top SCORED leads to SHORTLISTED in one atomic write.
   *
   * Runs only when some SCORED lead has not been through a batch yet, and,
   * unless configured otherwise, once no lead is left in DISCOVERED.
   */
  async shortlistBatch(): Promise<ShortlistOutcome> {
    const rule = this.config.shortlist;

    if (rule.waitForScoring) {
      const counts = await this.store.countByStage();
      if (counts.DISCOVERED > 0) {
        return { status: 'waiting_for_scoring', selected: [], passedOver: [] };
      }
    }

    const scored = await this.store.listByStage('SCORED');
    if (!scored.some((lead) => lead.run.passedOverAt === null)) {
      return { status: 'idle', selected: [], passedOver: [] };
    }

    const now = this.clock();
    const { selected, unselected } = selectShortlist(scored, rule);
    const updates: LeadRecord[] = selected.map((lead) => transitionLead(lead, 'SHORTLISTED', {}, { now }));

    for (const lead of unselected) {
      if (rule.unselected === 'abandon') {
        updates.push(
          haltLead(
            lead,
            'ABANDONED',
            { kind: 'NOT_SHORTLISTED', code: 'NOT_SHORTLISTED', message: 'Not selected for outreach' },
            now
          )
        );
      } else if (lead.run.passedOverAt === null) {
        updates.push(touchLead(lead, {}, now, { passedOverAt: now.toISOString() }));
      }
    }

    try {
      await this.store.saveAll(updates);
    } catch (error) {
      if (error instanceof ConflictError) {
        this.logger.warn({ recordId: error.recordId }, 'Shortlist batch lost a race, retrying next tick');
        return { status: 'conflict', selected: [], passedOver: [] };
      }
      throw error;
    }

    const outcome: ShortlistOutcome = {
      status: 'applied',
      selected: selected.map((lead) => lead.id),
      passedOver: unselected.map((lead) => lead.id),
    };
    this.logger.info(
      { selected: outcome.selected.length, passedOver: outcome.passedOver.length, unselected: rule.unselected },
      'Shortlist batch applied'
    );
    return outcome;
  }

  /**
   * Drain the inbox once and move leads with a real reply to REPLY_RECEIVED.
   * Screened-out replies only advance the lead's cursor.
   */
  async pollReplies(): Promise<ReplyPollSummary> {
    const summary: ReplyPollSummary = { received: 0, screenedOut: 0, ignored: 0, conflicts: 0 };
    const waiting = await this.store.listByStage('AWAITING_REPLY');
    if (waiting.length === 0) return summary;

    const byLead = new Map(waiting.map((lead) => [lead.id, lead]));
    const since = new Date(Math.min(...waiting.map((lead) => Date.parse(waitingSince(lead))))).toISOString();
    const timeoutMs = this.config.port.timeoutMs;
    const iterator = this.ports.outreach.pollReplies(since)[Symbol.asyncIterator]();

    for (;;) {
      const next = await withTimeout('outreach', timeoutMs, () => iterator.next());
      if (next.done === true) break;

      const reply = next.value;
      const lead = byLead.get(reply.leadId);
      if (lead === undefined) {
        summary.ignored++;
        continue;
      }
      // Older than this lead's current wait: answers an earlier message
      if (Date.parse(reply.receivedAt) < Date.parse(waitingSince(lead))) continue;
      const seen = lead.run.pendingAction.type === 'reply' ? lead.run.pendingAction.cursor : null;
      if (seen !== null && reply.cursor <= seen) continue;

      const now = this.clock();
      const meaningful = isMeaningfulReply(reply.replyText);
      const updated = meaningful
        ? transitionLead(
            lead,
            'REPLY_RECEIVED',
            { reply: { text: reply.replyText, receivedAt: reply.receivedAt, cursor: reply.cursor } },
            { now }
          )
        : touchLead(lead, {}, now, {
            pendingAction: { type: 'reply', cursor: reply.cursor, waitingSince: waitingSince(lead) },
          });

      try {
        const saved = await this.store.save(updated);
        this.logTransition(lead, saved);
        if (meaningful) {
          summary.received++;
          byLead.delete(lead.id);
        } else {
          summary.screenedOut++;
          byLead.set(lead.id, saved);
        }
      } catch (error) {
        if (!(error instanceof ConflictError)) throw error;
        // Stale copy; the next poll re-reads the lead and sees this reply again
        summary.conflicts++;
        byLead.delete(lead.id);
      }
    }

    return summary;
  }

  /**
   * Abandon every AWAITING_REPLY lead whose wait exceeded `reply.maxWaitMs`
   */
  async sweepReplyTimeouts(): Promise<string[]> {
    const now = this.clock();
    const expired = (await this.store.listByStage('AWAITING_REPLY')).filter((lead) =>
      this.replyExpired(lead, now)
    );

    const abandoned: string[] = [];
    for (const lead of expired) {
      const result = await this.mutate(lead.id, (record, at) =>
        Promise.resolve(record.stage === 'AWAITING_REPLY' ? this.expireReplyWait(record, at) : null)
      );
      if (result.changed && result.to === 'ABANDONED') {
        abandoned.push(lead.id);
      }
    }
    return abandoned;
  }

  /**
   * Leads the scheduler should advance on this tick
   */
  async listRunnable(now: Date = this.clock()): Promise<LeadRecord[]> {
    const all = await this.store.listAll();
    return all.filter(
      (lead) =>
        !isBackingOff(lead, now) && (AUTONOMOUS_STAGES.has(lead.stage) || this.canAnalyze(lead))
    );
  }

  listByStage(stage: Stage): Promise<LeadRecord[]> {
    return this.store.listByStage(stage);
  }

  stageCounts(): Promise<StageCounts> {
    return this.store.countByStage();
  }

  // ===========================================================================
  // Transition engine
  // ===========================================================================

  private async mutate(
    leadId: string,
    step: (record: LeadRecord, now: Date) => Promise<LeadRecord | null>
  ): Promise<StepResult> {
    const maxRetries = this.config.orchestrator.maxConflictRetries;

    for (let attempt = 0; ; attempt++) {
      const current = await this.get(leadId);
      const next = await step(current, this.clock());
      if (next === null) {
        return { leadId, from: current.stage, to: current.stage, changed: false, record: current };
      }

      try {
        const saved = await this.store.save(next);
        this.logTransition(current, saved);
        await this.retireApproval(current, saved);
        return { leadId, from: current.stage, to: saved.stage, changed: true, record: saved };
      } catch (error) {
        if (!(error instanceof ConflictError) || attempt >= maxRetries) {
          throw error;
        }
        this.logger.debug({ leadId, attempt, version: current.version }, 'Save conflict, re-reading lead');
      }
    }
  }

  private step(record: LeadRecord, now: Date): Promise<LeadRecord | null> {
    if (isBackingOff(record, now)) return Promise.resolve(null);
    if (this.canAnalyze(record)) return this.analyze(record, now);

    switch (record.stage) {
      case 'DISCOVERED':
        return this.score(record, now);
      case 'SHORTLISTED':
        return this.draft(record, now);
      case 'DRAFTED':
        return this.requestSendApproval(record, now);
      case 'AWAITING_SEND_APPROVAL':
        return this.send(record, now);
      case 'SENT':
        return Promise.resolve(
          transitionLead(record, 'AWAITING_REPLY', {}, {
            now,
            pendingAction: { type: 'reply', cursor: null, waitingSince: record.sentAt ?? now.toISOString() },
          })
        );
      case 'AWAITING_REPLY':
        return Promise.resolve(this.expireReplyWait(record, now));
      case 'REPLY_RECEIVED':
        return this.proposeSlot(record, now);
      case 'AWAITING_SCHEDULE_APPROVAL':
        return this.book(record, now);
      default:
        return Promise.resolve(null);
    }
  }

  private async score(record: LeadRecord, now: Date): Promise<LeadRecord> {
    let score: number;
    try {
      score = await this.call('scoring', () => this.ports.scoring.score(record.contact));
      if (!UnitScoreSchema.safeParse(score).success) {
        throw new ServiceError('scoring', `score out of range: ${score}`);
      }
    } catch (error) {
      return this.fail(record, 'scoring', error, now);
    }
    return transitionLead(record, 'SCORED', { intentScore: score }, { now });
  }

  private async draft(record: LeadRecord, now: Date): Promise<LeadRecord> {
    if (record.draft !== null) {
      return transitionLead(record, 'DRAFTED', {}, { now });
    }

    let draft: Draft;
    try {
      const raw = await this.call('outreach', () => this.ports.outreach.draft(record.contact));
      const parsed = DraftSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ServiceError('outreach', 'draft is missing a subject or body');
      }
      draft = parsed.data;
    } catch (error) {
      return this.fail(record, 'drafting', error, now);
    }
    return transitionLead(record, 'DRAFTED', { draft }, { now });
  }

  private async requestSendApproval(record: LeadRecord, now: Date): Promise<LeadRecord> {
    if (record.draft === null) {
      return this.fail(record, 'drafting', new ValidationError('Lead has no draft to approve'), now);
    }

    const token = await this.approvals.requestApproval(
      record.id,
      GATE_STAGE.SEND,
      { subject: record.draft.subject, body: record.draft.body },
      record.resets
    );
    return transitionLead(record, 'AWAITING_SEND_APPROVAL', {}, {
      now,
      pendingAction: { type: 'approval', gate: 'SEND', token, requestedAt: now.toISOString() },
    });
  }

  private async send(record: LeadRecord, now: Date): Promise<LeadRecord | null> {
    const draft = record.draft;
    if (draft === null) {
      return this.fail(record, 'sending', new ValidationError('Lead has no draft to send'), now);
    }

    const gate = await this.checkGate(record, 'SEND', { subject: draft.subject, body: draft.body }, now);
    if (gate.decision === 'pending') return gate.record;
    if (gate.decision === 'rejected') return this.reject(record, 'SEND', now);

    const approvals = { ...record.approvals, SEND: true };
    const token = IdempotencyKeys.send(record.id, counterValue(record.attempts, 'SENT'));
    let outcome: SendOutcome;
    try {
      outcome = await this.call('outreach', () =>
        this.ports.outreach.send(
          record.id,
          { to: record.contact.contactEmail, subject: draft.subject, body: draft.body },
          token
        )
      );
    } catch (error) {
      return this.fail(record, 'sending', error, now, { approvals });
    }

    return transitionLead(
      record,
      'SENT',
      {
        approvals,
        sentAt: outcome.sentAt,
        sendReceipt: { messageId: outcome.messageId, idempotencyToken: token, sentAt: outcome.sentAt },
      },
      { now }
    );
  }

  private async proposeSlot(record: LeadRecord, now: Date): Promise<LeadRecord> {
    const reply = record.reply;
    if (reply === null) {
      return this.fail(record, 'slotExtraction', new ValidationError('Lead has no reply to schedule from'), now);
    }

    let reading: ReplyReading;
    try {
      reading = await this.call('scheduling', () => this.ports.scheduling.readReply(reply.text));
    } catch (error) {
      return this.fail(record, 'slotExtraction', error, now);
    }

    if (reading.intent === 'negative') {
      return haltLead(
        record,
        'ABANDONED',
        { kind: 'NOT_INTERESTED', code: 'NOT_INTERESTED', message: 'Reply declines a meeting' },
        now
      );
    }

    const slots = reading.slots.filter((slot) => IsoTimestampSchema.safeParse(slot).success);
    const [proposed] = slots;
    if (proposed === undefined) {
      if (reading.intent === 'positive' && record.followUps < this.config.reply.maxFollowUps) {
        return this.followUp(record, reply, now);
      }
      return haltLead(
        record,
        'ABANDONED',
        { kind: 'NO_CANDIDATE_SLOTS', code: 'NO_CANDIDATE_SLOTS', message: 'Reply names no meeting time' },
        now
      );
    }

    const token = await this.approvals.requestApproval(
      record.id,
      GATE_STAGE.SCHEDULE,
      { slot: proposed, candidateSlots: slots },
      record.resets
    );
    return transitionLead(
      record,
      'AWAITING_SCHEDULE_APPROVAL',
      { candidateSlots: slots, meetingSlot: proposed },
      { now, pendingAction: { type: 'approval', gate: 'SCHEDULE', token, requestedAt: now.toISOString() } }
    );
  }

  /**
   * Ask a willing lead for meeting times and go back to waiting for a reply
   */
  private async followUp(record: LeadRecord, reply: Reply, now: Date): Promise<LeadRecord> {
    const token = IdempotencyKeys.followUp(
      record.id,
      record.followUps,
      counterValue(record.attempts, BUDGET_STAGE.followUp)
    );
    const subject = record.draft === null ? 'Finding a time to talk' : `Re: ${record.draft.subject}`;

    let outcome: SendOutcome;
    try {
      outcome = await this.call('outreach', () =>
        this.ports.outreach.send(
          record.id,
          { to: record.contact.contactEmail, subject, body: this.config.reply.followUpBody },
          token
        )
      );
    } catch (error) {
      return this.fail(record, 'followUp', error, now);
    }

    return transitionLead(
      record,
      'AWAITING_REPLY',
      { followUps: record.followUps + 1 },
      { now, pendingAction: { type: 'reply', cursor: reply.cursor, waitingSince: outcome.sentAt } }
    );
  }

  private async book(record: LeadRecord, now: Date): Promise<LeadRecord | null> {
    const slot = record.meetingSlot;
    if (slot === null) {
      return this.fail(record, 'booking', new ValidationError('Lead has no proposed meeting slot'), now);
    }

    const gate = await this.checkGate(record, 'SCHEDULE', { slot, candidateSlots: record.candidateSlots }, now);
    if (gate.decision === 'pending') return gate.record;
    if (gate.decision === 'rejected') return this.reject(record, 'SCHEDULE', now);

    const approvals = { ...record.approvals, SCHEDULE: true };
    const token = IdempotencyKeys.book(record.id, counterValue(record.attempts, 'SCHEDULED'));
    let bookingId: string;
    let calendarLink: string | undefined;
    try {
      const outcome = await this.call('scheduling', () => this.ports.scheduling.book(record.id, slot, token));
      if (outcome.status === 'conflict') {
        throw new ServiceError('scheduling', outcome.reason ?? `slot ${slot} is no longer available`);
      }
      bookingId = outcome.bookingId;
      calendarLink = outcome.calendarLink;
    } catch (error) {
      return this.fail(record, 'booking', error, now, { approvals });
    }

    return transitionLead(
      record,
      'SCHEDULED',
      {
        approvals,
        bookingReceipt:
          calendarLink === undefined
            ? { bookingId, slot, idempotencyToken: token }
            : { bookingId, slot, idempotencyToken: token, calendarLink },
      },
      { now }
    );
  }

  private async analyze(record: LeadRecord, now: Date): Promise<LeadRecord | null> {
    const ref = record.transcriptRef;
    if (ref === null) return null;

    let summary: AnalyticsSummary;
    try {
      const raw = await this.call('analytics', () => this.ports.analytics.analyze(ref));
      const parsed = AnalyticsSummarySchema.safeParse(raw);
      if (!parsed.success) {
        throw new ServiceError('analytics', 'malformed transcript summary');
      }
      summary = parsed.data;
    } catch (error) {
      return this.fail(record, 'analytics', error, now);
    }
    return transitionLead(record, 'ANALYZED', { analyticsSummary: summary }, { now });
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  /**
   * Read the gate decision for the current stage instance, registering the
   * request first if the lead has none on record
   */
  private async checkGate(
    record: LeadRecord,
    gate: Gate,
    payload: Record<string, unknown>,
    now: Date
  ): Promise<GateDecision> {
    if (record.approvals[gate] === true) return { decision: 'approved' };

    const pending = record.run.pendingAction;
    let token: string;
    let touched: LeadRecord | null = null;
    if (pending.type === 'approval' && pending.gate === gate) {
      token = pending.token;
    } else {
      token = await this.approvals.requestApproval(record.id, GATE_STAGE[gate], payload, record.resets);
      touched = touchLead(record, {}, now, {
        pendingAction: { type: 'approval', gate, token, requestedAt: now.toISOString() },
      });
    }

    const status = await this.approvals.status(token);
    if (status === 'APPROVED') return { decision: 'approved' };
    if (status === 'REJECTED') return { decision: 'rejected' };
    return { decision: 'pending', record: touched };
  }

  /**
   * A lead that moved off its pending approval without a decision leaves a
   * request nobody can act on; mark it superseded
   */
  private async retireApproval(before: LeadRecord, after: LeadRecord): Promise<void> {
    const pending = before.run.pendingAction;
    if (pending.type !== 'approval') return;
    const current = after.run.pendingAction;
    if (current.type === 'approval' && current.token === pending.token) return;

    await this.approvals.supersede(pending.token);
  }

  private reject(record: LeadRecord, gate: Gate, now: Date): LeadRecord {
    const error = new ApprovalRejectedError(record.id, gate);
    return haltLead(
      record,
      'ABANDONED',
      { kind: 'APPROVAL_REJECTED', code: error.code, message: error.message },
      now,
      {
        approvals:
          gate === 'SEND'
            ? { ...record.approvals, SEND: false }
            : { ...record.approvals, SCHEDULE: false },
      }
    );
  }

  private fail(
    record: LeadRecord,
    budget: RetryBudgetKey,
    error: unknown,
    now: Date,
    patch: LeadPatch = {}
  ): LeadRecord {
    const target = BUDGET_STAGE[budget];
    const { retry } = this.config;
    const updated = recordFailure(
      record,
      target,
      error,
      { maxAttempts: retry.maxAttempts[budget], baseDelayMs: retry.baseDelayMs, maxDelayMs: retry.maxDelayMs },
      now,
      patch
    );

    this.logger.warn(
      {
        leadId: record.id,
        target,
        kind: updated.lastError?.kind,
        retryCount: counterValue(updated.retryCounts, target),
        retryNotBefore: updated.run.retryNotBefore,
      },
      'Port call failed'
    );
    return updated;
  }

  private call<T>(service: string, fn: () => Promise<T>): Promise<T> {
    return withTimeout(service, this.config.port.timeoutMs, fn);
  }

  private canAnalyze(record: LeadRecord): boolean {
    return (
      isAnalyticsEligible(record, this.config.analytics.trigger) &&
      !isRetryBudgetSpent(record, BUDGET_STAGE.analytics, this.config.retry.maxAttempts.analytics)
    );
  }

  private replyExpired(record: LeadRecord, now: Date): boolean {
    return now.getTime() - new Date(waitingSince(record)).getTime() >= this.config.reply.maxWaitMs;
  }

  private expireReplyWait(record: LeadRecord, now: Date): LeadRecord | null {
    if (!this.replyExpired(record, now)) return null;
    const days = Math.round(this.config.reply.maxWaitMs / 86_400_000);
    return haltLead(
      record,
      'ABANDONED',
      { kind: 'REPLY_TIMEOUT', code: 'REPLY_TIMEOUT', message: `No reply within ${days} days` },
      now
    );
  }

  private logTransition(before: LeadRecord, after: LeadRecord): void {
    if (before.stage === after.stage) {
      this.logger.debug({ leadId: after.id, stage: after.stage, version: after.version }, 'Lead updated');
      return;
    }
    this.logger.info(
      { leadId: after.id, from: before.stage, to: after.stage, version: after.version },
      isTerminalStage(after.stage) ? 'Lead reached terminal stage' : 'Lead advanced'
    );
  }
}

function waitingSince(record: LeadRecord): string {
  const pending = record.run.pendingAction;
  if (pending.type === 'reply') return pending.waitingSince;
  return record.sentAt ?? record.run.lastTransitionAt;
}

export function createWorkflowOrchestrator(options: WorkflowOrchestratorOptions): WorkflowOrchestrator {
  return new WorkflowOrchestrator(options);
}
