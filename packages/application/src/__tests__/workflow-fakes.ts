/**
 * In-process doubles for the workflow's external ports and a wired-up
 * orchestrator for tests
 */

import { vi } from 'vitest';

import { ServiceError, resolveWorkflowConfig, type WorkflowConfigOverrides } from '@leadflow/core';
import { ApprovalGate } from '@leadflow/domain';
import { InMemoryApprovalRepository, InMemoryLeadRecordStore } from '@leadflow/infrastructure';
import type { AnalyticsSummaryInput, ContactProfile, Draft, PendingAction, Sentiment } from '@leadflow/types';

import type { AnalyticsPort } from '../ports/secondary/external/AnalyticsPort.js';
import type {
  InboundReply,
  OutboundMessage,
  OutreachPort,
  SendOutcome,
} from '../ports/secondary/external/OutreachPort.js';
import type { BookingOutcome, ReplyReading, SchedulingPort } from '../ports/secondary/external/SchedulingPort.js';
import type { ScoringPort } from '../ports/secondary/external/ScoringPort.js';
import { WorkflowOrchestrator } from '../use-cases/workflow/WorkflowOrchestrator.js';

export const START = new Date('2026-03-02T09:00:00.000Z');

export class TestClock {
  private current: Date;

  constructor(start: Date = START) {
    this.current = new Date(start.getTime());
  }

  now = (): Date => new Date(this.current.getTime());

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export class FakeScoring implements ScoringPort {
  readonly scores = new Map<string, number>();
  failuresLeft = 0;
  calls = 0;

  score(profile: ContactProfile): Promise<number> {
    this.calls++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return Promise.reject(new ServiceError('scoring', 'model unavailable'));
    }
    return Promise.resolve(this.scores.get(profile.companyName) ?? 0.5);
  }
}

/**
 * Mail double that counts deliveries per token the way a transport with
 * idempotency keys would
 */
export class FakeOutreach implements OutreachPort {
  readonly delivered = new Map<string, SendOutcome>();
  readonly sendCalls: { leadId: string; message: OutboundMessage; token: string }[] = [];
  readonly inbox: InboundReply[] = [];
  externalSends = 0;
  sendFailuresLeft = 0;
  readonly pollStarts: string[] = [];

  draft = vi.fn(
    (profile: ContactProfile): Promise<Draft> =>
      Promise.resolve({ subject: `Quick question for ${profile.companyName}`, body: 'Would a short call help?' })
  );

  send(leadId: string, message: OutboundMessage, token: string): Promise<SendOutcome> {
    this.sendCalls.push({ leadId, message, token });
    if (this.sendFailuresLeft > 0) {
      this.sendFailuresLeft--;
      return Promise.reject(new ServiceError('outreach', 'smtp connection reset'));
    }

    let outcome = this.delivered.get(token);
    if (outcome === undefined) {
      this.externalSends++;
      outcome = { messageId: `msg-${this.externalSends}`, sentAt: START.toISOString() };
      this.delivered.set(token, outcome);
    }
    return Promise.resolve(outcome);
  }

  async *pollReplies(since: string): AsyncIterable<InboundReply> {
    this.pollStarts.push(since);
    for (const reply of this.inbox) {
      if (reply.receivedAt >= since) {
        yield reply;
      }
    }
  }

  /** Cursors are zero-padded arrival numbers, unrelated to the timestamps */
  reply(leadId: string, replyText: string, receivedAt: string): void {
    const cursor = String(this.inbox.length + 1).padStart(6, '0');
    this.inbox.push({ leadId, replyText, receivedAt, cursor });
  }
}

export class FakeScheduling implements SchedulingPort {
  intent: Sentiment = 'positive';
  slots: string[] = ['2026-03-10T10:00:00.000Z', '2026-03-11T15:00:00.000Z'];
  readonly bookings = new Map<string, BookingOutcome>();
  readonly bookCalls: { leadId: string; slot: string; token: string }[] = [];
  conflictsLeft = 0;

  readReply(): Promise<ReplyReading> {
    return Promise.resolve({ intent: this.intent, slots: [...this.slots] });
  }

  book(leadId: string, slot: string, token: string): Promise<BookingOutcome> {
    this.bookCalls.push({ leadId, slot, token });
    if (this.conflictsLeft > 0) {
      this.conflictsLeft--;
      return Promise.resolve({ status: 'conflict', reason: 'slot taken' });
    }

    const existing = this.bookings.get(token);
    if (existing) return Promise.resolve(existing);

    const outcome: BookingOutcome = { status: 'booked', bookingId: `booking-${this.bookings.size + 1}` };
    this.bookings.set(token, outcome);
    return Promise.resolve(outcome);
  }
}

export class FakeAnalytics implements AnalyticsPort {
  failuresLeft = 0;
  calls = 0;

  analyze(transcriptRef: string): Promise<AnalyticsSummaryInput> {
    this.calls++;
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      return Promise.reject(new ServiceError('analytics', 'transcript store offline'));
    }
    return Promise.resolve({ summary: `Summary of ${transcriptRef}`, sentiment: 'positive' });
  }
}

export interface Harness {
  clock: TestClock;
  store: InMemoryLeadRecordStore;
  approvalRepository: InMemoryApprovalRepository;
  approvals: ApprovalGate;
  scoring: FakeScoring;
  outreach: FakeOutreach;
  scheduling: FakeScheduling;
  analytics: FakeAnalytics;
  orchestrator: WorkflowOrchestrator;
}

/**
 * Orchestrator over in-memory stores and fake ports. Backoff is zero unless
 * the overrides set it.
 */
export function createHarness(overrides: WorkflowConfigOverrides = {}): Harness {
  const clock = new TestClock();
  const store = new InMemoryLeadRecordStore();
  const approvalRepository = new InMemoryApprovalRepository();
  const approvals = new ApprovalGate({ repository: approvalRepository, clock: clock.now });
  const scoring = new FakeScoring();
  const outreach = new FakeOutreach();
  const scheduling = new FakeScheduling();
  const analytics = new FakeAnalytics();

  const config = resolveWorkflowConfig({
    ...overrides,
    retry: { baseDelayMs: 0, ...overrides.retry },
  });

  const orchestrator = new WorkflowOrchestrator({
    store,
    approvals,
    ports: { scoring, outreach, scheduling, analytics },
    config,
    clock: clock.now,
  });

  return { clock, store, approvalRepository, approvals, scoring, outreach, scheduling, analytics, orchestrator };
}

/**
 * Discover a lead and walk it to AWAITING_SEND_APPROVAL; returns the SEND token
 */
export async function driveToSendApproval(h: Harness, leadId: string, companyName = 'Acme'): Promise<string> {
  await h.orchestrator.discover({ id: leadId, contact: contact(companyName) });
  await h.orchestrator.advance(leadId);
  await h.orchestrator.shortlistBatch();
  await h.orchestrator.advance(leadId);
  const { record } = await h.orchestrator.advance(leadId);
  return pendingToken(record.run.pendingAction);
}

/**
 * Continue from AWAITING_SEND_APPROVAL to AWAITING_REPLY
 */
export async function driveToAwaitingReply(h: Harness, leadId: string): Promise<void> {
  const token = await driveToSendApproval(h, leadId);
  await h.approvals.resolve(token, true);
  await h.orchestrator.advance(leadId);
  await h.orchestrator.advance(leadId);
}

/**
 * Continue to AWAITING_SCHEDULE_APPROVAL; returns the SCHEDULE token
 */
export async function driveToScheduleApproval(h: Harness, leadId: string): Promise<string> {
  await driveToAwaitingReply(h, leadId);
  h.outreach.reply(leadId, 'Happy to talk, Tuesday morning suits us', '2026-03-03T08:00:00.000Z');
  await h.orchestrator.pollReplies();
  const { record } = await h.orchestrator.advance(leadId);
  return pendingToken(record.run.pendingAction);
}

export async function driveToScheduled(h: Harness, leadId: string): Promise<void> {
  const token = await driveToScheduleApproval(h, leadId);
  await h.approvals.resolve(token, true);
  await h.orchestrator.advance(leadId);
}

export function pendingToken(action: PendingAction): string {
  if (action.type !== 'approval') {
    throw new Error(`expected a pending approval, got ${action.type}`);
  }
  return action.token;
}

export function contact(companyName: string): ContactProfile {
  return { companyName, contactEmail: `hello@${companyName.toLowerCase()}.example` };
}
