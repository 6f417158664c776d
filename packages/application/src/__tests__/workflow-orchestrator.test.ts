/**
 * WorkflowOrchestrator Tests
 * Stage progression, approval gating, retries and idempotent side effects
 */

import { describe, it, expect, vi } from 'vitest';

import {
  ConflictError,
  DEFAULT_WORKFLOW_CONFIG,
  IdempotencyKeys,
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
} from '@leadflow/core';

import {
  START,
  contact,
  createHarness,
  driveToAwaitingReply,
  driveToScheduleApproval,
  driveToScheduled,
  driveToSendApproval,
  pendingToken,
} from './workflow-fakes.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('WorkflowOrchestrator', () => {
  describe('discover', () => {
    it('should register a lead at DISCOVERED with version 0', async () => {
      const h = createHarness();

      const lead = await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      expect(lead.stage).toBe('DISCOVERED');
      expect(lead.version).toBe(0);
      expect(lead.createdAt).toBe(START.toISOString());
      expect(lead.run.pendingAction).toEqual({ type: 'none' });
    });

    it('should reject a malformed profile', async () => {
      const h = createHarness();

      await expect(
        h.orchestrator.discover({ contact: { companyName: 'Acme', contactEmail: 'not-an-email' } })
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a duplicate id', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      await expect(
        h.orchestrator.discover({ id: 'lead-a', contact: contact('Globex') })
      ).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe('full pipeline', () => {
    it('should carry a lead from discovery to analysis', async () => {
      const h = createHarness();
      h.scoring.scores.set('Acme', 0.9);
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      expect((await h.orchestrator.advance('lead-a')).to).toBe('SCORED');

      const batch = await h.orchestrator.shortlistBatch();
      expect(batch).toEqual({ status: 'applied', selected: ['lead-a'], passedOver: [] });

      expect((await h.orchestrator.advance('lead-a')).to).toBe('DRAFTED');

      const requested = await h.orchestrator.advance('lead-a');
      expect(requested.to).toBe('AWAITING_SEND_APPROVAL');
      const sendToken = pendingToken(requested.record.run.pendingAction);
      expect(sendToken).toBe(IdempotencyKeys.approval('lead-a', 'SEND', 0));

      const pending = await h.approvals.listPending();
      expect(pending).toHaveLength(1);
      expect(pending[0]?.payload).toEqual({ subject: 'Quick question for Acme', body: 'Would a short call help?' });

      // Gate still pending: nothing changes and nothing is sent
      const waiting = await h.orchestrator.advance('lead-a');
      expect(waiting.changed).toBe(false);
      expect(h.outreach.sendCalls).toHaveLength(0);

      await h.approvals.resolve(sendToken, true, { resolvedBy: 'reviewer' });

      const sent = await h.orchestrator.advance('lead-a');
      expect(sent.to).toBe('SENT');
      expect(sent.record.approvals.SEND).toBe(true);
      expect(sent.record.sendReceipt).toEqual({
        messageId: 'msg-1',
        idempotencyToken: IdempotencyKeys.send('lead-a', 0),
        sentAt: START.toISOString(),
      });

      const awaiting = await h.orchestrator.advance('lead-a');
      expect(awaiting.to).toBe('AWAITING_REPLY');
      expect(awaiting.record.run.pendingAction).toEqual({
        type: 'reply',
        cursor: null,
        waitingSince: START.toISOString(),
      });

      h.clock.advance(DAY_MS);
      h.outreach.reply('lead-a', 'Tuesday at 10am works for us', '2026-03-03T09:00:00.000Z');
      const polled = await h.orchestrator.pollReplies();
      expect(polled).toEqual({ received: 1, screenedOut: 0, ignored: 0, conflicts: 0 });
      expect(h.outreach.pollStarts).toEqual([START.toISOString()]);

      const proposed = await h.orchestrator.advance('lead-a');
      expect(proposed.to).toBe('AWAITING_SCHEDULE_APPROVAL');
      expect(proposed.record.meetingSlot).toBe('2026-03-10T10:00:00.000Z');
      expect(proposed.record.candidateSlots).toEqual(['2026-03-10T10:00:00.000Z', '2026-03-11T15:00:00.000Z']);

      const scheduleRequest = await h.approvals.findPending('lead-a', 'SCHEDULE', 0);
      expect(scheduleRequest?.token).toBe(IdempotencyKeys.approval('lead-a', 'SCHEDULE', 0));
      await h.approvals.resolve(IdempotencyKeys.approval('lead-a', 'SCHEDULE', 0), true);

      const booked = await h.orchestrator.advance('lead-a');
      expect(booked.to).toBe('SCHEDULED');
      expect(booked.record.bookingReceipt).toEqual({
        bookingId: 'booking-1',
        slot: '2026-03-10T10:00:00.000Z',
        idempotencyToken: IdempotencyKeys.book('lead-a', 0),
      });

      const attached = await h.orchestrator.attachTranscript('lead-a', 'transcripts/acme-call.txt');
      expect(attached.to).toBe('SCHEDULED');
      expect(attached.record.transcriptRef).toBe('transcripts/acme-call.txt');

      const analyzed = await h.orchestrator.advance('lead-a');
      expect(analyzed.to).toBe('ANALYZED');
      expect(analyzed.record.analyticsSummary).toEqual({
        summary: 'Summary of transcripts/acme-call.txt',
        sentiment: 'positive',
        topThemes: [],
        painPoints: [],
        nextBestActions: [],
        notableQuotes: [],
      });

      const done = await h.orchestrator.advance('lead-a');
      expect(done.changed).toBe(false);
      expect(h.outreach.externalSends).toBe(1);
      expect(h.scheduling.bookings.size).toBe(1);
    });
  });

  describe('idempotent side effects', () => {
    it('should reuse the send token when the save after sending loses a race', async () => {
      const h = createHarness();
      const token = await driveToSendApproval(h, 'lead-a');
      await h.approvals.resolve(token, true);

      const save = vi.spyOn(h.store, 'save');
      save.mockRejectedValueOnce(new ConflictError('LeadRecord', 'lead-a'));

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('SENT');
      expect(h.outreach.sendCalls.map((call) => call.token)).toEqual([
        IdempotencyKeys.send('lead-a', 0),
        IdempotencyKeys.send('lead-a', 0),
      ]);
      expect(h.outreach.externalSends).toBe(1);
    });

    it('should take a new send token after a recorded failure', async () => {
      const h = createHarness();
      const token = await driveToSendApproval(h, 'lead-a');
      await h.approvals.resolve(token, true);
      h.outreach.sendFailuresLeft = 1;

      const failed = await h.orchestrator.advance('lead-a');
      expect(failed.to).toBe('AWAITING_SEND_APPROVAL');
      expect(failed.record.lastError?.kind).toBe('SERVICE');
      expect(failed.record.retryCounts.SENT).toBe(1);

      const sent = await h.orchestrator.advance('lead-a');
      expect(sent.to).toBe('SENT');
      expect(h.outreach.sendCalls.map((call) => call.token)).toEqual([
        IdempotencyKeys.send('lead-a', 0),
        IdempotencyKeys.send('lead-a', 1),
      ]);
      expect(sent.record.sendReceipt?.idempotencyToken).toBe(IdempotencyKeys.send('lead-a', 1));
    });

    it('should let exactly one of two concurrent advances win', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      const results = await Promise.all([h.orchestrator.advance('lead-a'), h.orchestrator.advance('lead-a')]);

      expect(results.filter((r) => r.changed)).toHaveLength(1);
      const stored = await h.store.get('lead-a');
      expect(stored?.stage).toBe('SCORED');
      expect(stored?.version).toBe(1);
    });
  });

  describe('approval gating', () => {
    it('should abandon the lead when the send is rejected', async () => {
      const h = createHarness();
      const token = await driveToSendApproval(h, 'lead-a');
      await h.approvals.resolve(token, false, { note: 'Tone is off' });

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ABANDONED');
      expect(result.record.approvals.SEND).toBe(false);
      expect(result.record.lastError?.kind).toBe('APPROVAL_REJECTED');
      expect(result.record.haltedAt).toBe('AWAITING_SEND_APPROVAL');
      expect(h.outreach.sendCalls).toHaveLength(0);
    });

    it('should abandon the lead when the booking is rejected', async () => {
      const h = createHarness();
      const token = await driveToScheduleApproval(h, 'lead-a');
      await h.approvals.resolve(token, false);

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ABANDONED');
      expect(result.record.approvals.SCHEDULE).toBe(false);
      expect(h.scheduling.bookCalls).toHaveLength(0);
    });
  });

  describe('retries', () => {
    it('should fail the lead with RETRY_EXHAUSTED once the scoring budget is spent', async () => {
      const h = createHarness();
      h.scoring.failuresLeft = 99;
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      const first = await h.orchestrator.advance('lead-a');
      expect(first.to).toBe('DISCOVERED');
      expect(first.record.lastError?.kind).toBe('SERVICE');
      expect(first.record.lastError?.message).toBe('scoring error: model unavailable');

      await h.orchestrator.advance('lead-a');
      const third = await h.orchestrator.advance('lead-a');

      expect(third.to).toBe('FAILED');
      expect(third.record.lastError).toMatchObject({ kind: 'RETRY_EXHAUSTED', code: 'RETRY_EXHAUSTED', stage: 'DISCOVERED' });
      expect(third.record.haltedAt).toBe('DISCOVERED');

      const fourth = await h.orchestrator.advance('lead-a');
      expect(fourth.changed).toBe(false);
      expect(h.scoring.calls).toBe(3);
      expect(await h.orchestrator.listRunnable()).toEqual([]);
    });

    it('should hold a failed lead back until the backoff has elapsed', async () => {
      const h = createHarness({ retry: { baseDelayMs: 1000 } });
      h.scoring.failuresLeft = 1;
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      const failed = await h.orchestrator.advance('lead-a');
      expect(failed.record.run.retryNotBefore).toBe('2026-03-02T09:00:01.000Z');

      const early = await h.orchestrator.advance('lead-a');
      expect(early.changed).toBe(false);
      expect(await h.orchestrator.listRunnable(h.clock.now())).toEqual([]);

      h.clock.advance(1000);
      const retried = await h.orchestrator.advance('lead-a');
      expect(retried.to).toBe('SCORED');
      expect(retried.record.run.retryNotBefore).toBeNull();
      expect(h.scoring.calls).toBe(2);
    });

    it('should treat an out-of-range score as a service failure', async () => {
      const h = createHarness();
      h.scoring.scores.set('Acme', 1.5);
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('DISCOVERED');
      expect(result.record.lastError?.message).toBe('scoring error: score out of range: 1.5');
    });

    it('should retry a booking conflict with a new token', async () => {
      const h = createHarness();
      const token = await driveToScheduleApproval(h, 'lead-a');
      await h.approvals.resolve(token, true);
      h.scheduling.conflictsLeft = 1;

      const conflicted = await h.orchestrator.advance('lead-a');
      expect(conflicted.to).toBe('AWAITING_SCHEDULE_APPROVAL');
      expect(conflicted.record.lastError?.message).toBe('scheduling error: slot taken');
      expect(conflicted.record.approvals.SCHEDULE).toBe(true);

      const booked = await h.orchestrator.advance('lead-a');
      expect(booked.to).toBe('SCHEDULED');
      expect(h.scheduling.bookCalls.map((call) => call.token)).toEqual([
        IdempotencyKeys.book('lead-a', 0),
        IdempotencyKeys.book('lead-a', 1),
      ]);
    });
  });

  describe('replies', () => {
    it('should abandon a lead after 14 days without a reply', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');

      h.clock.advance(14 * DAY_MS - 1);
      expect(await h.orchestrator.sweepReplyTimeouts()).toEqual([]);

      h.clock.advance(1);
      expect(await h.orchestrator.sweepReplyTimeouts()).toEqual(['lead-a']);

      const lead = await h.orchestrator.get('lead-a');
      expect(lead.stage).toBe('ABANDONED');
      expect(lead.lastError).toMatchObject({ kind: 'REPLY_TIMEOUT', message: 'No reply within 14 days' });
      expect(lead.haltedAt).toBe('AWAITING_REPLY');
    });

    it('should screen out automated replies and resume after their cursor', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');

      h.outreach.reply('lead-a', 'This is an automated message: I am out of office', '2026-03-03T08:00:00.000Z');
      h.outreach.reply('lead-x', 'Who is this?', '2026-03-03T08:30:00.000Z');
      const first = await h.orchestrator.pollReplies();

      expect(first).toEqual({ received: 0, screenedOut: 1, ignored: 1, conflicts: 0 });
      const waiting = await h.orchestrator.get('lead-a');
      expect(waiting.stage).toBe('AWAITING_REPLY');
      expect(waiting.run.pendingAction).toEqual({
        type: 'reply',
        cursor: '000001',
        waitingSince: START.toISOString(),
      });

      h.outreach.reply('lead-a', 'Sounds good, let us talk', '2026-03-04T10:00:00.000Z');
      const second = await h.orchestrator.pollReplies();

      expect(second.received).toBe(1);
      expect(h.outreach.pollStarts).toEqual([START.toISOString(), START.toISOString()]);
      const replied = await h.orchestrator.get('lead-a');
      expect(replied.stage).toBe('REPLY_RECEIVED');
      expect(replied.reply).toEqual({
        text: 'Sounds good, let us talk',
        receivedAt: '2026-03-04T10:00:00.000Z',
        cursor: '000003',
      });
    });

    it('should ignore a reply that arrived before the current wait began', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      await driveToAwaitingReply(h, 'lead-b');
      h.outreach.reply('lead-a', 'Happy to talk on Tuesday', '2026-03-02T12:00:00.000Z');
      h.outreach.reply('lead-b', 'Happy to talk on Wednesday', '2026-03-02T12:00:00.000Z');
      h.clock.advance(DAY_MS);
      await h.orchestrator.abandon('lead-a');
      await h.orchestrator.reset('lead-a');

      const polled = await h.orchestrator.pollReplies();

      expect(polled).toEqual({ received: 1, screenedOut: 0, ignored: 0, conflicts: 0 });
      expect(h.outreach.pollStarts).toEqual([START.toISOString()]);
      expect((await h.orchestrator.get('lead-b')).stage).toBe('REPLY_RECEIVED');
      const reset = await h.orchestrator.get('lead-a');
      expect(reset.stage).toBe('AWAITING_REPLY');
      expect(reset.run.pendingAction).toEqual({ type: 'reply', cursor: null, waitingSince: '2026-03-03T09:00:00.000Z' });
    });
  });

  describe('reading replies', () => {
    async function receiveReply(h: ReturnType<typeof createHarness>, text: string, at: string): Promise<void> {
      h.outreach.reply('lead-a', text, at);
      await h.orchestrator.pollReplies();
    }

    it('should abandon a lead whose neutral reply names no usable time', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      h.scheduling.intent = 'neutral';
      h.scheduling.slots = ['sometime next week'];
      await receiveReply(h, 'Sometime next week maybe', '2026-03-03T08:00:00.000Z');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ABANDONED');
      expect(result.record.lastError?.kind).toBe('NO_CANDIDATE_SLOTS');
    });

    it('should abandon a refusal even when it mentions a date', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      h.scheduling.intent = 'negative';
      await receiveReply(h, 'No thanks, and Tuesday the 10th is booked anyway', '2026-03-03T08:00:00.000Z');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ABANDONED');
      expect(result.record.lastError).toMatchObject({ kind: 'NOT_INTERESTED', code: 'NOT_INTERESTED' });
      expect(result.record.meetingSlot).toBeNull();
      expect(await h.approvals.listPending()).toEqual([]);
    });

    it('should ask a willing lead for times and wait for the next reply', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      h.scheduling.slots = [];
      await receiveReply(h, 'Yes, keen to talk. When suits you?', '2026-03-03T08:00:00.000Z');

      const followed = await h.orchestrator.advance('lead-a');

      expect(followed.to).toBe('AWAITING_REPLY');
      expect(followed.record.followUps).toBe(1);
      expect(followed.record.run.pendingAction).toEqual({
        type: 'reply',
        cursor: '000001',
        waitingSince: START.toISOString(),
      });
      expect(h.outreach.sendCalls[1]).toEqual({
        leadId: 'lead-a',
        message: {
          to: 'hello@acme.example',
          subject: 'Re: Quick question for Acme',
          body: DEFAULT_WORKFLOW_CONFIG.reply.followUpBody,
        },
        token: IdempotencyKeys.followUp('lead-a', 0, 0),
      });

      h.scheduling.slots = ['2026-03-12T14:00:00.000Z'];
      await receiveReply(h, 'Thursday at 2pm works', '2026-03-04T08:00:00.000Z');
      const proposed = await h.orchestrator.advance('lead-a');

      expect(proposed.to).toBe('AWAITING_SCHEDULE_APPROVAL');
      expect(proposed.record.meetingSlot).toBe('2026-03-12T14:00:00.000Z');
    });

    it('should give up once the follow-ups are used', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      h.scheduling.slots = [];
      await receiveReply(h, 'Yes, keen to talk', '2026-03-03T08:00:00.000Z');
      await h.orchestrator.advance('lead-a');
      await receiveReply(h, 'Still keen, you pick', '2026-03-04T08:00:00.000Z');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ABANDONED');
      expect(result.record.lastError?.kind).toBe('NO_CANDIDATE_SLOTS');
      expect(h.outreach.externalSends).toBe(2);
    });

    it('should reuse the follow-up token when the save loses a race', async () => {
      const h = createHarness();
      await driveToAwaitingReply(h, 'lead-a');
      h.scheduling.slots = [];
      await receiveReply(h, 'Yes, keen to talk', '2026-03-03T08:00:00.000Z');
      vi.spyOn(h.store, 'save').mockRejectedValueOnce(new ConflictError('LeadRecord', 'lead-a'));

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('AWAITING_REPLY');
      expect(h.outreach.sendCalls.slice(1).map((call) => call.token)).toEqual([
        IdempotencyKeys.followUp('lead-a', 0, 0),
        IdempotencyKeys.followUp('lead-a', 0, 0),
      ]);
      expect(h.outreach.externalSends).toBe(2);
    });
  });

  describe('shortlistBatch', () => {
    async function scoreAll(h: ReturnType<typeof createHarness>, leads: [string, string, number][]): Promise<void> {
      for (const [id, company, score] of leads) {
        h.scoring.scores.set(company, score);
        await h.orchestrator.discover({ id, contact: contact(company) });
      }
      for (const [id] of leads) {
        await h.orchestrator.advance(id);
      }
    }

    it('should promote the top K and retain the rest as passed over', async () => {
      const h = createHarness();
      await scoreAll(h, [
        ['lead-a', 'Acme', 0.9],
        ['lead-b', 'Globex', 0.4],
        ['lead-c', 'Initech', 0.7],
      ]);

      const outcome = await h.orchestrator.shortlistBatch();

      expect(outcome).toEqual({ status: 'applied', selected: ['lead-a', 'lead-c'], passedOver: ['lead-b'] });
      const passedOver = await h.orchestrator.get('lead-b');
      expect(passedOver.stage).toBe('SCORED');
      expect(passedOver.run.passedOverAt).toBe(START.toISOString());

      expect((await h.orchestrator.shortlistBatch()).status).toBe('idle');
    });

    it('should wait while any lead is still unscored', async () => {
      const h = createHarness();
      await scoreAll(h, [['lead-a', 'Acme', 0.9]]);
      await h.orchestrator.discover({ id: 'lead-b', contact: contact('Globex') });

      expect((await h.orchestrator.shortlistBatch()).status).toBe('waiting_for_scoring');
      expect((await h.orchestrator.get('lead-a')).stage).toBe('SCORED');
    });

    it('should abandon unselected leads when configured to', async () => {
      const h = createHarness({ shortlist: { topK: 1, minScore: 0.5, unselected: 'abandon' } });
      await scoreAll(h, [
        ['lead-a', 'Acme', 0.6],
        ['lead-b', 'Globex', 0.3],
      ]);

      const outcome = await h.orchestrator.shortlistBatch();

      expect(outcome.selected).toEqual(['lead-a']);
      const dropped = await h.orchestrator.get('lead-b');
      expect(dropped.stage).toBe('ABANDONED');
      expect(dropped.lastError?.kind).toBe('NOT_SHORTLISTED');
    });

    it('should report a conflict and write nothing when a lead changed underneath', async () => {
      const h = createHarness();
      await scoreAll(h, [
        ['lead-a', 'Acme', 0.9],
        ['lead-b', 'Globex', 0.8],
      ]);
      vi.spyOn(h.store, 'saveAll').mockRejectedValueOnce(new ConflictError('LeadRecord', 'lead-b', 1));

      const outcome = await h.orchestrator.shortlistBatch();

      expect(outcome.status).toBe('conflict');
      expect(await h.store.countByStage()).toMatchObject({ SCORED: 2, SHORTLISTED: 0 });
    });
  });

  describe('analytics', () => {
    it('should analyze a transcript ahead of the next pipeline step', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });
      await h.orchestrator.attachTranscript('lead-a', 'transcripts/intro.txt');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ANALYZED');
      expect(h.scoring.calls).toBe(0);
    });

    it('should only analyze SCHEDULED leads under the scheduled_only trigger', async () => {
      const h = createHarness({ analytics: { trigger: 'scheduled_only' } });
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });
      await h.orchestrator.attachTranscript('lead-a', 'transcripts/intro.txt');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('SCORED');
      expect(h.analytics.calls).toBe(0);
    });

    it('should keep a SCHEDULED lead when analytics retries run out', async () => {
      const h = createHarness();
      await driveToScheduled(h, 'lead-a');
      await h.orchestrator.attachTranscript('lead-a', 'transcripts/call.txt');
      h.analytics.failuresLeft = 99;

      await h.orchestrator.advance('lead-a');
      await h.orchestrator.advance('lead-a');
      const third = await h.orchestrator.advance('lead-a');

      expect(third.to).toBe('SCHEDULED');
      expect(third.record.lastError?.kind).toBe('RETRY_EXHAUSTED');
      expect(third.record.run.retryNotBefore).toBeNull();

      const fourth = await h.orchestrator.advance('lead-a');
      expect(fourth.changed).toBe(false);
      expect(h.analytics.calls).toBe(3);
      expect(await h.orchestrator.listRunnable()).toEqual([]);
    });

    it('should reject an empty transcript reference', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      await expect(h.orchestrator.attachTranscript('lead-a', '   ')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('manual control', () => {
    it('should abandon and then reset a lead into a fresh approval instance', async () => {
      const h = createHarness();
      const firstToken = await driveToSendApproval(h, 'lead-a');

      const abandoned = await h.orchestrator.abandon('lead-a', 'Not a fit this quarter');
      expect(abandoned.to).toBe('ABANDONED');
      expect(abandoned.record.lastError).toMatchObject({
        kind: 'MANUAL_ABANDON',
        message: 'Not a fit this quarter',
        stage: 'AWAITING_SEND_APPROVAL',
      });

      const reset = await h.orchestrator.reset('lead-a');
      expect(reset.to).toBe('AWAITING_SEND_APPROVAL');
      expect(reset.record.resets).toBe(1);
      expect(reset.record.lastError).toBeNull();
      expect(reset.record.approvals).toEqual({});

      const rerequested = await h.orchestrator.advance('lead-a');
      const secondToken = pendingToken(rerequested.record.run.pendingAction);
      expect(secondToken).toBe(IdempotencyKeys.approval('lead-a', 'SEND', 1));
      expect(secondToken).not.toBe(firstToken);
      expect(await h.approvals.status(firstToken)).toBe('SUPERSEDED');
      expect((await h.approvals.listPending()).map((r) => r.token)).toEqual([secondToken]);
    });

    it('should withdraw a pending approval when analytics finishes the lead', async () => {
      const h = createHarness();
      const token = await driveToSendApproval(h, 'lead-a');
      await h.orchestrator.attachTranscript('lead-a', 'transcripts/intro.txt');

      const result = await h.orchestrator.advance('lead-a');

      expect(result.to).toBe('ANALYZED');
      expect(await h.approvals.status(token)).toBe('SUPERSEDED');
      expect(await h.approvals.listPending()).toEqual([]);
    });

    it('should refuse to abandon a lead twice', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });
      await h.orchestrator.abandon('lead-a');

      await expect(h.orchestrator.abandon('lead-a')).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('should refuse to reset a lead that is not halted', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      await expect(h.orchestrator.reset('lead-a')).rejects.toBeInstanceOf(InvalidTransitionError);
    });

    it('should archive a lead and then report it missing', async () => {
      const h = createHarness();
      await h.orchestrator.discover({ id: 'lead-a', contact: contact('Acme') });

      await h.orchestrator.archive('lead-a');

      await expect(h.orchestrator.get('lead-a')).rejects.toBeInstanceOf(NotFoundError);
      await expect(h.orchestrator.archive('lead-a')).rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
