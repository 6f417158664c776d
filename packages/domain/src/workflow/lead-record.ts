/**
 * Lead record factory and state changes
 *
 * Pure functions: each takes a record and returns a new one. None of them
 * touches `version`; the store owns it.
 *
 * @module @leadflow/domain/workflow/lead-record
 */

import { randomUUID } from 'node:crypto';

import {
  RetryExhaustedError,
  InvalidTransitionError,
  classifyError,
  computeBackoffDelay,
  toError,
} from '@leadflow/core';
import {
  ApprovalGateSchema,
  GATED_TARGET,
  HALTED_STAGES,
  isValidResetTransition,
  isValidStageTransition,
  type ContactProfile,
  type LastError,
  type LeadRecord,
  type PendingAction,
  type Stage,
  type StageCounter,
  type WorkflowErrorKind,
} from '@leadflow/types';

export interface NewLeadInput {
  id?: string;
  contact: ContactProfile;
}

/**
 * Fields a transition may set besides the stage and the run
 */
export type LeadPatch = Partial<
  Omit<LeadRecord, 'id' | 'stage' | 'run' | 'version' | 'createdAt' | 'updatedAt' | 'haltedAt'>
>;

export interface TransitionOptions {
  now: Date;
  pendingAction?: PendingAction;
}

export interface ErrorDescriptor {
  kind: WorkflowErrorKind;
  code: string;
  message: string;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

const NO_ACTION: PendingAction = { type: 'none' };

export function createLeadRecord(input: NewLeadInput, now: Date): LeadRecord {
  const at = now.toISOString();
  return {
    id: input.id ?? randomUUID(),
    contact: input.contact,
    intentScore: null,
    stage: 'DISCOVERED',
    draft: null,
    sentAt: null,
    sendReceipt: null,
    reply: null,
    candidateSlots: [],
    meetingSlot: null,
    bookingReceipt: null,
    transcriptRef: null,
    analyticsSummary: null,
    retryCounts: {},
    attempts: {},
    lastError: null,
    approvals: {},
    haltedAt: null,
    resets: 0,
    followUps: 0,
    run: {
      runId: randomUUID(),
      stage: 'DISCOVERED',
      pendingAction: NO_ACTION,
      retryNotBefore: null,
      startedAt: at,
      lastTransitionAt: at,
      transitions: 0,
      passedOverAt: null,
    },
    version: 0,
    createdAt: at,
    updatedAt: at,
  };
}

export function counterValue(counter: StageCounter, stage: Stage): number {
  return counter[stage] ?? 0;
}

function increment(counter: StageCounter, stage: Stage): StageCounter {
  return { ...counter, [stage]: counterValue(counter, stage) + 1 };
}

/**
 * Move a lead along one edge of the transition table.
 *
 * Entering SENT or SCHEDULED requires the matching approval flag to be true
 * on the resulting record.
 *
 * @throws InvalidTransitionError for an edge that is not in the table
 */
export function transitionLead(
  record: LeadRecord,
  to: Stage,
  patch: LeadPatch,
  options: TransitionOptions
): LeadRecord {
  const from = record.stage;
  if (!isValidStageTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }

  const approvals = { ...record.approvals, ...patch.approvals };
  for (const gate of ApprovalGateSchema.options) {
    if (GATED_TARGET[gate] === to && approvals[gate] !== true) {
      throw new InvalidTransitionError(from, to, `${gate} approval not granted`);
    }
  }

  const at = options.now.toISOString();
  return {
    ...record,
    ...patch,
    approvals,
    stage: to,
    haltedAt: HALTED_STAGES.has(to) ? from : record.haltedAt,
    run: {
      ...record.run,
      stage: to,
      pendingAction: options.pendingAction ?? NO_ACTION,
      retryNotBefore: null,
      lastTransitionAt: at,
      transitions: record.run.transitions + 1,
      passedOverAt: null,
    },
    updatedAt: at,
  };
}

/**
 * Update a lead without changing its stage
 */
export function touchLead(
  record: LeadRecord,
  patch: LeadPatch,
  now: Date,
  run: Partial<LeadRecord['run']> = {}
): LeadRecord {
  return {
    ...record,
    ...patch,
    run: { ...record.run, ...run, stage: record.stage },
    updatedAt: now.toISOString(),
  };
}

function toLastError(record: LeadRecord, error: ErrorDescriptor, now: Date): LastError {
  return { ...error, stage: record.stage, at: now.toISOString() };
}

/**
 * Move a lead to FAILED or ABANDONED, remembering where it stopped
 */
export function haltLead(
  record: LeadRecord,
  to: 'FAILED' | 'ABANDONED',
  error: ErrorDescriptor,
  now: Date,
  patch: LeadPatch = {}
): LeadRecord {
  return transitionLead(
    record,
    to,
    { ...patch, lastError: toLastError(record, error, now) },
    { now }
  );
}

export function describeError(error: unknown): ErrorDescriptor {
  const err = toError(error);
  const code = 'code' in err && typeof err.code === 'string' ? err.code : 'INTERNAL_ERROR';
  return { kind: classifyError(error), code, message: err.message };
}

/**
 * Apply a failed port call to a lead.
 *
 * `target` is the stage the call was trying to reach; its counters key the
 * retry budget and the idempotency token. Validation failures are not
 * retried. When the budget is spent the lead moves to FAILED, except for a
 * SCHEDULED lead, which has no such edge and keeps its stage.
 */
export function recordFailure(
  record: LeadRecord,
  target: Stage,
  error: unknown,
  policy: RetryPolicy,
  now: Date,
  patch: LeadPatch = {}
): LeadRecord {
  const described = describeError(error);
  const attempts = increment(record.attempts, target);

  if (described.kind === 'VALIDATION') {
    return haltLead(record, 'FAILED', described, now, { ...patch, attempts });
  }

  const retryCounts = increment(record.retryCounts, target);
  const spent = counterValue(retryCounts, target);

  if (spent >= policy.maxAttempts) {
    const exhausted = new RetryExhaustedError(record.id, target, spent, toError(error));
    const exhaustedError: ErrorDescriptor = {
      kind: 'RETRY_EXHAUSTED',
      code: exhausted.code,
      message: exhausted.message,
    };

    if (!isValidStageTransition(record.stage, 'FAILED')) {
      return touchLead(
        record,
        { ...patch, attempts, retryCounts, lastError: toLastError(record, exhaustedError, now) },
        now,
        { retryNotBefore: null }
      );
    }
    return haltLead(record, 'FAILED', exhaustedError, now, { ...patch, attempts, retryCounts });
  }

  const delay = computeBackoffDelay(spent, policy.baseDelayMs, policy.maxDelayMs);
  return touchLead(
    record,
    { ...patch, attempts, retryCounts, lastError: toLastError(record, described, now) },
    now,
    { retryNotBefore: new Date(now.getTime() + delay).toISOString() }
  );
}

/**
 * Whether the retry budget for reaching `target` is spent
 */
export function isRetryBudgetSpent(record: LeadRecord, target: Stage, maxAttempts: number): boolean {
  return counterValue(record.retryCounts, target) >= maxAttempts;
}

/**
 * Take a halted lead back to the stage it stopped in.
 *
 * Starts a new stage instance: retry counters and approval flags are
 * cleared, lifetime attempt counters are kept so idempotency tokens never
 * repeat.
 *
 * @throws InvalidTransitionError when the lead is not halted
 */
export function resetLead(record: LeadRecord, now: Date): LeadRecord {
  const target = record.haltedAt;
  if (target === null || !isValidResetTransition(record.stage, target)) {
    throw new InvalidTransitionError(record.stage, target ?? record.stage, 'lead is not halted');
  }

  const at = now.toISOString();
  const pendingAction: PendingAction =
    target === 'AWAITING_REPLY'
      ? { type: 'reply', cursor: null, waitingSince: at }
      : NO_ACTION;

  return {
    ...record,
    stage: target,
    haltedAt: null,
    lastError: null,
    retryCounts: {},
    approvals: {},
    resets: record.resets + 1,
    run: {
      ...record.run,
      stage: target,
      pendingAction,
      retryNotBefore: null,
      lastTransitionAt: at,
      transitions: record.run.transitions + 1,
      passedOverAt: null,
    },
    updatedAt: at,
  };
}

/**
 * Whether a retry backoff still holds the lead back at `now`
 */
export function isBackingOff(record: LeadRecord, now: Date): boolean {
  const notBefore = record.run.retryNotBefore;
  return notBefore !== null && new Date(notBefore).getTime() > now.getTime();
}
