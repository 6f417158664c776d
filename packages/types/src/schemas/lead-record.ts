/**
 * Lead record and workflow run schemas
 *
 * The persisted form of a lead: everything the orchestrator needs to resume a
 * run after a restart lives in one document guarded by `version`.
 *
 * @module @leadflow/types/schemas/lead-record
 */

import { z } from 'zod';

import { EmailSchema, IsoTimestampSchema, LeadIdSchema, UnitScoreSchema } from './common.js';
import { ApprovalGateSchema, StageSchema } from './pipeline.js';

// =============================================================================
// CONTACT PROFILE
// =============================================================================

/**
 * Prospect profile handed to the scoring and drafting services (PII)
 */
export const ContactProfileSchema = z.object({
  companyName: z.string().min(1),
  contactEmail: EmailSchema,
  contactName: z.string().optional(),
  industry: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
});

export type ContactProfile = z.infer<typeof ContactProfileSchema>;

// =============================================================================
// PORT RESULTS APPLIED TO THE RECORD
// =============================================================================

export const DraftSchema = z.object({
  subject: z.string().min(1),
  body: z.string().min(1),
});

export const SendReceiptSchema = z.object({
  messageId: z.string().min(1),
  idempotencyToken: z.string().min(1),
  sentAt: IsoTimestampSchema,
});

export const ReplySchema = z.object({
  text: z.string(),
  receivedAt: IsoTimestampSchema,
  cursor: z.string(),
});

export const BookingReceiptSchema = z.object({
  bookingId: z.string().min(1),
  slot: IsoTimestampSchema,
  idempotencyToken: z.string().min(1),
  calendarLink: z.string().optional(),
});

export const SentimentSchema = z.enum(['positive', 'neutral', 'negative']);

export const AnalyticsSummarySchema = z.object({
  summary: z.string(),
  sentiment: SentimentSchema,
  topThemes: z.array(z.string()).default([]),
  painPoints: z.array(z.string()).default([]),
  nextBestActions: z.array(z.string()).default([]),
  notableQuotes: z.array(z.string()).default([]),
});

export type Draft = z.infer<typeof DraftSchema>;
export type SendReceipt = z.infer<typeof SendReceiptSchema>;
export type Reply = z.infer<typeof ReplySchema>;
export type BookingReceipt = z.infer<typeof BookingReceiptSchema>;
export type Sentiment = z.infer<typeof SentimentSchema>;
export type AnalyticsSummary = z.infer<typeof AnalyticsSummarySchema>;
export type AnalyticsSummaryInput = z.input<typeof AnalyticsSummarySchema>;

// =============================================================================
// ERRORS RECORDED ON THE LEAD
// =============================================================================

export const WorkflowErrorKindSchema = z.enum([
  'VALIDATION',
  'SERVICE',
  'CONFLICT',
  'APPROVAL_REJECTED',
  'RETRY_EXHAUSTED',
  'REPLY_TIMEOUT',
  'NO_CANDIDATE_SLOTS',
  'NOT_INTERESTED',
  'MANUAL_ABANDON',
  'NOT_SHORTLISTED',
]);

export type WorkflowErrorKind = z.infer<typeof WorkflowErrorKindSchema>;

export const LastErrorSchema = z.object({
  kind: WorkflowErrorKindSchema,
  code: z.string(),
  message: z.string(),
  stage: StageSchema,
  at: IsoTimestampSchema,
});

export type LastError = z.infer<typeof LastErrorSchema>;

// =============================================================================
// WORKFLOW RUN
// =============================================================================

export const PendingActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('none') }),
  z.object({
    type: z.literal('approval'),
    gate: ApprovalGateSchema,
    token: z.string().min(1),
    requestedAt: IsoTimestampSchema,
  }),
  z.object({
    type: z.literal('reply'),
    cursor: z.string().nullable(),
    waitingSince: IsoTimestampSchema,
  }),
]);

export type PendingAction = z.infer<typeof PendingActionSchema>;

export const WorkflowRunSchema = z.object({
  runId: z.string().min(1),
  stage: StageSchema,
  pendingAction: PendingActionSchema,
  /** Earliest time the next retry of the current stage may run */
  retryNotBefore: IsoTimestampSchema.nullable(),
  startedAt: IsoTimestampSchema,
  lastTransitionAt: IsoTimestampSchema,
  transitions: z.number().int().nonnegative(),
  /** Set on a SCORED lead that a shortlist batch left out */
  passedOverAt: IsoTimestampSchema.nullable(),
});

export type WorkflowRun = z.infer<typeof WorkflowRunSchema>;

// =============================================================================
// LEAD RECORD
// =============================================================================

export const StageCounterSchema = z.record(StageSchema, z.number().int().nonnegative());

export type StageCounter = z.infer<typeof StageCounterSchema>;

export const ApprovalFlagsSchema = z.object({
  SEND: z.boolean().optional(),
  SCHEDULE: z.boolean().optional(),
});

export type ApprovalFlags = z.infer<typeof ApprovalFlagsSchema>;

export const LeadRecordSchema = z.object({
  id: LeadIdSchema,
  contact: ContactProfileSchema,
  intentScore: UnitScoreSchema.nullable(),
  stage: StageSchema,
  draft: DraftSchema.nullable(),
  sentAt: IsoTimestampSchema.nullable(),
  sendReceipt: SendReceiptSchema.nullable(),
  reply: ReplySchema.nullable(),
  candidateSlots: z.array(IsoTimestampSchema),
  meetingSlot: IsoTimestampSchema.nullable(),
  bookingReceipt: BookingReceiptSchema.nullable(),
  transcriptRef: z.string().nullable(),
  analyticsSummary: AnalyticsSummarySchema.nullable(),
  /** Bounded retry counters, cleared by a manual reset */
  retryCounts: StageCounterSchema,
  /** Lifetime attempt counters feeding idempotency tokens, never cleared */
  attempts: StageCounterSchema,
  lastError: LastErrorSchema.nullable(),
  approvals: ApprovalFlagsSchema,
  /** Stage the lead was in when it moved to FAILED or ABANDONED */
  haltedAt: StageSchema.nullable(),
  resets: z.number().int().nonnegative(),
  /** Follow-ups sent asking a willing lead for meeting times */
  followUps: z.number().int().nonnegative().default(0),
  run: WorkflowRunSchema,
  version: z.number().int().nonnegative(),
  createdAt: IsoTimestampSchema,
  updatedAt: IsoTimestampSchema,
});

export type LeadRecord = z.infer<typeof LeadRecordSchema>;

export const DiscoverLeadInputSchema = z.object({
  id: LeadIdSchema.optional(),
  contact: ContactProfileSchema,
});

export type DiscoverLeadInput = z.infer<typeof DiscoverLeadInputSchema>;
