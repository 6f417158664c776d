/**
 * Approval request schemas
 *
 * @module @leadflow/types/schemas/approval
 */

import { z } from 'zod';

import { IsoTimestampSchema, LeadIdSchema } from './common.js';
import { ApprovalGateSchema, StageSchema } from './pipeline.js';

/** SUPERSEDED: the lead left the gate before anyone decided */
export const ApprovalStatusSchema = z.enum(['PENDING', 'APPROVED', 'REJECTED', 'SUPERSEDED']);

export type ApprovalStatus = z.infer<typeof ApprovalStatusSchema>;

export const ApprovalRequestSchema = z.object({
  token: z.string().min(1),
  leadId: LeadIdSchema,
  gate: ApprovalGateSchema,
  stage: StageSchema,
  /** Stage instance the request belongs to; bumped by a manual reset */
  instance: z.number().int().nonnegative(),
  payload: z.record(z.unknown()),
  status: ApprovalStatusSchema,
  requestedAt: IsoTimestampSchema,
  resolvedAt: IsoTimestampSchema.nullable(),
  resolvedBy: z.string().nullable(),
  note: z.string().nullable(),
});

export type ApprovalRequest = z.infer<typeof ApprovalRequestSchema>;

export const ResolveApprovalInputSchema = z.object({
  approved: z.boolean(),
  resolvedBy: z.string().min(1).max(128).optional(),
  note: z.string().max(2000).optional(),
});

export type ResolveApprovalInput = z.infer<typeof ResolveApprovalInputSchema>;
