/**
 * Common schemas shared across the workflow packages
 */
import { z } from 'zod';

/**
 * Email address validation
 */
export const EmailSchema = z.string().email('Invalid email address').describe('Valid email address');

/**
 * ISO 8601 timestamp kept as a string so persisted records round-trip unchanged
 */
export const IsoTimestampSchema = z
  .string()
  .datetime({ offset: true, message: 'Invalid ISO 8601 timestamp' })
  .describe('ISO 8601 timestamp');

/**
 * Lead identifier (opaque, caller supplied or generated)
 */
export const LeadIdSchema = z
  .string()
  .min(1, 'Lead ID is required')
  .max(128)
  .describe('Unique lead identifier');

/**
 * Correlation ID for request tracing
 */
export const CorrelationIdSchema = z
  .string()
  .min(1)
  .max(64)
  .describe('Correlation ID for distributed tracing');

/**
 * Probability-like score in [0, 1]
 */
export const UnitScoreSchema = z.number().min(0).max(1);

export type Email = z.infer<typeof EmailSchema>;
export type IsoTimestamp = z.infer<typeof IsoTimestampSchema>;
export type LeadId = z.infer<typeof LeadIdSchema>;
export type CorrelationId = z.infer<typeof CorrelationIdSchema>;
