/**
 * Idempotency keys for side-effecting port calls
 *
 * A key is derived from the lead, the stage and the attempt counter of that
 * stage, so re-running the same attempt after a crash or a lost save hands the
 * port the same key, while a genuine retry gets a new one.
 */

import crypto from 'crypto';

/**
 * Generate an idempotency key from components
 *
 * Creates a deterministic key by hashing the input components.
 * Same inputs will always produce the same key.
 *
 * @returns First 32 hex characters of the SHA-256 of the joined components
 */
export function createIdempotencyKey(...components: (string | number | undefined | null)[]): string {
  const filtered = components
    .filter((c): c is string | number => c !== undefined && c !== null)
    .map((c) => String(c));

  if (filtered.length === 0) {
    throw new Error('At least one non-null component is required for idempotency key');
  }

  const input = filtered.join(':');
  return crypto.createHash('sha256').update(input).digest('hex').slice(0, 32);
}

/**
 * Generate an idempotency key with a namespace prefix
 *
 * @param namespace - Namespace prefix (e.g., 'send', 'book')
 */
export function createNamespacedIdempotencyKey(
  namespace: string,
  ...components: (string | number | undefined | null)[]
): string {
  return `${namespace}:${createIdempotencyKey(...components)}`;
}

/**
 * Key generators for the workflow's external effects
 */
export const IdempotencyKeys = {
  /** Outbound message for a lead; one per SENT attempt */
  send: (leadId: string, attempt: number): string =>
    createNamespacedIdempotencyKey('send', leadId, 'SENT', attempt),

  /** Follow-up asking for meeting times; one per follow-up number and attempt */
  followUp: (leadId: string, followUp: number, attempt: number): string =>
    createNamespacedIdempotencyKey('follow-up', leadId, 'AWAITING_REPLY', followUp, attempt),

  /** Calendar booking for a lead; one per SCHEDULED attempt */
  book: (leadId: string, attempt: number): string =>
    createNamespacedIdempotencyKey('book', leadId, 'SCHEDULED', attempt),

  /** Approval request, unique per gate and reset instance */
  approval: (leadId: string, gate: string, instance: number): string =>
    createNamespacedIdempotencyKey('approval', leadId, gate, instance),
};
