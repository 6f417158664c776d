/**
 * @fileoverview Secondary Port - SchedulingPort
 *
 * Reading replies for intent and meeting times, and calendar booking.
 *
 * @module application/ports/secondary/external/SchedulingPort
 */

import type { Sentiment } from '@leadflow/types';

export interface ReplyReading {
  /** Whether the lead wants a meeting at all */
  readonly intent: Sentiment;
  /** Candidate meeting times mentioned in the reply, ISO 8601, best first */
  readonly slots: readonly string[];
}

export type BookingOutcome =
  | {
      readonly status: 'booked';
      readonly bookingId: string;
      readonly calendarLink?: string;
    }
  | {
      readonly status: 'conflict';
      readonly reason?: string;
    };

export interface SchedulingPort {
  readReply(replyText: string): Promise<ReplyReading>;

  /**
   * Book `slot`. Repeating a call with the same `idempotencyToken` must not
   * create a second booking.
   */
  book(leadId: string, slot: string, idempotencyToken: string): Promise<BookingOutcome>;
}
