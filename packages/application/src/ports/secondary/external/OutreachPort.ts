/**
 * @fileoverview Secondary Port - OutreachPort
 *
 * Draft generation, mail transport and inbox polling.
 *
 * @module application/ports/secondary/external/OutreachPort
 */

import type { ContactProfile, Draft } from '@leadflow/types';

export interface OutboundMessage {
  readonly to: string;
  readonly subject: string;
  readonly body: string;
}

export interface SendOutcome {
  /** Transport message id */
  readonly messageId: string;
  /** ISO 8601 time the transport accepted the message */
  readonly sentAt: string;
}

export interface InboundReply {
  readonly leadId: string;
  readonly replyText: string;
  /** ISO 8601 */
  readonly receivedAt: string;
  /**
   * Position of this reply in the inbox. Cursors from one adapter sort as
   * strings in arrival order; they are only ever compared with each other.
   */
  readonly cursor: string;
}

export interface OutreachPort {
  draft(profile: ContactProfile): Promise<Draft>;

  /**
   * Deliver a message. A second call with the same `idempotencyToken` must
   * return the first outcome without sending again.
   */
  send(leadId: string, message: OutboundMessage, idempotencyToken: string): Promise<SendOutcome>;

  /**
   * Lazily yield replies received at or after `since` (ISO 8601), oldest
   * first. Replies already seen may be yielded again.
   */
  pollReplies(since: string): AsyncIterable<InboundReply>;
}
