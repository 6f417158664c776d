/**
 * @fileoverview Approval notifier that writes approval traffic to the log
 *
 * Default adapter for the ApprovalNotifier port when no chat or mail channel
 * is wired up. The payload (draft body, slots) is left out of the entry.
 *
 * @module @leadflow/infrastructure/notifications/logging-approval-notifier
 */

import { createLogger, type Logger } from '@leadflow/core';
import type { ApprovalEvent, ApprovalEventType, ApprovalNotifier } from '@leadflow/domain';

const MESSAGES: Record<ApprovalEventType, string> = {
  'approval.requested': 'Approval awaiting review',
  'approval.resolved': 'Approval decision recorded',
  'approval.superseded': 'Approval withdrawn, lead left the gate',
};

export class LoggingApprovalNotifier implements ApprovalNotifier {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger({ name: 'approval-notifier' });
  }

  notify(event: ApprovalEvent): Promise<void> {
    const { token, leadId, gate, status } = event.payload;
    this.logger.info(
      { eventId: event.metadata.eventId, type: event.type, token, leadId, gate, status },
      MESSAGES[event.type]
    );
    return Promise.resolve();
  }
}
