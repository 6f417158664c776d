/**
 * @fileoverview Workflow Scheduler
 *
 * Cooperative timer loop around the orchestrator. A tick polls the inbox
 * when due, sweeps reply timeouts, runs the shortlist batch and then advances
 * every runnable lead with bounded concurrency. Waits on approvals and replies
 * never block a tick; they are simply looked at again on the next one.
 *
 * @module application/use-cases/workflow/WorkflowScheduler
 */

import { createLogger, forEachWithConcurrency, type Logger, type WorkflowConfig } from '@leadflow/core';

import type { ShortlistStatus, WorkflowOrchestrator } from './WorkflowOrchestrator.js';

export interface WorkflowSchedulerOptions {
  orchestrator: WorkflowOrchestrator;
  config: WorkflowConfig;
  clock?: () => Date;
  logger?: Logger;
}

export interface TickReport {
  startedAt: string;
  repliesPolled: boolean;
  repliesReceived: number;
  timedOut: number;
  shortlist: ShortlistStatus | 'error';
  advanced: number;
  changed: number;
  skipped: number;
  failures: number;
}

export class WorkflowScheduler {
  private readonly orchestrator: WorkflowOrchestrator;
  private readonly config: WorkflowConfig;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  private readonly inFlight = new Set<string>();
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private activeTick: Promise<TickReport> | null = null;
  private lastReplyPollAt: number | null = null;

  constructor(options: WorkflowSchedulerOptions) {
    this.orchestrator = options.orchestrator;
    this.config = options.config;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger({ name: 'workflow-scheduler' });
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.logger.info({ tickMs: this.config.scheduler.tickMs }, 'Scheduler started');
    this.scheduleNext(0);
  }

  /**
   * Stop the loop and wait for the tick in progress, if any
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.activeTick !== null) {
      await this.activeTick;
    }
    this.logger.info('Scheduler stopped');
  }

  /**
   * Run one tick now. Overlapping calls share the tick in progress.
   */
  tick(): Promise<TickReport> {
    if (this.activeTick === null) {
      this.activeTick = this.runTick().finally(() => {
        this.activeTick = null;
      });
    }
    return this.activeTick;
  }

  private scheduleNext(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick()
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Scheduler tick failed');
        })
        .finally(() => {
          if (this.running) this.scheduleNext(this.config.scheduler.tickMs);
        });
    }, delayMs);
  }

  private async runTick(): Promise<TickReport> {
    const now = this.clock();
    const report: TickReport = {
      startedAt: now.toISOString(),
      repliesPolled: false,
      repliesReceived: 0,
      timedOut: 0,
      shortlist: 'idle',
      advanced: 0,
      changed: 0,
      skipped: 0,
      failures: 0,
    };

    if (this.replyPollDue(now)) {
      this.lastReplyPollAt = now.getTime();
      report.repliesPolled = true;
      try {
        const polled = await this.orchestrator.pollReplies();
        report.repliesReceived = polled.received;
      } catch (error) {
        report.failures++;
        this.logger.error({ err: error }, 'Reply poll failed');
      }
    }

    try {
      report.timedOut = (await this.orchestrator.sweepReplyTimeouts()).length;
    } catch (error) {
      report.failures++;
      this.logger.error({ err: error }, 'Reply timeout sweep failed');
    }

    try {
      report.shortlist = (await this.orchestrator.shortlistBatch()).status;
    } catch (error) {
      report.failures++;
      report.shortlist = 'error';
      this.logger.error({ err: error }, 'Shortlist batch failed');
    }

    const runnable = await this.orchestrator.listRunnable(now);
    await forEachWithConcurrency(runnable, this.config.scheduler.concurrency, async (lead) => {
      if (this.inFlight.has(lead.id)) {
        report.skipped++;
        return;
      }
      this.inFlight.add(lead.id);
      try {
        const result = await this.orchestrator.advance(lead.id);
        report.advanced++;
        if (result.changed) report.changed++;
      } catch (error) {
        report.failures++;
        this.logger.error({ err: error, leadId: lead.id, stage: lead.stage }, 'Advance failed');
      } finally {
        this.inFlight.delete(lead.id);
      }
    });

    this.logger.debug({ ...report }, 'Tick complete');
    return report;
  }

  private replyPollDue(now: Date): boolean {
    return (
      this.lastReplyPollAt === null ||
      now.getTime() - this.lastReplyPollAt >= this.config.reply.pollIntervalMs
    );
  }
}

export function createWorkflowScheduler(options: WorkflowSchedulerOptions): WorkflowScheduler {
  return new WorkflowScheduler(options);
}
