/**
 * Composition root: wires stores, the approval gate, the orchestrator, the
 * scheduler and the HTTP app together.
 */

import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { Pool } from 'pg';

import {
  LeadWorkflowService,
  WorkflowOrchestrator,
  WorkflowScheduler,
  type WorkflowPorts,
} from '@leadflow/application';
import { ServiceError, createLogger, type WorkflowConfig } from '@leadflow/core';
import {
  ApprovalGate,
  type ApprovalNotifier,
  type ApprovalRepository,
  type LeadRecordStore,
} from '@leadflow/domain';
import {
  InMemoryApprovalRepository,
  InMemoryLeadRecordStore,
  LoggingApprovalNotifier,
  PostgresApprovalRepository,
  PostgresLeadRecordStore,
  applyWorkflowSchema,
  createPool,
} from '@leadflow/infrastructure';

import { buildApp } from './app.js';

const logger = createLogger({ name: 'server' });

export interface CreateServerOptions {
  config: WorkflowConfig;
  /** Adapters for scoring, outreach, scheduling and analytics. Without them the scheduler stays off. */
  ports?: WorkflowPorts;
  store?: LeadRecordStore;
  approvalRepository?: ApprovalRepository;
  notifier?: ApprovalNotifier;
  database?: { url: string; maxConnections?: number };
  clock?: () => Date;
  httpLogger?: FastifyServerOptions['logger'];
}

export interface Server {
  app: FastifyInstance;
  orchestrator: WorkflowOrchestrator;
  scheduler: WorkflowScheduler;
  /** True when real adapters were supplied and the scheduler may run */
  schedulerEnabled: boolean;
  close(): Promise<void>;
}

/**
 * Port set used when no adapters are configured; every call fails as a
 * service error so the failure lands in the lead's retry budget.
 */
export function createUnconfiguredPorts(): WorkflowPorts {
  const missing = (service: string) => (): never => {
    throw new ServiceError(service, `No ${service} adapter configured`);
  };

  return {
    scoring: { score: missing('scoring') },
    outreach: {
      draft: missing('outreach'),
      send: missing('outreach'),
      pollReplies: missing('outreach'),
    },
    scheduling: {
      readReply: missing('scheduling'),
      book: missing('scheduling'),
    },
    analytics: { analyze: missing('analytics') },
  };
}

export async function createServer(options: CreateServerOptions): Promise<Server> {
  let pool: Pool | null = null;
  let store = options.store;
  let approvalRepository = options.approvalRepository;

  if ((!store || !approvalRepository) && options.database) {
    pool = createPool({
      connectionString: options.database.url,
      maxConnections: options.database.maxConnections,
    });
    await applyWorkflowSchema(pool);
    store ??= new PostgresLeadRecordStore({ pool });
    approvalRepository ??= new PostgresApprovalRepository({ pool });
    logger.info('Using PostgreSQL persistence');
  }

  if (!store || !approvalRepository) {
    logger.warn('No database configured; lead records live in memory only');
    store ??= new InMemoryLeadRecordStore();
    approvalRepository ??= new InMemoryApprovalRepository();
  }

  const approvals = new ApprovalGate({
    repository: approvalRepository,
    notifier: options.notifier ?? new LoggingApprovalNotifier(),
    clock: options.clock,
  });

  const orchestrator = new WorkflowOrchestrator({
    store,
    approvals,
    ports: options.ports ?? createUnconfiguredPorts(),
    config: options.config,
    clock: options.clock,
  });

  const scheduler = new WorkflowScheduler({
    orchestrator,
    config: options.config,
    clock: options.clock,
  });

  const useCase = new LeadWorkflowService({ orchestrator, approvals });
  const app = await buildApp({ useCase, logger: options.httpLogger });

  return {
    app,
    orchestrator,
    scheduler,
    schedulerEnabled: options.ports !== undefined,
    async close() {
      await scheduler.stop();
      await app.close();
      if (pool) await pool.end();
    },
  };
}
