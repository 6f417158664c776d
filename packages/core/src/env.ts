import { z } from 'zod';

import { ValidationError } from './errors.js';

/**
 * Environment Variable Validation
 * Turns the process environment into a typed workflow configuration at boot time
 */

const optionalInt = (min: number) => z.coerce.number().int().min(min).optional();

// Base server config
const ServerEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
});

// Database config
const DatabaseEnvSchema = z.object({
  DATABASE_URL: z.string().url().optional(),
  DATABASE_MAX_CONNECTIONS: optionalInt(1),
});

// Retry and timeout budget for port calls
const RetryEnvSchema = z.object({
  RETRY_MAX_ATTEMPTS: optionalInt(1),
  SCORING_MAX_ATTEMPTS: optionalInt(1),
  DRAFT_MAX_ATTEMPTS: optionalInt(1),
  SEND_MAX_ATTEMPTS: optionalInt(1),
  FOLLOW_UP_MAX_ATTEMPTS: optionalInt(1),
  SLOT_EXTRACTION_MAX_ATTEMPTS: optionalInt(1),
  BOOKING_MAX_ATTEMPTS: optionalInt(1),
  ANALYTICS_MAX_ATTEMPTS: optionalInt(1),
  RETRY_BASE_DELAY_MS: optionalInt(0),
  RETRY_MAX_DELAY_MS: optionalInt(0),
  PORT_TIMEOUT_MS: optionalInt(1),
  CONFLICT_MAX_RETRIES: optionalInt(0),
});

// Shortlisting rule
const ShortlistEnvSchema = z.object({
  SHORTLIST_TOP_K: optionalInt(1),
  SHORTLIST_MIN_SCORE: z.coerce.number().min(0).max(1).optional(),
  SHORTLIST_UNSELECTED: z.enum(['retain', 'abandon']).optional(),
  SHORTLIST_WAIT_FOR_SCORING: z
    .enum(['true', 'false'])
    .optional()
    .transform((v) => (v === undefined ? undefined : v === 'true')),
});

// Reply waiting, scheduler loop and analytics trigger
const SchedulerEnvSchema = z.object({
  REPLY_MAX_WAIT_DAYS: z.coerce.number().positive().optional(),
  REPLY_POLL_INTERVAL_MS: optionalInt(1),
  REPLY_MAX_FOLLOW_UPS: optionalInt(0),
  SCHEDULER_TICK_MS: optionalInt(1),
  SCHEDULER_CONCURRENCY: optionalInt(1),
  ANALYTICS_TRIGGER: z.enum(['any_stage', 'scheduled_only']).optional(),
});

export const WorkflowEnvSchema = ServerEnvSchema.merge(DatabaseEnvSchema)
  .merge(RetryEnvSchema)
  .merge(ShortlistEnvSchema)
  .merge(SchedulerEnvSchema);

export type WorkflowEnv = z.infer<typeof WorkflowEnvSchema>;

// =============================================================================
// Typed configuration
// =============================================================================

/** Ports whose calls carry their own retry budget */
export type RetryBudgetKey =
  | 'scoring'
  | 'drafting'
  | 'sending'
  | 'followUp'
  | 'slotExtraction'
  | 'booking'
  | 'analytics';

export interface WorkflowConfig {
  retry: {
    maxAttempts: Record<RetryBudgetKey, number>;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  port: {
    timeoutMs: number;
  };
  orchestrator: {
    /** Re-reads allowed after an optimistic-concurrency conflict within one advance */
    maxConflictRetries: number;
  };
  shortlist: {
    topK: number;
    minScore: number;
    unselected: 'retain' | 'abandon';
    waitForScoring: boolean;
  };
  reply: {
    maxWaitMs: number;
    pollIntervalMs: number;
    /** Follow-ups asking a willing lead for meeting times before giving up */
    maxFollowUps: number;
    followUpBody: string;
  };
  scheduler: {
    tickMs: number;
    concurrency: number;
  };
  analytics: {
    trigger: 'any_stage' | 'scheduled_only';
  };
}

export type WorkflowConfigOverrides = {
  [K in keyof WorkflowConfig]?: Partial<WorkflowConfig[K]>;
};

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_WORKFLOW_CONFIG: WorkflowConfig = {
  retry: {
    maxAttempts: {
      scoring: 3,
      drafting: 3,
      sending: 3,
      followUp: 3,
      slotExtraction: 3,
      booking: 3,
      analytics: 3,
    },
    baseDelayMs: 1000,
    maxDelayMs: 5 * 60 * 1000,
  },
  port: {
    timeoutMs: 30000,
  },
  orchestrator: {
    maxConflictRetries: 3,
  },
  shortlist: {
    topK: 2,
    minScore: 0,
    unselected: 'retain',
    waitForScoring: true,
  },
  reply: {
    maxWaitMs: 14 * DAY_MS,
    pollIntervalMs: 60000,
    maxFollowUps: 1,
    followUpBody:
      'Thanks for getting back to us. Could you share a few times this week that suit you for a 30-minute call?',
  },
  scheduler: {
    tickMs: 5000,
    concurrency: 4,
  },
  analytics: {
    trigger: 'any_stage',
  },
};

/**
 * Merge partial overrides over the defaults, one section deep
 */
export function resolveWorkflowConfig(overrides: WorkflowConfigOverrides = {}): WorkflowConfig {
  const base = DEFAULT_WORKFLOW_CONFIG;
  return {
    retry: {
      ...base.retry,
      ...overrides.retry,
      maxAttempts: { ...base.retry.maxAttempts, ...overrides.retry?.maxAttempts },
    },
    port: { ...base.port, ...overrides.port },
    orchestrator: { ...base.orchestrator, ...overrides.orchestrator },
    shortlist: { ...base.shortlist, ...overrides.shortlist },
    reply: { ...base.reply, ...overrides.reply },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    analytics: { ...base.analytics, ...overrides.analytics },
  };
}

/**
 * Validate environment variables
 *
 * @throws ValidationError listing every invalid variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): WorkflowEnv {
  const result = WorkflowEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const errorMessages = Object.entries(errors)
      .map(([field, messages]) => `  ${field}: ${(messages ?? []).join(', ')}`)
      .join('\n');

    throw new ValidationError(`Environment validation failed:\n${errorMessages}`, errors);
  }

  return result.data;
}

/**
 * Build the workflow configuration from the environment
 */
export function loadWorkflowConfig(env: NodeJS.ProcessEnv = process.env): WorkflowConfig {
  const parsed = validateEnv(env);
  const fallbackAttempts = parsed.RETRY_MAX_ATTEMPTS;
  const attempts = (value: number | undefined, key: RetryBudgetKey): number =>
    value ?? fallbackAttempts ?? DEFAULT_WORKFLOW_CONFIG.retry.maxAttempts[key];

  return resolveWorkflowConfig({
    retry: {
      maxAttempts: {
        scoring: attempts(parsed.SCORING_MAX_ATTEMPTS, 'scoring'),
        drafting: attempts(parsed.DRAFT_MAX_ATTEMPTS, 'drafting'),
        sending: attempts(parsed.SEND_MAX_ATTEMPTS, 'sending'),
        followUp: attempts(parsed.FOLLOW_UP_MAX_ATTEMPTS, 'followUp'),
        slotExtraction: attempts(parsed.SLOT_EXTRACTION_MAX_ATTEMPTS, 'slotExtraction'),
        booking: attempts(parsed.BOOKING_MAX_ATTEMPTS, 'booking'),
        analytics: attempts(parsed.ANALYTICS_MAX_ATTEMPTS, 'analytics'),
      },
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS ?? DEFAULT_WORKFLOW_CONFIG.retry.baseDelayMs,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS ?? DEFAULT_WORKFLOW_CONFIG.retry.maxDelayMs,
    },
    port: { timeoutMs: parsed.PORT_TIMEOUT_MS ?? DEFAULT_WORKFLOW_CONFIG.port.timeoutMs },
    orchestrator: {
      maxConflictRetries:
        parsed.CONFLICT_MAX_RETRIES ?? DEFAULT_WORKFLOW_CONFIG.orchestrator.maxConflictRetries,
    },
    shortlist: {
      topK: parsed.SHORTLIST_TOP_K ?? DEFAULT_WORKFLOW_CONFIG.shortlist.topK,
      minScore: parsed.SHORTLIST_MIN_SCORE ?? DEFAULT_WORKFLOW_CONFIG.shortlist.minScore,
      unselected: parsed.SHORTLIST_UNSELECTED ?? DEFAULT_WORKFLOW_CONFIG.shortlist.unselected,
      waitForScoring:
        parsed.SHORTLIST_WAIT_FOR_SCORING ?? DEFAULT_WORKFLOW_CONFIG.shortlist.waitForScoring,
    },
    reply: {
      maxWaitMs:
        parsed.REPLY_MAX_WAIT_DAYS !== undefined
          ? parsed.REPLY_MAX_WAIT_DAYS * DAY_MS
          : DEFAULT_WORKFLOW_CONFIG.reply.maxWaitMs,
      pollIntervalMs: parsed.REPLY_POLL_INTERVAL_MS ?? DEFAULT_WORKFLOW_CONFIG.reply.pollIntervalMs,
      maxFollowUps: parsed.REPLY_MAX_FOLLOW_UPS ?? DEFAULT_WORKFLOW_CONFIG.reply.maxFollowUps,
    },
    scheduler: {
      tickMs: parsed.SCHEDULER_TICK_MS ?? DEFAULT_WORKFLOW_CONFIG.scheduler.tickMs,
      concurrency: parsed.SCHEDULER_CONCURRENCY ?? DEFAULT_WORKFLOW_CONFIG.scheduler.concurrency,
    },
    analytics: {
      trigger: parsed.ANALYTICS_TRIGGER ?? DEFAULT_WORKFLOW_CONFIG.analytics.trigger,
    },
  });
}
