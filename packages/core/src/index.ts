export { createLogger, type Logger, type LoggerConfig } from './logger/index.js';

export {
  AppError,
  ValidationError,
  ServiceError,
  PortTimeoutError,
  ConflictError,
  ApprovalRejectedError,
  RetryExhaustedError,
  NotFoundError,
  InvalidTransitionError,
  DatabaseOperationError,
  isOperationalError,
  classifyError,
  toError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  computeBackoffDelay,
  withTimeout,
  forEachWithConcurrency,
  generateCorrelationId,
} from './utils.js';

export {
  createIdempotencyKey,
  createNamespacedIdempotencyKey,
  IdempotencyKeys,
} from './idempotency.js';

export {
  WorkflowEnvSchema,
  DEFAULT_WORKFLOW_CONFIG,
  validateEnv,
  loadWorkflowConfig,
  resolveWorkflowConfig,
  type WorkflowEnv,
  type WorkflowConfig,
  type WorkflowConfigOverrides,
  type RetryBudgetKey,
} from './env.js';
