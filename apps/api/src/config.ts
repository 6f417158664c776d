/**
 * Application configuration
 *
 * Loads and validates environment variables
 */

import { loadWorkflowConfig, validateEnv, type WorkflowConfig, type WorkflowEnv } from '@leadflow/core';

export interface ApiConfig {
  env: WorkflowEnv['NODE_ENV'];
  isDev: boolean;
  isProd: boolean;
  server: {
    port: number;
    host: string;
  };
  logger: {
    level: WorkflowEnv['LOG_LEVEL'];
  };
  database: {
    url: string | undefined;
    maxConnections: number | undefined;
  };
  workflow: WorkflowConfig;
}

/**
 * Throws a ValidationError naming every invalid variable
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): ApiConfig {
  const env = validateEnv(source);

  return {
    env: env.NODE_ENV,
    isDev: env.NODE_ENV === 'development',
    isProd: env.NODE_ENV === 'production',
    server: {
      port: env.PORT,
      host: env.HOST,
    },
    logger: {
      level: env.LOG_LEVEL,
    },
    database: {
      url: env.DATABASE_URL,
      maxConnections: env.DATABASE_MAX_CONNECTIONS,
    },
    workflow: loadWorkflowConfig(source),
  };
}
