/**
 * @module @leadflow/api
 * @description HTTP surface and composition root of the lead workflow
 */

export { buildApp, type BuildAppOptions } from './app.js';
export { loadConfig, type ApiConfig } from './config.js';
export {
  createServer,
  createUnconfiguredPorts,
  type CreateServerOptions,
  type Server,
} from './server.js';
