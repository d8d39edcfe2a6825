/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  createRelayServer,
  type RelayServer,
  type RelayServerOptions,
} from './relay-server.js';
export { createApp, type RelayApp } from './app.js';
export { EnvSchema, getEnv, loadEnv, type Env } from './config/env.js';
export * from './config/constants.js';
export * from './domain/index.js';
export * from './application/index.js';
export * from './protocol/index.js';
export {
  InMemoryHubRegistry,
  type HubFactory,
} from './infrastructure/persistence/in-memory-registry.js';
export {
  ProcessExecutor,
  type ProcessExecutorConfig,
} from './infrastructure/execution/process-executor.js';
export {
  createLogger,
  createSessionLogger,
  type LoggerConfig,
  type SessionLogBindings,
} from './infrastructure/logging/pino-logger.js';
export * from './infrastructure/websocket/index.js';
export { BoundedQueue, type OfferResult } from './utils/bounded-queue.js';
