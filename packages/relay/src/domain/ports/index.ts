/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { MessageTransport, TransportData } from './message-transport.js';
export { TransportState } from './message-transport.js';
export type { SessionHub } from './session-hub.js';
export type { HubRegistry } from './hub-registry.js';
export type {
  CodeExecutor,
  ExecutionLanguage,
  ExecutionResult,
} from './code-executor.js';
