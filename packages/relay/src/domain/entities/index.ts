/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  Connection,
  type ConnectionProps,
  type ConnectionState,
  type EnqueueResult,
  type UnregisterReason,
} from './connection.js';
