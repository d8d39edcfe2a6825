/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { Hub, type HubDeps } from './hub.js';

export {
  JoinSessionUseCase,
  type JoinSessionParams,
  type JoinSessionDeps,
} from './join-session.js';
