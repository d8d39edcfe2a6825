/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  InvalidSessionIdError,
  SessionClosedError,
  ExecutionUnavailableError,
} from './domain-errors.js';
