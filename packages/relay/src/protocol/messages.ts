/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

// ============================================================================
// Session Messages
// ============================================================================

/**
 * Client → Session: the sender's whole editor buffer.
 * The relay forwards it untouched to every member, the sender included.
 */
export interface CodeUpdateMessage {
  type: 'code_update';
  content: string;
}

// ============================================================================
// HTTP Messages
// ============================================================================

/**
 * Error codes used in HTTP error responses
 */
export type ErrorCode =
  | 'INVALID_PAYLOAD'
  | 'INVALID_SESSION_ID'
  | 'METHOD_NOT_ALLOWED'
  | 'NOT_FOUND'
  | 'SESSION_CLOSED'
  | 'EXECUTION_UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * Server → Client: JSON error body
 */
export interface ErrorResponse {
  error: string;
  code: ErrorCode;
  details?: unknown;
}
