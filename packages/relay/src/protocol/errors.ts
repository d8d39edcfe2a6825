/**
 * @file errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { ErrorCode, ErrorResponse } from './messages.js';

/**
 * Creates an error body in the HTTP response format.
 */
export function createErrorResponse(
  code: ErrorCode,
  message: string,
  details?: unknown
): ErrorResponse {
  const result: ErrorResponse = {
    error: message,
    code,
  };

  if (details !== undefined) {
    result.details = details;
  }

  return result;
}

/**
 * Predefined error body factories for common error scenarios.
 */
export const HttpErrors = {
  invalidPayload: (message: string, details?: unknown) =>
    createErrorResponse('INVALID_PAYLOAD', message, details),

  methodNotAllowed: (method: string) =>
    createErrorResponse('METHOD_NOT_ALLOWED', `Method not allowed: ${method}`),

  notFound: () => createErrorResponse('NOT_FOUND', 'Not Found'),

  internalError: (message = 'An internal error occurred') =>
    createErrorResponse('INTERNAL_ERROR', message),
} as const;
