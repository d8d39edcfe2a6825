/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { EXECUTION_CONFIG } from '../config/constants.js';
import type { CodeUpdateMessage } from './messages.js';

// ============================================================================
// Session Schemas
// ============================================================================

export const CodeUpdateMessageSchema = z.object({
  type: z.literal('code_update'),
  content: z.string(),
}) satisfies z.ZodType<CodeUpdateMessage>;

// ============================================================================
// HTTP Schemas
// ============================================================================

export const CompileRequestSchema = z.object({
  code: z.string({ required_error: 'Code is required' }),
  language: z.enum(EXECUTION_CONFIG.LANGUAGES).default(EXECUTION_CONFIG.DEFAULT_LANGUAGE),
});

// ============================================================================
// Base Message Schema
// ============================================================================

export const BaseMessageSchema = z.object({
  type: z.string(),
});

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Safely parses a JSON frame as a code update.
 * Returns undefined for anything else.
 */
export function parseCodeUpdate(frame: string): CodeUpdateMessage | undefined {
  const result = CodeUpdateMessageSchema.safeParse(parseJson(frame));
  if (result.success) {
    return result.data;
  }
  return undefined;
}

/**
 * Reads the `type` field of a JSON frame for log context.
 * Frames are opaque to the relay, so undefined is an ordinary answer.
 */
export function getMessageType(frame: string): string | undefined {
  const result = BaseMessageSchema.safeParse(parseJson(frame));
  if (result.success) {
    return result.data.type;
  }
  return undefined;
}

function parseJson(frame: string): unknown {
  try {
    return JSON.parse(frame);
  } catch {
    return undefined;
  }
}
