/**
 * @file code-executor.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { EXECUTION_CONFIG } from '../../config/constants.js';

export type ExecutionLanguage = (typeof EXECUTION_CONFIG.LANGUAGES)[number];

/**
 * Result of compiling or running submitted code.
 */
export type ExecutionResult =
  | { ok: true; payload: Buffer; contentType: string }
  | { ok: false; diagnostics: string };

/**
 * Port (interface) for the compile/run facility behind POST /compile.
 */
export interface CodeExecutor {
  /**
   * Compiles or runs the code. Build errors, non-zero exits and timeouts
   * resolve as `{ ok: false }`; a missing toolchain rejects.
   */
  execute(code: string, language: ExecutionLanguage): Promise<ExecutionResult>;
}
