/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Base class for all domain errors.
 * Provides structured error information for protocol responses.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a join request carries no session id.
 */
export class InvalidSessionIdError extends DomainError {
  readonly code = 'INVALID_SESSION_ID';
  readonly statusCode = 400;

  constructor() {
    super('Session ID is required');
  }
}

/**
 * Error thrown when a connection tries to join a hub that has stopped.
 */
export class SessionClosedError extends DomainError {
  readonly code = 'SESSION_CLOSED';
  readonly statusCode = 503;

  constructor(sessionId: string) {
    super(`Session is closed: ${sessionId}`);
  }
}

/**
 * Error thrown when the compiler or runtime for a language is not installed.
 */
export class ExecutionUnavailableError extends DomainError {
  readonly code = 'EXECUTION_UNAVAILABLE';
  readonly statusCode = 503;

  constructor(command: string) {
    super(`Execution toolchain is not available: ${command}`);
  }
}
