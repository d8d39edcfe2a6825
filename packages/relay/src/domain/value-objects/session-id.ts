/**
 * @file session-id.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { InvalidSessionIdError } from '../errors/domain-errors.js';

/**
 * Value object representing a collaborative session identifier.
 * The id is opaque: any non-blank string names a session, verbatim.
 */
export class SessionId {
  private readonly _value: string;

  private constructor(value: string) {
    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  static create(value: string | undefined): SessionId {
    if (!value || value.trim().length === 0) {
      throw new InvalidSessionIdError();
    }
    return new SessionId(value);
  }

  static generate(generator: () => string): SessionId {
    return SessionId.create(generator());
  }

  equals(other: SessionId): boolean {
    return this._value === other._value;
  }

  toString(): string {
    return this._value;
  }
}
