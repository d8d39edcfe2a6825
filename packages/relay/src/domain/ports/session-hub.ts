/**
 * @file session-hub.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Connection, UnregisterReason } from '../entities/connection.js';
import type { SessionId } from '../value-objects/session-id.js';

/**
 * Port (interface) for the broadcast actor owning one session's membership.
 *
 * Every operation only posts an event to the hub's mailbox and returns
 * whether it was accepted; a stopped hub accepts nothing.
 */
export interface SessionHub {
  readonly sessionId: SessionId;

  /**
   * Adds a connection to the session.
   */
  register(connection: Connection): boolean;

  /**
   * Removes a connection from the session. Idempotent.
   */
  unregister(connection: Connection, reason: UnregisterReason): boolean;

  /**
   * Delivers a payload to every member, the origin included.
   */
  broadcast(payload: string, origin?: Connection): boolean;
}
