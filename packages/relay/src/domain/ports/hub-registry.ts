/**
 * @file hub-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { SessionHub } from './session-hub.js';
import type { SessionId } from '../value-objects/session-id.js';

/**
 * Port (interface) for the session id → hub lookup/creation service.
 */
export interface HubRegistry<THub extends SessionHub = SessionHub> {
  /**
   * Returns the hub for a session, creating and starting it on first use.
   * Concurrent callers with the same id always observe the same hub.
   */
  getOrCreateHub(sessionId: SessionId): THub;

  /**
   * Retrieves a hub without creating it.
   */
  get(sessionId: SessionId): THub | undefined;

  /**
   * Returns the number of live hubs.
   */
  count(): number;

  /**
   * Returns the number of connections across all hubs.
   */
  connectionCount(): number;

  /**
   * Stops every hub and forgets it.
   */
  closeAll(): Promise<void>;
}
