/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Hub } from '../../application/hub.js';
import type { HubRegistry } from '../../domain/ports/hub-registry.js';
import type { SessionId } from '../../domain/value-objects/session-id.js';

/**
 * Builds an unstarted hub. `onIdle` must be handed to the hub so that an
 * evicted hub leaves the registry.
 */
export type HubFactory = (sessionId: SessionId, onIdle: (hub: Hub) => void) => Hub;

export interface InMemoryHubRegistryDeps {
  createHub: HubFactory;
  logger: Logger;
}

/**
 * In-memory implementation of HubRegistry.
 * Stores hubs in a Map indexed by session ID.
 *
 * Lookup and insert-on-miss run synchronously in one turn of the event loop,
 * so two joins for the same new session can never both create a hub.
 */
export class InMemoryHubRegistry implements HubRegistry<Hub> {
  private readonly hubs = new Map<string, Hub>();
  private readonly createHub: HubFactory;
  private readonly logger: Logger;
  private _hubsCreated = 0;

  constructor(deps: InMemoryHubRegistryDeps) {
    this.createHub = deps.createHub;
    this.logger = deps.logger.child({ component: 'HubRegistry' });
  }

  /**
   * Total hubs created since startup, evicted ones included.
   */
  get hubsCreated(): number {
    return this._hubsCreated;
  }

  getOrCreateHub(sessionId: SessionId): Hub {
    const existing = this.hubs.get(sessionId.value);
    if (existing) {
      return existing;
    }

    const hub = this.createHub(sessionId, (idle) => this.evict(idle));
    this.hubs.set(sessionId.value, hub);
    this._hubsCreated++;
    hub.start();

    this.logger.info(
      { sessionId: sessionId.value, hubs: this.hubs.size },
      'Session hub created'
    );
    return hub;
  }

  get(sessionId: SessionId): Hub | undefined {
    return this.hubs.get(sessionId.value);
  }

  getAll(): Hub[] {
    return Array.from(this.hubs.values());
  }

  count(): number {
    return this.hubs.size;
  }

  connectionCount(): number {
    return this.getAll().reduce((total, hub) => total + hub.memberCount, 0);
  }

  async closeAll(): Promise<void> {
    const hubs = this.getAll();
    this.hubs.clear();
    await Promise.all(hubs.map((hub) => hub.stop()));
    this.logger.info({ closed: hubs.length }, 'All session hubs stopped');
  }

  private evict(hub: Hub): void {
    // A newer hub may already own the id; only the evicted instance is removed
    if (this.hubs.get(hub.sessionId.value) !== hub) {
      return;
    }
    this.hubs.delete(hub.sessionId.value);
    this.logger.info(
      { sessionId: hub.sessionId.value, hubs: this.hubs.size },
      'Idle session hub evicted'
    );
  }
}
