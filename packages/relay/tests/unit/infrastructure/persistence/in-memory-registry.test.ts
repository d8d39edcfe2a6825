/**
 * @file in-memory-registry.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { Hub } from '../../../../src/application/hub.js';
import { Connection } from '../../../../src/domain/entities/connection.js';
import { SessionId } from '../../../../src/domain/value-objects/session-id.js';
import {
  InMemoryHubRegistry,
  type HubFactory,
} from '../../../../src/infrastructure/persistence/in-memory-registry.js';
import { StubTransport, createSilentLogger, flush } from '../../../helpers/stub-transport.js';

const logger = createSilentLogger();

describe('InMemoryHubRegistry', () => {
  let idleTimeoutMs: number;
  let idleCallbacks: ((hub: Hub) => void)[];
  let createHub: Mock<HubFactory>;
  let registry: InMemoryHubRegistry;

  beforeEach(() => {
    idleTimeoutMs = 0;
    idleCallbacks = [];
    createHub = vi.fn<HubFactory>((sessionId, onIdle) => {
      idleCallbacks.push(onIdle);
      return new Hub({ sessionId, idleTimeoutMs, onIdle, logger });
    });
    registry = new InMemoryHubRegistry({ createHub, logger });
  });

  afterEach(async () => {
    await registry.closeAll();
  });

  describe('getOrCreateHub', () => {
    it('should create and start a hub on first use', () => {
      const hub = registry.getOrCreateHub(SessionId.create('abc'));

      expect(hub.isRunning).toBe(true);
      expect(registry.count()).toBe(1);
      expect(registry.hubsCreated).toBe(1);
    });

    it('should return the same hub for the same id', () => {
      const first = registry.getOrCreateHub(SessionId.create('abc'));
      const second = registry.getOrCreateHub(SessionId.create('abc'));

      expect(second).toBe(first);
      expect(createHub).toHaveBeenCalledTimes(1);
    });

    it('should create exactly one hub for concurrent first joins', async () => {
      const hubs = await Promise.all(
        Array.from({ length: 50 }, async () => registry.getOrCreateHub(SessionId.create('race')))
      );

      expect(new Set(hubs).size).toBe(1);
      expect(createHub).toHaveBeenCalledTimes(1);
      expect(registry.count()).toBe(1);
    });

    it('should keep sessions apart', () => {
      const a = registry.getOrCreateHub(SessionId.create('room-a'));
      const b = registry.getOrCreateHub(SessionId.create('room-b'));

      expect(a).not.toBe(b);
      expect(registry.count()).toBe(2);
    });
  });

  describe('get', () => {
    it('should not create a hub', () => {
      expect(registry.get(SessionId.create('missing'))).toBeUndefined();
      expect(registry.count()).toBe(0);
    });
  });

  describe('connectionCount', () => {
    it('should sum members across hubs', async () => {
      const hub = registry.getOrCreateHub(SessionId.create('abc'));
      for (const id of ['c1', 'c2']) {
        hub.register(
          new Connection({
            id,
            sessionId: hub.sessionId,
            hub,
            transport: new StubTransport(),
            outboundCapacity: 4,
          })
        );
      }
      registry.getOrCreateHub(SessionId.create('empty'));
      await flush();

      expect(registry.connectionCount()).toBe(2);
    });
  });

  describe('eviction', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should forget an idle hub and create a fresh one on the next join', async () => {
      idleTimeoutMs = 1000;
      const first = registry.getOrCreateHub(SessionId.create('abc'));

      vi.advanceTimersByTime(1000);
      await flush();
      expect(registry.count()).toBe(0);
      expect(first.isRunning).toBe(false);

      const second = registry.getOrCreateHub(SessionId.create('abc'));
      expect(second).not.toBe(first);
      expect(second.isRunning).toBe(true);
      expect(registry.hubsCreated).toBe(2);
    });

    it('should not remove a newer hub under the same id', async () => {
      const first = registry.getOrCreateHub(SessionId.create('abc'));
      await registry.closeAll();
      const second = registry.getOrCreateHub(SessionId.create('abc'));

      const [onFirstIdle] = idleCallbacks;
      onFirstIdle?.(first);

      expect(registry.get(SessionId.create('abc'))).toBe(second);
    });
  });

  describe('closeAll', () => {
    it('should stop and forget every hub', async () => {
      const a = registry.getOrCreateHub(SessionId.create('a'));
      const b = registry.getOrCreateHub(SessionId.create('b'));

      await registry.closeAll();

      expect(a.isRunning).toBe(false);
      expect(b.isRunning).toBe(false);
      expect(registry.count()).toBe(0);
    });
  });
});
