/**
 * @file connection.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Connection } from '../../../src/domain/entities/connection.js';
import type { SessionHub } from '../../../src/domain/ports/session-hub.js';
import { SessionId } from '../../../src/domain/value-objects/session-id.js';
import { StubTransport } from '../../helpers/stub-transport.js';

describe('Connection', () => {
  const sessionId = SessionId.create('test-session');
  let hub: SessionHub;
  let transport: StubTransport;

  function createConnection(outboundCapacity = 2): Connection {
    return new Connection({ id: 'conn-1', sessionId, hub, transport, outboundCapacity });
  }

  beforeEach(() => {
    hub = {
      sessionId,
      register: vi.fn(() => true),
      unregister: vi.fn(() => true),
      broadcast: vi.fn(() => true),
    };
    transport = new StubTransport();
  });

  describe('state', () => {
    it('should move connecting → registered → active', () => {
      const connection = createConnection();
      expect(connection.state).toBe('connecting');

      connection.markRegistered();
      expect(connection.state).toBe('registered');

      connection.markActive();
      expect(connection.state).toBe('active');
      expect(connection.isAlive).toBe(true);
    });

    it('should not activate a connection that never registered', () => {
      const connection = createConnection();
      connection.markActive();
      expect(connection.state).toBe('connecting');
    });

    it('should report the first markUnregistering only', () => {
      const connection = createConnection();
      connection.markRegistered();

      expect(connection.markUnregistering()).toBe(true);
      expect(connection.markUnregistering()).toBe(false);
      expect(connection.state).toBe('unregistering');
      expect(connection.isAlive).toBe(false);
    });

    it('should be closed after release', () => {
      const connection = createConnection();
      connection.release();
      expect(connection.state).toBe('closed');
      expect(connection.markUnregistering()).toBe(false);
    });
  });

  describe('enqueue', () => {
    it('should report overflow once the outbound queue is at capacity', () => {
      const connection = createConnection(2);
      connection.markRegistered();

      expect(connection.enqueue('a')).toBe('queued');
      expect(connection.enqueue('b')).toBe('queued');
      expect(connection.enqueue('c')).toBe('overflow');
      expect(connection.pendingOutbound).toBe(2);
    });

    it('should refuse frames once unregistering', () => {
      const connection = createConnection();
      connection.markUnregistering();
      expect(connection.enqueue('a')).toBe('closed');
    });

    it('should yield queued frames in order until released', async () => {
      const connection = createConnection(3);
      connection.enqueue('first');
      connection.enqueue('second');

      const iterator = connection.outbound[Symbol.asyncIterator]();
      expect(await iterator.next()).toEqual({ value: 'first', done: false });
      expect(await iterator.next()).toEqual({ value: 'second', done: false });

      connection.release();
      expect(await iterator.next()).toEqual({ value: undefined, done: true });
    });
  });

  describe('release', () => {
    it('should return the number of unsent frames', () => {
      const connection = createConnection(4);
      connection.enqueue('a');
      connection.enqueue('b');
      connection.enqueue('c');

      expect(connection.release()).toBe(3);
      expect(connection.pendingOutbound).toBe(0);
    });
  });

  describe('disconnect', () => {
    it('should close the transport with the given code and reason', () => {
      const connection = createConnection();
      connection.disconnect(1013, 'Message queue overflow');

      expect(transport.closeCalls).toEqual([{ code: 1013, reason: 'Message queue overflow' }]);
      expect(transport.terminated).toBe(false);
      expect(connection.isAlive).toBe(false);
    });

    it('should terminate when close throws', () => {
      transport.closeThrows = true;
      const connection = createConnection();
      connection.disconnect(1001, 'Session closed');

      expect(transport.terminated).toBe(true);
    });
  });

  describe('terminate', () => {
    it('should destroy the transport', () => {
      const connection = createConnection();
      connection.terminate();

      expect(transport.terminated).toBe(true);
      expect(connection.state).toBe('unregistering');
    });
  });
});
