/**
 * @file websocket-server.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createServer, IncomingMessage, type Server } from 'node:http';
import { Socket } from 'node:net';
import { Duplex } from 'node:stream';
import { Hub } from '../../../../src/application/hub.js';
import { JoinSessionUseCase } from '../../../../src/application/join-session.js';
import { InMemoryHubRegistry } from '../../../../src/infrastructure/persistence/in-memory-registry.js';
import { ConnectionHandler } from '../../../../src/infrastructure/websocket/connection-handler.js';
import { WebSocketServerWrapper } from '../../../../src/infrastructure/websocket/websocket-server.js';
import { createSilentLogger } from '../../../helpers/stub-transport.js';

const logger = createSilentLogger();

function createUpgradeRequest(url: string): IncomingMessage {
  const request = new IncomingMessage(new Socket());
  request.url = url;
  return request;
}

function createRecordingSocket(written: string[]): Duplex {
  return new Duplex({
    read() {},
    write(chunk, _encoding, callback) {
      written.push(String(chunk));
      callback();
    },
  });
}

describe('WebSocketServerWrapper', () => {
  let registry: InMemoryHubRegistry;
  let httpServer: Server;
  let wsServer: WebSocketServerWrapper;

  beforeEach(() => {
    registry = new InMemoryHubRegistry({
      createHub: (sessionId, onIdle) => new Hub({ sessionId, idleTimeoutMs: 0, onIdle, logger }),
      logger,
    });
    const joinSession = new JoinSessionUseCase({
      hubRegistry: registry,
      outboundCapacity: 8,
      generateConnectionId: () => 'conn-1',
      logger,
    });

    httpServer = createServer();
    wsServer = new WebSocketServerWrapper(
      { path: '/ws', maxPayloadBytes: 1024, heartbeatIntervalMs: 60_000 },
      { connectionHandler: new ConnectionHandler({ joinSession, logger }), logger }
    );
    wsServer.attach(httpServer);
  });

  afterEach(async () => {
    await wsServer.close(100);
    await registry.closeAll();
  });

  describe('rejected upgrades', () => {
    it('should answer a join without a session id with 400', () => {
      const written: string[] = [];
      const socket = createRecordingSocket(written);

      httpServer.emit('upgrade', createUpgradeRequest('/ws/'), socket, Buffer.alloc(0));

      const response = written.join('');
      expect(response.startsWith('HTTP/1.1 400 Bad Request\r\n')).toBe(true);
      expect(response.endsWith('\r\n\r\nMissing session id')).toBe(true);
    });

    it('should answer a path outside the join prefix with 404', () => {
      const written: string[] = [];
      const socket = createRecordingSocket(written);

      httpServer.emit('upgrade', createUpgradeRequest('/elsewhere'), socket, Buffer.alloc(0));

      const response = written.join('');
      expect(response.startsWith('HTTP/1.1 404 Not Found\r\n')).toBe(true);
      expect(response.endsWith('\r\n\r\nNot Found')).toBe(true);
      expect(registry.count()).toBe(0);
    });

    it('should survive a peer reset on a rejected socket', () => {
      const socket = createRecordingSocket([]);
      httpServer.emit('upgrade', createUpgradeRequest('/ws/'), socket, Buffer.alloc(0));

      expect(() => socket.emit('error', new Error('read ECONNRESET'))).not.toThrow();
    });

    it('should survive a peer reset after a 404', () => {
      const socket = createRecordingSocket([]);
      httpServer.emit('upgrade', createUpgradeRequest('/elsewhere'), socket, Buffer.alloc(0));

      expect(() => socket.emit('error', new Error('read ECONNRESET'))).not.toThrow();
    });
  });
});
