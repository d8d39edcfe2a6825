/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocketServer as WSServer, type WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { STATUS_CODES } from 'node:http';
import type { Logger } from 'pino';
import type { ConnectionHandler } from './connection-handler.js';
import { parseJoinPath } from './join-path.js';
import { CLOSE_CODES } from '../../config/constants.js';

export interface WebSocketServerConfig {
  /** Join endpoint prefix; sockets connect to {path}/{sessionId} */
  path: string;
  maxPayloadBytes: number;
  heartbeatIntervalMs: number;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionHandler;
  logger: Logger;
}

/**
 * WebSocket server wrapper that takes over upgrade requests from the HTTP
 * server, rejects malformed join paths and keeps sockets alive with pings.
 */
export class WebSocketServerWrapper {
  private wss: WSServer | null = null;
  private httpServer: Server | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  /** Sockets that answered the latest ping */
  private readonly alive = new WeakSet<WebSocket>();
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   */
  attach(httpServer: Server): void {
    this.wss = new WSServer({
      noServer: true,
      maxPayload: this.config.maxPayloadBytes,
    });

    this.wss.on('error', (error) => {
      this.logger.error({ error }, 'WebSocket server error');
    });

    httpServer.on('upgrade', this.handleUpgrade);
    this.httpServer = httpServer;

    this.startHeartbeatCheck();

    this.logger.info(
      { path: `${this.config.path}/:sessionId` },
      'WebSocket server attached'
    );
  }

  private readonly handleUpgrade = (
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer
  ): void => {
    const wss = this.wss;
    if (!wss) {
      this.rejectUpgrade(socket, 503);
      return;
    }

    const target = parseJoinPath(request.url, this.config.path);
    switch (target.kind) {
      case 'not-found':
        this.rejectUpgrade(socket, 404);
        return;

      case 'malformed':
        this.logger.warn({ url: request.url, reason: target.reason }, 'Malformed join request');
        this.rejectUpgrade(socket, 400, target.reason);
        return;

      case 'join':
        wss.handleUpgrade(request, socket, head, (ws) => {
          this.trackLiveness(ws);
          wss.emit('connection', ws, request);
          this.deps.connectionHandler.handleConnection(ws, target.sessionId);
        });
        return;
    }
  };

  /**
   * Answers an upgrade request with a plain HTTP error and drops the socket.
   * The HTTP server detaches its own error listener before emitting `upgrade`,
   * so a peer reset here must be handled by us.
   */
  private rejectUpgrade(socket: Duplex, statusCode: number, message?: string): void {
    socket.on('error', (error) => {
      this.logger.debug({ error, statusCode }, 'Socket error while rejecting upgrade');
    });

    const body = message ?? STATUS_CODES[statusCode] ?? 'Error';
    socket.once('finish', () => socket.destroy());
    socket.end(
      `HTTP/1.1 ${statusCode} ${STATUS_CODES[statusCode] ?? ''}\r\n` +
        'Connection: close\r\n' +
        'Content-Type: text/plain; charset=utf-8\r\n' +
        `Content-Length: ${Buffer.byteLength(body)}\r\n` +
        '\r\n' +
        body
    );
  }

  private trackLiveness(ws: WebSocket): void {
    this.alive.add(ws);
    ws.on('pong', () => {
      this.alive.add(ws);
    });
  }

  /**
   * Starts the periodic heartbeat check.
   */
  private startHeartbeatCheck(): void {
    this.heartbeatInterval = setInterval(() => {
      this.checkHeartbeats();
    }, this.config.heartbeatIntervalMs);
    this.heartbeatInterval.unref();
  }

  /**
   * Terminates sockets that missed the previous ping and pings the rest.
   * A terminated socket unregisters through its normal close path.
   */
  checkHeartbeats(): number {
    if (!this.wss) return 0;

    let terminated = 0;
    for (const client of this.wss.clients) {
      if (!this.alive.has(client)) {
        client.terminate();
        terminated++;
        continue;
      }
      this.alive.delete(client);
      client.ping();
    }

    if (terminated > 0) {
      this.logger.info({ terminated }, 'Terminated unresponsive sockets');
    }
    return terminated;
  }

  /**
   * Closes the WebSocket server gracefully with timeout.
   * @param timeoutMs - Maximum time to wait for graceful close (default: 5000ms)
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    this.httpServer?.off('upgrade', this.handleUpgrade);
    this.httpServer = null;

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    const clientCount = wss.clients.size;
    this.logger.info({ clientCount }, 'Closing WebSocket server');

    // Send close frame to all clients
    for (const client of wss.clients) {
      client.close(CLOSE_CODES.GOING_AWAY, 'Server shutting down');
    }

    let timer: NodeJS.Timeout | undefined;

    // Resolves once every client has finished its closing handshake
    const closePromise = new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          this.logger.error({ error: err }, 'Error closing WebSocket server');
          reject(err);
        } else {
          this.logger.info('WebSocket server closed gracefully');
          resolve();
        }
      });
    });

    const timeoutPromise = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(
          { timeoutMs, remainingClients: wss.clients.size },
          'WebSocket graceful close timed out, forcing termination'
        );

        // Force terminate all remaining connections
        for (const client of wss.clients) {
          client.terminate();
        }

        resolve();
      }, timeoutMs);
    });

    try {
      // Race between graceful close and timeout
      await Promise.race([closePromise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }
}
