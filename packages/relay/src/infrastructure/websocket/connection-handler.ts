/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Logger } from 'pino';
import type { JoinSessionUseCase } from '../../application/join-session.js';
import type { Connection } from '../../domain/entities/connection.js';
import type { MessageTransport } from '../../domain/ports/message-transport.js';
import {
  DomainError,
  InvalidSessionIdError,
} from '../../domain/errors/domain-errors.js';
import { CLOSE_CODES } from '../../config/constants.js';
import { ConnectionPump } from './connection-pump.js';

export interface ConnectionHandlerDeps {
  joinSession: JoinSessionUseCase;
  logger: Logger;
}

/**
 * Handles individual upgraded WebSocket connections.
 * Joins each one to its session hub and starts its pump pair.
 */
export class ConnectionHandler {
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: ConnectionHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });
  }

  /**
   * Joins a new transport to the session named in its URL.
   * Returns undefined if the join was refused and the transport closed.
   */
  handleConnection(socket: MessageTransport, sessionId: string): Connection | undefined {
    let connection: Connection;
    try {
      connection = this.deps.joinSession.execute({ transport: socket, sessionId });
    } catch (error) {
      this.handleJoinError(socket, sessionId, error);
      return undefined;
    }

    const pump = new ConnectionPump(connection, this.deps.logger);
    pump.start();

    this.logger.info(
      { sessionId: connection.sessionId.value, connectionId: connection.id },
      'Client connected'
    );

    return connection;
  }

  /**
   * Closes a transport whose join failed.
   */
  private handleJoinError(socket: MessageTransport, sessionId: string, error: unknown): void {
    // Nothing else listens on this socket; an unhandled 'error' would crash the process
    socket.on('error', (socketError) => {
      this.logger.debug({ error: socketError, sessionId }, 'Error on refused socket');
    });

    if (error instanceof InvalidSessionIdError) {
      this.logger.warn({ sessionId }, 'Join refused: invalid session id');
      socket.close(CLOSE_CODES.POLICY_VIOLATION, error.message);
    } else if (error instanceof DomainError) {
      this.logger.warn({ sessionId, error }, 'Join refused');
      socket.close(CLOSE_CODES.INTERNAL_ERROR, error.message);
    } else {
      this.logger.error({ sessionId, error }, 'Unexpected error while joining session');
      socket.close(CLOSE_CODES.INTERNAL_ERROR, 'Internal error');
    }
  }
}
