/**
 * @file join-session.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { HubRegistry } from '../domain/ports/hub-registry.js';
import type { MessageTransport } from '../domain/ports/message-transport.js';
import { Connection } from '../domain/entities/connection.js';
import { SessionId } from '../domain/value-objects/session-id.js';
import { SessionClosedError } from '../domain/errors/domain-errors.js';

export interface JoinSessionParams {
  transport: MessageTransport;
  sessionId: string;
}

export interface JoinSessionDeps {
  hubRegistry: HubRegistry;
  outboundCapacity: number;
  generateConnectionId: () => string;
  logger: Logger;
}

/**
 * Use case for attaching an upgraded transport to its session hub.
 */
export class JoinSessionUseCase {
  private readonly hubRegistry: HubRegistry;
  private readonly outboundCapacity: number;
  private readonly generateConnectionId: () => string;
  private readonly logger: Logger;

  constructor(deps: JoinSessionDeps) {
    this.hubRegistry = deps.hubRegistry;
    this.outboundCapacity = deps.outboundCapacity;
    this.generateConnectionId = deps.generateConnectionId;
    this.logger = deps.logger.child({ useCase: 'JoinSession' });
  }

  /**
   * Creates the connection and posts its register event.
   * The caller starts the connection's pumps.
   *
   * @throws InvalidSessionIdError for a blank session id
   * @throws SessionClosedError if the hub stopped before registering
   */
  execute(params: JoinSessionParams): Connection {
    const sessionId = SessionId.create(params.sessionId);
    const hub = this.hubRegistry.getOrCreateHub(sessionId);

    const connection = new Connection({
      id: this.generateConnectionId(),
      sessionId,
      hub,
      transport: params.transport,
      outboundCapacity: this.outboundCapacity,
    });

    if (!hub.register(connection)) {
      throw new SessionClosedError(sessionId.value);
    }
    connection.markRegistered();

    this.logger.debug(
      { sessionId: sessionId.value, connectionId: connection.id },
      'Register posted'
    );

    return connection;
  }
}
