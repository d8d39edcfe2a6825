/**
 * @file connection-pump.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type {
  Connection,
  UnregisterReason,
} from '../../domain/entities/connection.js';
import type { TransportData } from '../../domain/ports/message-transport.js';
import { createSessionLogger } from '../logging/pino-logger.js';

/**
 * Decodes a received frame to text.
 */
export function decodeFrame(data: TransportData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * Inbound and outbound pumps bridging one connection's transport to its hub.
 *
 * Inbound: every received frame becomes a broadcast; close or read error
 * becomes an unregister. Outbound: drains the connection's queue and is the
 * only writer of data frames on the transport.
 */
export class ConnectionPump {
  private readonly connection: Connection;
  private readonly logger: Logger;
  private outboundLoop: Promise<void> | null = null;

  constructor(connection: Connection, logger: Logger) {
    this.connection = connection;
    this.logger = createSessionLogger(logger, {
      component: 'ConnectionPump',
      sessionId: connection.sessionId.value,
      connectionId: connection.id,
    });
  }

  /**
   * Resolves once the outbound pump has stopped.
   */
  get done(): Promise<void> {
    return this.outboundLoop ?? Promise.resolve();
  }

  /**
   * Attaches the inbound listeners and starts the outbound pump.
   */
  start(): void {
    if (this.outboundLoop) return;

    const transport = this.connection.transport;
    transport.on('message', (data, isBinary) => {
      this.handleInbound(data, isBinary);
    });
    transport.on('close', (code, reason) => {
      this.logger.debug(
        { closeCode: code, reason: reason.toString('utf8') },
        'Transport closed'
      );
      this.leave('closed');
    });
    transport.on('error', (error) => {
      this.logger.warn({ error }, 'Transport read error');
      this.leave('read-error');
    });

    this.outboundLoop = this.pumpOutbound();
    this.connection.markActive();
  }

  private handleInbound(data: TransportData, isBinary: boolean): void {
    if (!this.connection.isAlive) return;

    if (isBinary) {
      this.logger.debug('Binary frame relayed as text');
    }
    this.connection.hub.broadcast(decodeFrame(data), this.connection);
  }

  private async pumpOutbound(): Promise<void> {
    for await (const frame of this.connection.outbound) {
      try {
        await this.write(frame);
      } catch (error) {
        this.logger.warn({ error }, 'Transport write failed');
        this.leave('write-error');
        this.connection.transport.terminate();
        return;
      }
    }
  }

  private write(frame: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.connection.transport.send(frame, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Reports the first fault to the hub; later ones are no-ops.
   */
  private leave(reason: UnregisterReason): void {
    if (this.connection.markUnregistering()) {
      this.connection.hub.unregister(this.connection, reason);
    }
  }
}
