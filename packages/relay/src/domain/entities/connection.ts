/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { BoundedQueue } from '../../utils/bounded-queue.js';
import type { MessageTransport } from '../ports/message-transport.js';
import type { SessionHub } from '../ports/session-hub.js';
import type { SessionId } from '../value-objects/session-id.js';

/**
 * connecting → registered → active → unregistering → closed
 */
export type ConnectionState =
  | 'connecting'
  | 'registered'
  | 'active'
  | 'unregistering'
  | 'closed';

export type UnregisterReason = 'closed' | 'read-error' | 'write-error' | 'overflow';

export type EnqueueResult = 'queued' | 'overflow' | 'closed';

export interface ConnectionProps {
  id: string;
  sessionId: SessionId;
  hub: SessionHub;
  transport: MessageTransport;
  outboundCapacity: number;
}

/**
 * Entity representing one participant's duplex transport inside a session.
 * Owns the bounded outbound queue drained by its outbound pump.
 */
export class Connection {
  private readonly _id: string;
  private readonly _sessionId: SessionId;
  private readonly _hub: SessionHub;
  private readonly _transport: MessageTransport;
  private readonly _outbound: BoundedQueue<string>;
  private readonly _connectedAt: Date;
  private _state: ConnectionState;

  constructor(props: ConnectionProps) {
    this._id = props.id;
    this._sessionId = props.sessionId;
    this._hub = props.hub;
    this._transport = props.transport;
    this._outbound = new BoundedQueue<string>(props.outboundCapacity);
    this._connectedAt = new Date();
    this._state = 'connecting';
  }

  get id(): string {
    return this._id;
  }

  get sessionId(): SessionId {
    return this._sessionId;
  }

  get hub(): SessionHub {
    return this._hub;
  }

  get transport(): MessageTransport {
    return this._transport;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get connectedAt(): Date {
    return this._connectedAt;
  }

  /**
   * Frames waiting for the outbound pump.
   */
  get pendingOutbound(): number {
    return this._outbound.size;
  }

  /**
   * Frames queued for this connection, in delivery order.
   */
  get outbound(): AsyncIterable<string> {
    return this._outbound;
  }

  get isAlive(): boolean {
    return this._state !== 'unregistering' && this._state !== 'closed';
  }

  markRegistered(): void {
    if (this._state === 'connecting') {
      this._state = 'registered';
    }
  }

  markActive(): void {
    if (this._state === 'registered') {
      this._state = 'active';
    }
  }

  /**
   * Marks the connection dead. Returns false if it already was,
   * so only the first fault reports the unregister.
   */
  markUnregistering(): boolean {
    if (!this.isAlive) {
      return false;
    }
    this._state = 'unregistering';
    return true;
  }

  /**
   * Queues a frame for the outbound pump without waiting.
   */
  enqueue(payload: string): EnqueueResult {
    if (!this.isAlive) {
      return 'closed';
    }
    const result = this._outbound.offer(payload);
    return result === 'full' ? 'overflow' : result;
  }

  /**
   * Releases the outbound queue; the outbound pump stops after this.
   * Returns the number of frames that were never written.
   */
  release(): number {
    this._state = 'closed';
    return this._outbound.discard();
  }

  /**
   * Closes the transport with a close frame, falling back to terminate
   * if the transport refuses.
   */
  disconnect(code: number, reason: string): void {
    this.markUnregistering();
    try {
      this._transport.close(code, reason);
    } catch {
      this._transport.terminate();
    }
  }

  /**
   * Destroys the transport without a closing handshake.
   */
  terminate(): void {
    this.markUnregistering();
    this._transport.terminate();
  }
}
