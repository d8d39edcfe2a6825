/**
 * @file hub.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type {
  Connection,
  UnregisterReason,
} from '../domain/entities/connection.js';
import type { SessionHub } from '../domain/ports/session-hub.js';
import type { SessionId } from '../domain/value-objects/session-id.js';
import { BoundedQueue } from '../utils/bounded-queue.js';
import { CLOSE_CODES } from '../config/constants.js';
import { getMessageType } from '../protocol/schemas.js';

/**
 * Events accepted by the hub mailbox, processed strictly in arrival order.
 */
type HubEvent =
  | { kind: 'register'; connection: Connection }
  | { kind: 'unregister'; connection: Connection; reason: UnregisterReason }
  | { kind: 'broadcast'; payload: string; origin: Connection | undefined }
  | { kind: 'idle-check'; generation: number };

export interface HubDeps {
  sessionId: SessionId;
  /** Empty hubs older than this are evicted; 0 disables eviction */
  idleTimeoutMs: number;
  /** Called from the hub loop right before an idle hub stops */
  onIdle?: (hub: Hub) => void;
  logger: Logger;
}

/**
 * Broadcast actor owning one session's membership.
 *
 * The member set is read and written only by the loop started in `start()`;
 * the public methods just post events to the mailbox.
 */
export class Hub implements SessionHub {
  readonly sessionId: SessionId;
  private readonly members = new Set<Connection>();
  private readonly mailbox = new BoundedQueue<HubEvent>();
  private readonly idleTimeoutMs: number;
  private readonly onIdle: ((hub: Hub) => void) | undefined;
  private readonly logger: Logger;
  private loop: Promise<void> | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private idleGeneration = 0;
  private _memberCount = 0;
  private _broadcastCount = 0;

  constructor(deps: HubDeps) {
    this.sessionId = deps.sessionId;
    this.idleTimeoutMs = deps.idleTimeoutMs;
    this.onIdle = deps.onIdle;
    this.logger = deps.logger.child({
      component: 'Hub',
      sessionId: deps.sessionId.value,
    });
  }

  /**
   * Members as last counted by the hub loop.
   */
  get memberCount(): number {
    return this._memberCount;
  }

  /**
   * Broadcasts fanned out so far.
   */
  get broadcastCount(): number {
    return this._broadcastCount;
  }

  get isRunning(): boolean {
    return this.loop !== null && !this.mailbox.isClosed;
  }

  /**
   * Starts the hub loop. Calling it again has no effect.
   */
  start(): void {
    if (this.loop) return;
    this.loop = this.run();
    this.armIdleTimer();
  }

  register(connection: Connection): boolean {
    return this.post({ kind: 'register', connection });
  }

  unregister(connection: Connection, reason: UnregisterReason): boolean {
    return this.post({ kind: 'unregister', connection, reason });
  }

  broadcast(payload: string, origin?: Connection): boolean {
    return this.post({ kind: 'broadcast', payload, origin });
  }

  /**
   * Stops accepting events, finishes the ones already queued and closes
   * every remaining member. Resolves once the loop has exited.
   */
  async stop(): Promise<void> {
    this.disarmIdleTimer();
    this.mailbox.close();
    await this.loop;
  }

  private post(event: HubEvent): boolean {
    return this.mailbox.offer(event) === 'queued';
  }

  private async run(): Promise<void> {
    this.logger.debug('Hub loop started');

    for await (const event of this.mailbox) {
      try {
        this.dispatch(event);
      } catch (error) {
        this.logger.error({ error, event: event.kind }, 'Hub event failed');
      }
    }

    this.disarmIdleTimer();
    this.closeMembers();
    this.logger.debug('Hub loop stopped');
  }

  private dispatch(event: HubEvent): void {
    switch (event.kind) {
      case 'register':
        this.handleRegister(event.connection);
        break;
      case 'unregister':
        this.handleUnregister(event.connection, event.reason);
        break;
      case 'broadcast':
        this.handleBroadcast(event.payload, event.origin);
        break;
      case 'idle-check':
        this.handleIdleCheck(event.generation);
        break;
    }
  }

  private handleRegister(connection: Connection): void {
    this.members.add(connection);
    this._memberCount = this.members.size;
    this.disarmIdleTimer();

    this.logger.info(
      { connectionId: connection.id, members: this.members.size },
      'Connection joined session'
    );
  }

  private handleUnregister(connection: Connection, reason: UnregisterReason): void {
    if (!this.members.delete(connection)) {
      return;
    }

    const dropped = connection.release();
    this._memberCount = this.members.size;

    this.logger.info(
      {
        connectionId: connection.id,
        reason,
        dropped,
        members: this.members.size,
        connectedMs: Date.now() - connection.connectedAt.getTime(),
      },
      'Connection left session'
    );

    if (this.members.size === 0) {
      this.armIdleTimer();
    }
  }

  private handleBroadcast(payload: string, origin: Connection | undefined): void {
    const overflowed: Connection[] = [];

    for (const member of this.members) {
      if (member.enqueue(payload) === 'overflow') {
        overflowed.push(member);
      }
    }

    // Slow members are dropped after the fan-out so the rest still get this frame
    for (const member of overflowed) {
      this.evictSlowMember(member);
    }

    this._broadcastCount++;

    if (this.logger.isLevelEnabled('trace')) {
      this.logger.trace(
        {
          originId: origin?.id,
          members: this.members.size,
          overflowed: overflowed.length,
          messageType: getMessageType(payload) ?? 'opaque',
          messageLength: payload.length,
        },
        'Broadcast'
      );
    }
  }

  private evictSlowMember(member: Connection): void {
    this.members.delete(member);
    this._memberCount = this.members.size;

    const dropped = member.release();
    member.disconnect(CLOSE_CODES.QUEUE_OVERFLOW, 'Message queue overflow');

    this.logger.warn(
      { connectionId: member.id, dropped, members: this.members.size },
      'Outbound queue overflowed, member disconnected'
    );

    if (this.members.size === 0) {
      this.armIdleTimer();
    }
  }

  private handleIdleCheck(generation: number): void {
    if (generation !== this.idleGeneration) return;
    if (this.members.size > 0) return;
    if (this.mailbox.size > 0) {
      this.armIdleTimer();
      return;
    }

    this.logger.info({ idleTimeoutMs: this.idleTimeoutMs }, 'Evicting idle hub');
    this.mailbox.close();
    this.onIdle?.(this);
  }

  private closeMembers(): void {
    for (const member of this.members) {
      member.release();
      member.disconnect(CLOSE_CODES.GOING_AWAY, 'Session closed');
    }
    this.members.clear();
    this._memberCount = 0;
  }

  private armIdleTimer(): void {
    this.disarmIdleTimer();
    if (this.idleTimeoutMs <= 0 || this.mailbox.isClosed) return;

    const generation = this.idleGeneration;
    this.idleTimer = setTimeout(() => {
      this.idleTimer = null;
      this.post({ kind: 'idle-check', generation });
    }, this.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private disarmIdleTimer(): void {
    this.idleGeneration++;
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }
}
