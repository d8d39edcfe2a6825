/**
 * @file message-transport.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Frame data as delivered by the transport.
 */
export type TransportData = Buffer | ArrayBuffer | Buffer[];

/**
 * Port (interface) for an upgraded duplex message transport.
 * Structurally satisfied by a `ws` WebSocket; tests use an in-process stub.
 *
 * The transport forbids concurrent writers: only a connection's outbound
 * pump calls `send`.
 */
export interface MessageTransport {
  readonly readyState: number;

  /**
   * Writes one text frame. The callback fires once the frame is flushed,
   * or with an error if it could not be written.
   */
  send(data: string, cb: (err?: Error) => void): void;

  /**
   * Starts the closing handshake.
   */
  close(code?: number, reason?: string): void;

  /**
   * Destroys the underlying socket without a closing handshake.
   */
  terminate(): void;

  on(event: 'message', listener: (data: TransportData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Transport ready states, matching the WebSocket constants.
 */
export const TransportState = {
  CONNECTING: 0,
  OPEN: 1,
  CLOSING: 2,
  CLOSED: 3,
} as const;
