/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Connection timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** How often the join endpoint pings every socket (30 seconds) */
  HEARTBEAT_INTERVAL_MS: 30_000,

  /** Grace period for WebSocket close frames during shutdown */
  SHUTDOWN_GRACE_MS: 5_000,

  /** Overall limit for process shutdown before forcing exit */
  SHUTDOWN_TIMEOUT_MS: 10_000,
} as const;

/**
 * Hub lifecycle constants.
 */
export const HUB_LIFECYCLE = {
  /** Time an empty hub survives before it is evicted (0 disables eviction) */
  IDLE_TIMEOUT_MS: 60_000,
} as const;

/**
 * Relay limits.
 */
export const RELAY_LIMITS = {
  /** Frames that may wait in one connection's outbound queue */
  OUTBOUND_QUEUE_CAPACITY: 256,

  /** Largest accepted WebSocket frame (1 MiB) */
  MAX_PAYLOAD_BYTES: 1024 * 1024,
} as const;

/**
 * WebSocket configuration.
 */
export const WEBSOCKET_CONFIG = {
  /** Prefix of the join endpoint, followed by /{sessionId} */
  PATH: '/ws',
} as const;

/**
 * Close codes sent by the relay.
 */
export const CLOSE_CODES = {
  /** Server shutdown or session stopped */
  GOING_AWAY: 1001,
  /** Join carried no usable session id */
  POLICY_VIOLATION: 1008,
  /** Join raced a hub that was stopping */
  INTERNAL_ERROR: 1011,
  /** Member could not keep up with the session's broadcasts */
  QUEUE_OVERFLOW: 1013,
} as const;

/**
 * Code execution configuration.
 */
export const EXECUTION_CONFIG = {
  /** Kill the compiler or program after this long */
  TIMEOUT_MS: 10_000,

  /** Cap on captured stdout/stderr (1 MiB) */
  MAX_OUTPUT_BYTES: 1024 * 1024,

  /** Languages accepted by POST /compile */
  LANGUAGES: ['go', 'javascript'] as const,

  DEFAULT_LANGUAGE: 'go',
} as const;

/**
 * Session identifier format for /create.
 */
export const SESSION_ID_CONFIG = {
  ALPHABET: '0123456789abcdef',
  /** 8 hex characters = 32 random bits */
  LENGTH: 8,
} as const;
