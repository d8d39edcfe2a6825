/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { config } from 'dotenv';
import {
  CONNECTION_TIMING,
  EXECUTION_CONFIG,
  HUB_LIFECYCLE,
  RELAY_LIMITS,
  WEBSOCKET_CONFIG,
} from './constants.js';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

/**
 * Web client bundled with the package (packages/relay/public).
 * Resolves the same from src/config and dist/config.
 */
const DEFAULT_WEB_CLIENT_PATH = fileURLToPath(new URL('../../public', import.meta.url));

/**
 * Schema for environment variables validation.
 */
export const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),

  /**
   * Whether the server is running behind a reverse proxy.
   * Only the literal string "true" enables it.
   */
  TRUST_PROXY: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  /**
   * Prefix of the join endpoint; clients connect to {WS_PATH}/{sessionId}.
   */
  WS_PATH: z
    .string()
    .regex(/^\/[^/]+$/, 'WS_PATH must be a single path segment such as /ws')
    .default(WEBSOCKET_CONFIG.PATH),

  /**
   * Directory holding index.html and the editor assets.
   */
  WEB_CLIENT_PATH: z.string().default(DEFAULT_WEB_CLIENT_PATH),

  // Relay
  OUTBOUND_QUEUE_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(RELAY_LIMITS.OUTBOUND_QUEUE_CAPACITY),
  MAX_PAYLOAD_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(RELAY_LIMITS.MAX_PAYLOAD_BYTES),
  HEARTBEAT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(CONNECTION_TIMING.HEARTBEAT_INTERVAL_MS),

  /**
   * How long an empty session hub is kept; 0 keeps hubs forever.
   */
  HUB_IDLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(HUB_LIFECYCLE.IDLE_TIMEOUT_MS),

  // Execution
  EXECUTION_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(EXECUTION_CONFIG.TIMEOUT_MS),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
