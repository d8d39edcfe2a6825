/**
 * @file relay.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { EnvSchema } from '../../src/config/env.js';
import { createRelayServer, type RelayServer } from '../../src/relay-server.js';
import { FakeExecutor } from './fake-executor.js';
import { createSilentLogger } from './stub-transport.js';

export interface TestRelay {
  server: RelayServer;
  executor: FakeExecutor;
}

/**
 * Builds a relay bound to an ephemeral loopback port once listening.
 */
export async function createTestRelay(
  overrides: Record<string, string> = {},
  generateSessionId?: () => string
): Promise<TestRelay> {
  const env = EnvSchema.parse({
    NODE_ENV: 'test',
    PORT: '0',
    HOST: '127.0.0.1',
    LOG_LEVEL: 'silent',
    HUB_IDLE_TIMEOUT_MS: '0',
    ...overrides,
  });
  const executor = new FakeExecutor();
  const server = await createRelayServer({
    env,
    logger: createSilentLogger(),
    version: '1.2.3',
    executor,
    generateSessionId,
  });
  return { server, executor };
}
