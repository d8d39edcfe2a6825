/**
 * @file relay-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { customAlphabet, nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { createApp, setDefaultNotFoundHandler, type RelayApp } from './app.js';
import type { Env } from './config/env.js';
import {
  CONNECTION_TIMING,
  EXECUTION_CONFIG,
  SESSION_ID_CONFIG,
} from './config/constants.js';
import type { CodeExecutor } from './domain/ports/code-executor.js';
import { Hub } from './application/hub.js';
import { JoinSessionUseCase } from './application/join-session.js';
import { InMemoryHubRegistry } from './infrastructure/persistence/in-memory-registry.js';
import { ProcessExecutor } from './infrastructure/execution/process-executor.js';
import { registerHealthRoute } from './infrastructure/http/health-route.js';
import { registerSessionRoute } from './infrastructure/http/session-route.js';
import { registerCompileRoute } from './infrastructure/http/compile-route.js';
import { registerWebClientRoute } from './infrastructure/http/web-client-route.js';
import {
  ConnectionHandler,
  WebSocketServerWrapper,
} from './infrastructure/websocket/index.js';

export interface RelayServerOptions {
  env: Env;
  logger: Logger;
  version: string;
  /** Defaults to a subprocess executor bounded by EXECUTION_TIMEOUT_MS */
  executor?: CodeExecutor;
  /** Defaults to 8 random lowercase hex characters */
  generateSessionId?: () => string;
}

export interface RelayServer {
  app: RelayApp;
  hubRegistry: InMemoryHubRegistry;
  wsServer: WebSocketServerWrapper;
  /**
   * Starts listening and attaches the join endpoint.
   * Resolves with the bound address.
   */
  listen(): Promise<string>;
  /**
   * Closes sockets, stops every hub and shuts the HTTP server down.
   * Later calls share the first call's promise.
   */
  close(): Promise<void>;
}

/**
 * Wires the registry, use cases, routes and WebSocket server into one
 * runnable relay. Nothing listens until `listen()` is called.
 */
export async function createRelayServer(options: RelayServerOptions): Promise<RelayServer> {
  const { env, logger, version } = options;

  const hubRegistry = new InMemoryHubRegistry({
    createHub: (sessionId, onIdle) =>
      new Hub({
        sessionId,
        idleTimeoutMs: env.HUB_IDLE_TIMEOUT_MS,
        onIdle,
        logger,
      }),
    logger,
  });

  const joinSession = new JoinSessionUseCase({
    hubRegistry,
    outboundCapacity: env.OUTBOUND_QUEUE_CAPACITY,
    generateConnectionId: () => nanoid(12),
    logger,
  });

  const connectionHandler = new ConnectionHandler({ joinSession, logger });

  const executor =
    options.executor ??
    new ProcessExecutor(
      {
        timeoutMs: env.EXECUTION_TIMEOUT_MS,
        maxOutputBytes: EXECUTION_CONFIG.MAX_OUTPUT_BYTES,
      },
      logger
    );

  const generateSessionId =
    options.generateSessionId ??
    customAlphabet(SESSION_ID_CONFIG.ALPHABET, SESSION_ID_CONFIG.LENGTH);

  const app = createApp({ env, logger });

  registerHealthRoute(app, { version }, { hubRegistry });
  registerSessionRoute(app, { generateSessionId, logger });
  await registerCompileRoute(app, { executor, logger });
  await registerWebClientRoute(app, {
    webClientPath: env.WEB_CLIENT_PATH,
    logger,
  });
  setDefaultNotFoundHandler(app);

  const wsServer = new WebSocketServerWrapper(
    {
      path: env.WS_PATH,
      maxPayloadBytes: env.MAX_PAYLOAD_BYTES,
      heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS,
    },
    { connectionHandler, logger }
  );

  let closing: Promise<void> | null = null;

  return {
    app,
    hubRegistry,
    wsServer,

    async listen(): Promise<string> {
      const address = await app.listen({ port: env.PORT, host: env.HOST });
      wsServer.attach(app.server);
      return address;
    },

    close(): Promise<void> {
      closing ??= (async () => {
        await wsServer.close(CONNECTION_TIMING.SHUTDOWN_GRACE_MS);
        await hubRegistry.closeAll();
        await app.close();
      })();
      return closing;
    },
  };
}
