/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { InMemoryHubRegistry } from '../persistence/in-memory-registry.js';

export interface HealthRouteConfig {
  version: string;
}

export interface HealthRouteDeps {
  hubRegistry: Pick<InMemoryHubRegistry, 'count' | 'connectionCount' | 'hubsCreated'>;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  sessions: {
    active: number;
    created: number;
  };
  connections: number;
  timestamp: string;
}

interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers the health check route on the Fastify server.
 */
export function registerHealthRoute(
  app: AppWithGet,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: config.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      sessions: {
        active: deps.hubRegistry.count(),
        created: deps.hubRegistry.hubsCreated,
      },
      connections: deps.hubRegistry.connectionCount(),
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Simple liveness probe
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Readiness probe - checks if the server can accept connections
  app.get('/readyz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ready' });
  });
}
