/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Fastify, { type FastifyError } from 'fastify';
import type { Logger } from 'pino';
import type { Env } from './config/env.js';
import { DomainError } from './domain/errors/domain-errors.js';
import { HttpErrors } from './protocol/errors.js';

export interface AppConfig {
  env: Pick<Env, 'TRUST_PROXY' | 'MAX_PAYLOAD_BYTES'>;
  logger: Logger;
}

/**
 * Creates and configures the Fastify application.
 */
export function createApp(config: AppConfig) {
  const app = Fastify({
    loggerInstance: config.logger,
    trustProxy: config.env.TRUST_PROXY,
    bodyLimit: config.env.MAX_PAYLOAD_BYTES,
    // Disable request logging since we use pino directly
    disableRequestLogging: true,
  });

  // Request logging middleware
  app.addHook('onRequest', async (request, _reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        // Include forwarded headers if behind proxy
        ...(config.env.TRUST_PROXY && {
          forwardedFor: request.headers['x-forwarded-for'],
          forwardedProto: request.headers['x-forwarded-proto'],
        }),
      },
      'Incoming request'
    );
  });

  // Response logging middleware
  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof DomainError) {
      request.log.warn({ error }, 'Request failed');
      void reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
      });
      return;
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request error');
      void reply.status(statusCode).send(HttpErrors.internalError());
      return;
    }

    request.log.warn({ error }, 'Request rejected');
    void reply.status(statusCode).send({
      error: error.message,
      code: error.code || 'INVALID_REQUEST',
    });
  });

  return app;
}

export type RelayApp = ReturnType<typeof createApp>;

/**
 * Sets the default 404 handler for API-only mode (no web client).
 * Call this only if web client is NOT configured.
 */
export function setDefaultNotFoundHandler(app: RelayApp): void {
  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ url: request.url }, 'Route not found');
    void reply.status(404).send(HttpErrors.notFound());
  });
}
