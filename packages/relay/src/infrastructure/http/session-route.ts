/**
 * @file session-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { SessionId } from '../../domain/value-objects/session-id.js';

export interface SessionRouteDeps {
  /** Produces a fresh session id; uniqueness is not checked */
  generateSessionId: () => string;
  logger: Logger;
}

interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers GET /create, which starts a new session by redirecting
 * the browser to its editor page. The hub itself is created on first join.
 */
export function registerSessionRoute(app: AppWithGet, deps: SessionRouteDeps): void {
  const logger = deps.logger.child({ component: 'SessionRoute' });

  app.get('/create', async (_request: FastifyRequest, reply: FastifyReply) => {
    const sessionId = SessionId.generate(deps.generateSessionId);
    logger.info({ sessionId: sessionId.value }, 'Session created');
    return reply.redirect(`/interview/${encodeURIComponent(sessionId.value)}`, 302);
  });
}
