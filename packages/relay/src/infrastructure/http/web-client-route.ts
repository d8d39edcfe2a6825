/**
 * @file web-client-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import fastifyStatic from '@fastify/static';
import { existsSync, statSync } from 'node:fs';
import { resolve, join } from 'node:path';
import type { Logger } from 'pino';
import type { FastifyRequest, FastifyReply } from 'fastify';

// Minimal app interface to avoid FastifyInstance generic type conflicts
interface AppWithStatic {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  register: (plugin: any, options: { root: string; prefix: string; index: false }) => PromiseLike<unknown>;
  addHook: (name: 'onSend', hook: (request: FastifyRequest, reply: FastifyReply, payload: unknown) => Promise<unknown>) => void;
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

interface WebClientRouteOptions {
  webClientPath: string;
  logger: Logger;
}

// Security headers for the editor page and its assets
const SECURITY_HEADERS = {
  // Prevent MIME type sniffing
  'X-Content-Type-Options': 'nosniff',
  // Prevent clickjacking
  'X-Frame-Options': 'DENY',
  // Referrer policy
  'Referrer-Policy': 'strict-origin-when-cross-origin',
  // Content Security Policy
  'Content-Security-Policy': [
    "default-src 'self'",
    // Compiled Go programs run as WebAssembly in the page
    "script-src 'self' 'wasm-unsafe-eval'",
    "style-src 'self' 'unsafe-inline'",
    "img-src 'self' data:",
    "connect-src 'self' ws: wss:",
    "frame-ancestors 'none'",
    "base-uri 'self'",
    "form-action 'self'",
  ].join('; '),
};

// Cache control settings
const CACHE_CONTROL = {
  // HTML files: no cache, the page is tiny
  html: 'no-cache, no-store, must-revalidate',
  // Other static files: short cache (1 hour)
  default: 'public, max-age=3600',
};

/**
 * Paths served by the editor page itself.
 */
function isPagePath(url: string): boolean {
  return url === '/' || url.startsWith('/interview/');
}

/**
 * Registers the editor page and its static assets.
 * Returns false if the directory is unusable and nothing was registered.
 */
export async function registerWebClientRoute(
  app: AppWithStatic,
  options: WebClientRouteOptions
): Promise<boolean> {
  const { webClientPath, logger } = options;

  // Resolve the absolute path
  const absolutePath = resolve(webClientPath);

  // Verify the directory exists
  if (!existsSync(absolutePath) || !statSync(absolutePath).isDirectory()) {
    logger.error(
      { path: absolutePath },
      'Web client path is not a directory, skipping web client registration'
    );
    return false;
  }

  // Check for index.html
  const indexPath = join(absolutePath, 'index.html');
  if (!existsSync(indexPath)) {
    logger.error(
      { path: indexPath },
      'Web client index.html not found, skipping web client registration'
    );
    return false;
  }

  logger.info({ path: absolutePath }, 'Registering web client static files');

  app.addHook('onSend', async (request, reply, payload) => {
    const url = request.url;
    if (!isPagePath(url) && !url.startsWith('/static/')) {
      return payload;
    }

    for (const [header, value] of Object.entries(SECURITY_HEADERS)) {
      reply.header(header, value);
    }
    reply.header('Cache-Control', isPagePath(url) ? CACHE_CONTROL.html : CACHE_CONTROL.default);

    return payload;
  });

  await app.register(fastifyStatic, {
    root: absolutePath,
    prefix: '/static/',
    index: false,
  });

  app.get('/', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.sendFile('index.html');
  });

  // Every session shares the same page; the client reads the id from the URL
  app.get('/interview/:sessionId', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.sendFile('index.html');
  });

  logger.info('Web client registered successfully');
  return true;
}
