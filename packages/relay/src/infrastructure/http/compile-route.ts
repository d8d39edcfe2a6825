/**
 * @file compile-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { RelayApp } from '../../app.js';
import type { CodeExecutor } from '../../domain/ports/code-executor.js';
import { CompileRequestSchema } from '../../protocol/schemas.js';
import { HttpErrors } from '../../protocol/errors.js';

export interface CompileRouteDeps {
  executor: CodeExecutor;
  logger: Logger;
}

/** Body types read as JSON on /compile besides application/json */
const JSON_LIKE_CONTENT_TYPES = ['text/plain', 'application/x-www-form-urlencoded'];

/**
 * Registers POST /compile.
 *
 * 200 carries the artifact with its own content type (wasm for go, program
 * output for javascript); 400 carries the diagnostics as text/plain.
 * The body is decoded as JSON whatever its declared content type, so the
 * parsers are swapped inside an encapsulated scope.
 */
export async function registerCompileRoute(app: RelayApp, deps: CompileRouteDeps): Promise<void> {
  const logger = deps.logger.child({ component: 'CompileRoute' });

  await app.register(async (scope) => {
    scope.removeContentTypeParser('text/plain');
    scope.addContentTypeParser(
      JSON_LIKE_CONTENT_TYPES,
      { parseAs: 'string' },
      scope.getDefaultJsonParser('error', 'error')
    );

    scope.post('/compile', async (request, reply) => {
      const parseResult = CompileRequestSchema.safeParse(request.body);
      if (!parseResult.success) {
        return reply
          .status(400)
          .send(HttpErrors.invalidPayload('Invalid compile request', parseResult.error.flatten()));
      }

      const { code, language } = parseResult.data;
      const startedAt = Date.now();
      const result = await deps.executor.execute(code, language);

      logger.info(
        {
          language,
          codeLength: code.length,
          ok: result.ok,
          durationMs: Date.now() - startedAt,
        },
        'Compile request finished'
      );

      if (!result.ok) {
        return reply.status(400).type('text/plain').send(result.diagnostics);
      }
      return reply.status(200).type(result.contentType).send(result.payload);
    });

    scope.route({
      method: ['GET', 'PUT', 'PATCH', 'DELETE'],
      url: '/compile',
      handler: async (request, reply) => {
        return reply
          .status(405)
          .header('allow', 'POST')
          .send(HttpErrors.methodNotAllowed(request.method));
      },
    });
  });
}
