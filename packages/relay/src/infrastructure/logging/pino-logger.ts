/**
 * @file pino-logger.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export interface LoggerConfig {
  level: string;
  name: string;
  pretty?: boolean;
}

/**
 * Bindings carried by every log line about one session or one member of it.
 */
export interface SessionLogBindings {
  component: string;
  sessionId: string;
  connectionId?: string;
}

/**
 * Creates the relay's root logger.
 *
 * Errors are logged under `error` throughout the relay, so that key gets the
 * pino error serializer alongside `err`. Submitted source code never reaches
 * the logs.
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: config.name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    redact: {
      paths: ['body.code', 'req.headers.cookie'],
      censor: '****',
    },
  };

  if (!config.pretty) {
    return pino(options);
  }

  return pino({
    ...options,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
        messageFormat: '{if sessionId}[{sessionId}] {end}{msg}',
      },
    },
  });
}

/**
 * Derives a logger scoped to a session, and to one connection when given.
 */
export function createSessionLogger(parent: Logger, bindings: SessionLogBindings): Logger {
  const { component, sessionId, connectionId } = bindings;
  return parent.child(
    connectionId === undefined ? { component, sessionId } : { component, sessionId, connectionId }
  );
}

export type { Logger } from 'pino';
