/**
 * @file pino-logger.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect } from 'vitest';
import {
  createLogger,
  createSessionLogger,
} from '../../../../src/infrastructure/logging/pino-logger.js';

describe('createLogger', () => {
  it('should apply the configured name and level', () => {
    const logger = createLogger({ name: 'relay-test', level: 'warn' });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toMatchObject({ name: 'relay-test' });
  });
});

describe('createSessionLogger', () => {
  const root = createLogger({ name: 'relay-test', level: 'silent' });

  it('should bind the session and connection', () => {
    const logger = createSessionLogger(root, {
      component: 'ConnectionPump',
      sessionId: 'deadbeef',
      connectionId: 'conn-1',
    });

    expect(logger.bindings()).toMatchObject({
      component: 'ConnectionPump',
      sessionId: 'deadbeef',
      connectionId: 'conn-1',
    });
  });

  it('should leave out the connection when none is given', () => {
    const logger = createSessionLogger(root, { component: 'Hub', sessionId: 'deadbeef' });

    expect(logger.bindings()).toMatchObject({ component: 'Hub', sessionId: 'deadbeef' });
    expect(logger.bindings()).not.toHaveProperty('connectionId');
  });
});
