/**
 * @file bounded-queue.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { BoundedQueue } from '../../../src/utils/bounded-queue.js';

describe('BoundedQueue', () => {
  describe('constructor', () => {
    it('should reject a zero capacity', () => {
      expect(() => new BoundedQueue<string>(0)).toThrow('BoundedQueue capacity must be positive');
    });

    it('should be unbounded by default', () => {
      const queue = new BoundedQueue<number>();
      for (let i = 0; i < 1000; i++) {
        expect(queue.offer(i)).toBe('queued');
      }
      expect(queue.size).toBe(1000);
    });
  });

  describe('offer', () => {
    it('should report full once capacity items are buffered', () => {
      const queue = new BoundedQueue<string>(2);
      expect(queue.offer('a')).toBe('queued');
      expect(queue.offer('b')).toBe('queued');
      expect(queue.offer('c')).toBe('full');
      expect(queue.size).toBe(2);
    });

    it('should hand an item straight to a waiting consumer', async () => {
      const queue = new BoundedQueue<string>(1);
      const pending = queue.next();

      expect(queue.offer('a')).toBe('queued');
      expect(queue.size).toBe(0);
      expect(queue.offer('b')).toBe('queued');
      expect(await pending).toEqual({ value: 'a', done: false });
    });

    it('should refuse items after close', () => {
      const queue = new BoundedQueue<string>();
      queue.close();
      expect(queue.offer('a')).toBe('closed');
    });
  });

  describe('next', () => {
    it('should yield items in FIFO order', async () => {
      const queue = new BoundedQueue<number>();
      queue.offer(1);
      queue.offer(2);
      queue.offer(3);

      expect(await queue.next()).toEqual({ value: 1, done: false });
      expect(await queue.next()).toEqual({ value: 2, done: false });
      expect(await queue.next()).toEqual({ value: 3, done: false });
    });

    it('should drain buffered items before reporting done', async () => {
      const queue = new BoundedQueue<string>();
      queue.offer('last');
      queue.close();

      expect(await queue.next()).toEqual({ value: 'last', done: false });
      expect(await queue.next()).toEqual({ value: undefined, done: true });
    });
  });

  describe('close', () => {
    it('should release a waiting consumer', async () => {
      const queue = new BoundedQueue<string>();
      const pending = queue.next();
      queue.close();

      expect(await pending).toEqual({ value: undefined, done: true });
      expect(queue.isClosed).toBe(true);
    });
  });

  describe('discard', () => {
    it('should drop buffered items and return how many were dropped', async () => {
      const queue = new BoundedQueue<string>();
      queue.offer('a');
      queue.offer('b');

      expect(queue.discard()).toBe(2);
      expect(queue.size).toBe(0);
      expect(await queue.next()).toEqual({ value: undefined, done: true });
    });
  });

  describe('async iteration', () => {
    it('should end the loop when the queue closes', async () => {
      const queue = new BoundedQueue<string>();
      const seen: string[] = [];
      const consumer = (async () => {
        for await (const item of queue) {
          seen.push(item);
        }
      })();

      queue.offer('x');
      queue.offer('y');
      queue.close();
      await consumer;

      expect(seen).toEqual(['x', 'y']);
    });
  });
});
