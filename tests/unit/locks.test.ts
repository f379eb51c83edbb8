/**
 * Unit tests for the Locks Module
 */

import { describe, test, expect } from '@jest/globals';
import { ServiceLockManager, sleep } from '../../src/locks/index.js';
import { CancelledError } from '../../src/errors/index.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Locks Module', () => {
  describe('ServiceLockManager', () => {
    test('should grant a free lock immediately and report the holder', async () => {
      const locks = new ServiceLockManager();

      const release = await locks.acquire('chat-a', 'q_1');

      expect(locks.isLocked('chat-a')).toBe(true);
      expect(locks.holder('chat-a')?.ownerId).toBe('q_1');
      release();
      expect(locks.isLocked('chat-a')).toBe(false);
    });

    test('should queue waiters in FIFO order', async () => {
      const locks = new ServiceLockManager();
      const order: string[] = [];

      const first = await locks.acquire('chat-a', 'q_1');
      const second = locks.acquire('chat-a', 'q_2').then((release) => {
        order.push('q_2');
        return release;
      });
      const third = locks.acquire('chat-a', 'q_3').then((release) => {
        order.push('q_3');
        return release;
      });

      await tick();
      expect(order).toEqual([]);
      expect(locks.queueLength('chat-a')).toBe(2);

      first();
      const releaseSecond = await second;
      expect(order).toEqual(['q_2']);
      expect(locks.holder('chat-a')?.ownerId).toBe('q_2');

      releaseSecond();
      const releaseThird = await third;
      expect(order).toEqual(['q_2', 'q_3']);
      releaseThird();
      expect(locks.isLocked('chat-a')).toBe(false);
    });

    test('should not block other keys', async () => {
      const locks = new ServiceLockManager();

      await locks.acquire('chat-a', 'q_1');
      const release = await locks.acquire('chat-b', 'q_1');

      expect(locks.holder('chat-b')?.ownerId).toBe('q_1');
      release();
    });

    test('should ignore a second release call', async () => {
      const locks = new ServiceLockManager();
      const first = await locks.acquire('chat-a', 'q_1');
      first();
      const second = await locks.acquire('chat-a', 'q_2');

      first();

      expect(locks.holder('chat-a')?.ownerId).toBe('q_2');
      second();
    });

    test('should reject an aborted waiter and keep the queue order', async () => {
      const locks = new ServiceLockManager();
      const controller = new AbortController();

      const first = await locks.acquire('chat-a', 'q_1');
      const cancelled = locks.acquire('chat-a', 'q_2', controller.signal);
      const third = locks.acquire('chat-a', 'q_3');

      controller.abort();
      await expect(cancelled).rejects.toThrow('Cancelled while waiting for lock on chat-a');

      first();
      const releaseThird = await third;
      expect(locks.holder('chat-a')?.ownerId).toBe('q_3');
      releaseThird();
    });

    test('should reject immediately when the signal is already aborted', async () => {
      const locks = new ServiceLockManager();
      const controller = new AbortController();
      controller.abort();

      await expect(locks.acquire('chat-a', 'q_1', controller.signal)).rejects.toBeInstanceOf(CancelledError);
      expect(locks.isLocked('chat-a')).toBe(false);
    });

    test('withLock() should release when the function throws', async () => {
      const locks = new ServiceLockManager();

      await expect(
        locks.withLock('chat-a', 'q_1', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(locks.isLocked('chat-a')).toBe(false);
      await expect(locks.withLock('chat-a', 'q_2', async () => 'ok')).resolves.toBe('ok');
    });
  });

  describe('sleep()', () => {
    test('should resolve after the delay', async () => {
      await expect(sleep(1)).resolves.toBeUndefined();
    });

    test('should reject with CancelledError when aborted', async () => {
      const controller = new AbortController();
      const pending = sleep(60000, controller.signal);

      controller.abort();

      await expect(pending).rejects.toBeInstanceOf(CancelledError);
    });
  });
});
