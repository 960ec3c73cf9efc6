import { describe, expect, it } from 'vitest';
import { KeyedMutex } from './keyedMutex';

describe('KeyedMutex', () => {
  describe('acquire', () => {
    it('should acquire lock immediately when the key is free', async () => {
      const mutex = new KeyedMutex();

      const release = await mutex.acquire('BTCUSDT');

      expect(mutex.isLocked('BTCUSDT')).toBe(true);
      release();
      expect(mutex.isLocked('BTCUSDT')).toBe(false);
    });

    it('should queue callers sharing a key until the lock is released', async () => {
      const mutex = new KeyedMutex();
      const events: string[] = [];

      const release1 = await mutex.acquire('BTCUSDT');
      events.push('acquired-1');
      const acquire2 = mutex.acquire('BTCUSDT').then(release => {
        events.push('acquired-2');
        return release;
      });

      await Promise.resolve();
      expect(events).toEqual(['acquired-1']);

      release1();
      const release2 = await acquire2;
      expect(events).toEqual(['acquired-1', 'acquired-2']);
      release2();
      expect(mutex.isLocked('BTCUSDT')).toBe(false);
    });

    it('should not block callers holding another key', async () => {
      const mutex = new KeyedMutex();

      await mutex.acquire('BTCUSDT');
      const release = await mutex.acquire('ETHUSDT');

      expect(typeof release).toBe('function');
      expect(mutex.isLocked('ETHUSDT')).toBe(true);
    });

    it('should ignore a release function called twice', async () => {
      const mutex = new KeyedMutex();
      const release1 = await mutex.acquire('BTCUSDT');
      const acquire2 = mutex.acquire('BTCUSDT');

      release1();
      await acquire2;
      release1();

      expect(mutex.isLocked('BTCUSDT')).toBe(true);
    });
  });

  describe('runExclusive', () => {
    it('should return the value of the function', async () => {
      const mutex = new KeyedMutex();
      await expect(mutex.runExclusive('BTCUSDT', () => 42)).resolves.toBe(42);
    });

    it('should serialize concurrent sections on the same key', async () => {
      const mutex = new KeyedMutex();
      const events: string[] = [];
      const section = (name: string) => async () => {
        events.push(`${name}-start`);
        await Promise.resolve();
        await Promise.resolve();
        events.push(`${name}-end`);
      };

      await Promise.all([mutex.runExclusive('BTCUSDT', section('a')), mutex.runExclusive('BTCUSDT', section('b'))]);

      expect(events).toEqual(['a-start', 'a-end', 'b-start', 'b-end']);
    });

    it('should release the lock when the function throws', async () => {
      const mutex = new KeyedMutex();

      await expect(
        mutex.runExclusive('BTCUSDT', () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(mutex.isLocked('BTCUSDT')).toBe(false);
    });
  });
});
