/**
 * Keyed Cache Tests
 * @module cache/__tests__/keyed-cache.test
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CacheState, KeyedCache } from '../keyed-cache.js';

interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('KeyedCache', () => {
  let cache: KeyedCache<number>;

  beforeEach(() => {
    cache = new KeyedCache<number>('test');
  });

  describe('get', () => {
    it('loads a missing key once and shares the load between callers', async () => {
      const pending = deferred<number>();
      const loader = vi.fn(() => pending.promise);

      const first = cache.get('k', loader);
      const second = cache.get('k', loader);
      expect(cache.state('k')).toBe(CacheState.POPULATING);

      pending.resolve(7);
      expect(await first).toBe(7);
      expect(await second).toBe(7);
      expect(loader).toHaveBeenCalledTimes(1);
      expect(cache.state('k')).toBe(CacheState.POPULATED);
    });

    it('answers from the cache once populated', async () => {
      cache.set('k', 1);
      const loader = vi.fn(async () => 2);

      expect(await cache.get('k', loader)).toBe(1);
      expect(loader).not.toHaveBeenCalled();
    });
  });

  describe('refresh', () => {
    it('keeps serving the prior value until the new one is loaded', async () => {
      cache.set('k', 1);
      const pending = deferred<number>();

      const refreshing = cache.refresh('k', () => pending.promise);
      expect(cache.state('k')).toBe(CacheState.POPULATING);
      expect(cache.tryGet('k')).toBe(1);
      expect(await cache.get('k', async () => 99)).toBe(1);

      pending.resolve(2);
      expect(await refreshing).toBe(2);
      expect(cache.tryGet('k')).toBe(2);
    });

    it('installs only the newest of overlapping loads', async () => {
      const slow = deferred<number>();
      const fast = deferred<number>();

      const older = cache.refresh('k', () => slow.promise);
      const newer = cache.refresh('k', () => fast.promise);
      fast.resolve(2);
      await newer;
      slow.resolve(1);

      expect(await older).toBe(1);
      expect(cache.tryGet('k')).toBe(2);
      expect(cache.state('k')).toBe(CacheState.POPULATED);
    });

    it('lets a direct write win over a load already in flight', async () => {
      const pending = deferred<number>();
      const refreshing = cache.refresh('k', () => pending.promise);

      cache.set('k', 5);
      pending.resolve(9);
      await refreshing;

      expect(cache.tryGet('k')).toBe(5);
    });

    it('does not bring back a key removed during its load', async () => {
      const pending = deferred<number>();
      const refreshing = cache.refresh('k', () => pending.promise);

      cache.remove('k');
      pending.resolve(3);
      await refreshing;

      expect(cache.state('k')).toBe(CacheState.MISSING);
    });
  });

  describe('failures', () => {
    it('restores the prior value and rejects the caller', async () => {
      cache.set('k', 1);

      await expect(cache.refresh('k', async () => {
        throw new Error('backend down');
      })).rejects.toThrow('backend down');

      expect(cache.tryGet('k')).toBe(1);
      expect(cache.state('k')).toBe(CacheState.POPULATED);
      expect(cache.getStats().failures).toBe(1);
    });

    it('leaves a key that never loaded missing', async () => {
      await expect(cache.get('k', async () => {
        throw new Error('backend down');
      })).rejects.toThrow('backend down');

      expect(cache.state('k')).toBe(CacheState.MISSING);
      expect(cache.exists('k')).toBe(false);
    });
  });

  describe('bulk operations', () => {
    it('replaces everything on fill', () => {
      cache.set('old', 0);
      cache.fill([['a', 1], ['b', 2]]);

      expect(cache.keys()).toEqual(['a', 'b']);
      expect(cache.values()).toEqual([1, 2]);
    });

    it('removes the keys a predicate selects', () => {
      cache.fill([['t/a', 1], ['t/b', 2], ['u/a', 3]]);

      expect(cache.removeWhere((key) => key.startsWith('t/'))).toBe(2);
      expect(cache.keys()).toEqual(['u/a']);
    });

    it('counts hits, misses and loads', async () => {
      cache.fill([['a', 1]]);
      cache.tryGet('a');
      cache.tryGet('z');
      await cache.get('b', async () => 2);

      expect(cache.getStats()).toEqual({ hits: 1, misses: 2, loads: 1, failures: 0, size: 2 });
      cache.clear();
      expect(cache.getStats().size).toBe(0);
    });
  });
});
