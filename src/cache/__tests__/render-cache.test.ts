import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  RenderCancelledError,
  RenderFatalError,
  RenderTimeoutError,
  RenderTransientError,
} from '../../errors.js';
import { RenderCache } from '../render-cache.js';
import type { RenderCacheEvent, RenderFn } from '../render-cache.js';

function image(size: number, fill = 1): Uint8Array {
  return new Uint8Array(size).fill(fill);
}

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** A render that never settles, recording the signal it was given. */
function hangingRender(signals: AbortSignal[]): RenderFn {
  return (signal) => {
    signals.push(signal);
    return new Promise<Uint8Array>(() => {});
  };
}

describe('RenderCache', () => {
  describe('single flight', () => {
    it('renders once for many concurrent requests', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const pending = deferred<Uint8Array>();
      const renderFn = vi.fn((_signal: AbortSignal) => pending.promise);

      const requests = Array.from({ length: 10 }, () => cache.resolve('fp', renderFn));
      expect(cache.isInFlight('fp')).toBe(true);

      const png = image(16);
      pending.resolve(png);
      const outcomes = await Promise.all(requests);

      expect(renderFn).toHaveBeenCalledTimes(1);
      expect(outcomes.every((o) => o.image === png)).toBe(true);
      expect(outcomes.map((o) => o.source)).toEqual(['render', ...Array<string>(9).fill('coalesced')]);
      expect(cache.isInFlight('fp')).toBe(false);

      const stats = cache.getStats();
      expect(stats.misses).toBe(1);
      expect(stats.coalesced).toBe(9);
      expect(stats.renders).toBe(1);
      expect(stats.entries).toBe(1);
    });

    it('serves later requests from the cache', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const png = image(16);
      const renderFn = vi.fn(async () => png);

      await cache.getOrRender('fp', renderFn);
      const outcome = await cache.resolve('fp', renderFn);

      expect(outcome).toEqual({ image: png, source: 'hit' });
      expect(renderFn).toHaveBeenCalledTimes(1);
      expect(cache.getStats().hits).toBe(1);
    });

    it('keeps different fingerprints apart', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const a = await cache.getOrRender('a', async () => image(4, 1));
      const b = await cache.getOrRender('b', async () => image(4, 2));
      expect(a[0]).toBe(1);
      expect(b[0]).toBe(2);
      expect(cache.size).toBe(2);
    });

    it('gives every waiter the same error and clears the flight', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const pending = deferred<Uint8Array>();
      const renderFn = vi.fn(() => pending.promise);

      const requests = Array.from({ length: 5 }, () => cache.resolve('fp', renderFn));
      await vi.waitFor(() => expect(renderFn).toHaveBeenCalled());
      const failure = new RenderFatalError('template not found');
      pending.reject(failure);
      const results = await Promise.allSettled(requests);

      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') expect(result.reason).toBe(failure);
      }
      expect(cache.isInFlight('fp')).toBe(false);
      expect(cache.has('fp')).toBe(false);
      expect(cache.getStats().failures).toBe(1);

      const png = image(8);
      await expect(cache.getOrRender('fp', async () => png)).resolves.toBe(png);
    });

    it('reports events in order', async () => {
      const events: RenderCacheEvent['type'][] = [];
      const cache = new RenderCache({ renderTimeoutMs: 0, onEvent: (e) => events.push(e.type) });

      await cache.getOrRender('fp', async () => image(4));
      await cache.getOrRender('fp', async () => image(4));

      expect(events).toEqual(['miss', 'stored', 'hit']);
    });
  });

  describe('eviction', () => {
    it('evicts the least recently used entry past the entry limit', async () => {
      const cache = new RenderCache({ maxEntries: 2, renderTimeoutMs: 0 });
      await cache.getOrRender('a', async () => image(1));
      await cache.getOrRender('b', async () => image(1));
      await cache.getOrRender('a', async () => image(1));
      await cache.getOrRender('c', async () => image(1));

      expect(cache.has('a')).toBe(true);
      expect(cache.has('b')).toBe(false);
      expect(cache.has('c')).toBe(true);
      expect(cache.getStats().evictions).toBe(1);
    });

    it('evicts by total bytes', async () => {
      const cache = new RenderCache({ maxBytes: 100, renderTimeoutMs: 0 });
      await cache.getOrRender('a', async () => image(40));
      await cache.getOrRender('b', async () => image(40));
      await cache.getOrRender('c', async () => image(40));

      expect(cache.has('a')).toBe(false);
      expect(cache.size).toBe(2);
      expect(cache.bytes).toBe(80);
    });

    it('returns an image larger than the byte limit without keeping it', async () => {
      const events: RenderCacheEvent[] = [];
      const cache = new RenderCache({ maxBytes: 100, renderTimeoutMs: 0, onEvent: (e) => events.push(e) });
      await cache.getOrRender('small', async () => image(10));
      const big = await cache.getOrRender('big', async () => image(150));

      expect(big.byteLength).toBe(150);
      expect(cache.has('big')).toBe(false);
      expect(cache.has('small')).toBe(true);
      expect(cache.bytes).toBe(10);
      expect(events).toContainEqual({ type: 'oversized', fingerprint: 'big', sizeBytes: 150 });
    });

    it('leaves a full cache alone when an oversized image arrives', async () => {
      const cache = new RenderCache({ maxBytes: 100, renderTimeoutMs: 0 });
      await cache.getOrRender('a', async () => image(30));
      await cache.getOrRender('b', async () => image(30));
      await cache.getOrRender('c', async () => image(30));

      await cache.getOrRender('huge', async () => image(500));

      expect(cache.size).toBe(3);
      expect(cache.bytes).toBe(90);
      expect(cache.getStats().evictions).toBe(0);
      expect(['a', 'b', 'c'].map((fp) => cache.has(fp))).toEqual([true, true, true]);
    });

    it('treats zero limits as unbounded', async () => {
      const cache = new RenderCache({ maxBytes: 0, maxEntries: 0, renderTimeoutMs: 0 });
      for (let i = 0; i < 50; i++) {
        await cache.getOrRender(`fp-${i}`, async () => image(1024));
      }
      expect(cache.size).toBe(50);
      expect(cache.bytes).toBe(50 * 1024);
    });

    it('supports delete and clear', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      await cache.getOrRender('a', async () => image(10));
      await cache.getOrRender('b', async () => image(20));

      expect(cache.delete('a')).toBe(true);
      expect(cache.delete('a')).toBe(false);
      expect(cache.bytes).toBe(20);

      cache.clear();
      expect(cache.size).toBe(0);
      expect(cache.bytes).toBe(0);
    });
  });

  describe('expiry', () => {
    it('expires entries lazily once older than the TTL', async () => {
      let now = 0;
      const cache = new RenderCache({ ttlMs: 1000, renderTimeoutMs: 0, clock: () => now });
      const renderFn = vi.fn(async () => image(4));

      await cache.getOrRender('fp', renderFn);

      now = 1000;
      expect((await cache.resolve('fp', renderFn)).source).toBe('hit');

      now = 1001;
      expect(cache.has('fp')).toBe(false);
      expect((await cache.resolve('fp', renderFn)).source).toBe('render');
      expect(renderFn).toHaveBeenCalledTimes(2);
      expect(cache.getStats().expirations).toBe(1);
    });

    it('does not extend the TTL on access', async () => {
      let now = 0;
      const cache = new RenderCache({ ttlMs: 1000, renderTimeoutMs: 0, clock: () => now });
      const renderFn = vi.fn(async () => image(4));

      await cache.getOrRender('fp', renderFn);
      now = 900;
      await cache.getOrRender('fp', renderFn);
      now = 1500;
      await cache.getOrRender('fp', renderFn);

      expect(renderFn).toHaveBeenCalledTimes(2);
    });
  });

  describe('timeouts and retries', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('aborts a slow render and clears the flight', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 1000, retry: { attempts: 0 } });
      const signals: AbortSignal[] = [];

      const request = cache.resolve('fp', hangingRender(signals));
      const assertion = expect(request).rejects.toBeInstanceOf(RenderTimeoutError);
      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(true);
      expect(signals[0].reason).toBeInstanceOf(RenderTimeoutError);
      expect(cache.isInFlight('fp')).toBe(false);

      const png = image(4);
      await expect(cache.getOrRender('fp', async () => png)).resolves.toBe(png);
    });

    it('ends the flight on the first timeout even with retries configured', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 1000 });
      const renderFn = vi.fn((_signal: AbortSignal) => new Promise<Uint8Array>(() => {}));

      const first = cache.resolve('fp', renderFn);
      const second = cache.resolve('fp', renderFn);
      const assertions = Promise.all([
        expect(first).rejects.toBeInstanceOf(RenderTimeoutError),
        expect(second).rejects.toBeInstanceOf(RenderTimeoutError),
      ]);
      await vi.advanceTimersByTimeAsync(1000);
      await assertions;

      expect(cache.isInFlight('fp')).toBe(false);
      expect(cache.getStats().retries).toBe(0);

      await vi.advanceTimersByTimeAsync(10_000);
      expect(renderFn).toHaveBeenCalledTimes(1);
    });

    it('leaves retrying a timeout to the caller', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 1000 });
      const png = image(4);
      const renderFn = vi
        .fn(async (_signal: AbortSignal): Promise<Uint8Array> => png)
        .mockImplementationOnce(() => new Promise<Uint8Array>(() => {}));

      const request = cache.getOrRender('fp', renderFn);
      const assertion = expect(request).rejects.toBeInstanceOf(RenderTimeoutError);
      await vi.advanceTimersByTimeAsync(1000);
      await assertion;

      await expect(cache.getOrRender('fp', renderFn)).resolves.toBe(png);
      expect(renderFn).toHaveBeenCalledTimes(2);
    });

    it('retries transient failures inside the flight', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0, retry: { attempts: 1, baseDelayMs: 100 } });
      const png = image(4);
      const renderFn = vi
        .fn(async (_signal: AbortSignal): Promise<Uint8Array> => png)
        .mockImplementationOnce(async () => {
          throw new RenderTransientError('backend busy');
        });

      const request = cache.getOrRender('fp', renderFn);
      await vi.advanceTimersByTimeAsync(100);

      await expect(request).resolves.toBe(png);
      expect(renderFn).toHaveBeenCalledTimes(2);
      expect(cache.getStats().retries).toBe(1);
    });

    it('backs off exponentially up to the cap', async () => {
      const delays: number[] = [];
      const cache = new RenderCache({
        renderTimeoutMs: 0,
        retry: { attempts: 3, baseDelayMs: 100, maxDelayMs: 250 },
        onEvent: (event) => {
          if (event.type === 'retry') delays.push(event.delayMs);
        },
      });
      const renderFn = vi.fn(async (): Promise<Uint8Array> => {
        throw new RenderTransientError('backend busy');
      });

      const request = cache.getOrRender('fp', renderFn);
      const assertion = expect(request).rejects.toBeInstanceOf(RenderTransientError);
      await vi.advanceTimersByTimeAsync(550);
      await assertion;

      expect(delays).toEqual([100, 200, 250]);
      expect(renderFn).toHaveBeenCalledTimes(4);
    });

    it('does not retry fatal errors', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0, retry: { attempts: 3 } });
      const renderFn = vi.fn(async (): Promise<Uint8Array> => {
        throw new RenderFatalError('unknown template');
      });

      await expect(cache.getOrRender('fp', renderFn)).rejects.toBeInstanceOf(RenderFatalError);
      expect(renderFn).toHaveBeenCalledTimes(1);
      expect(cache.getStats().retries).toBe(0);
    });

    it('does not retry errors it cannot classify', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0, retry: { attempts: 3 } });
      const renderFn = vi.fn(async (): Promise<Uint8Array> => {
        throw new Error('boom');
      });

      await expect(cache.getOrRender('fp', renderFn)).rejects.toThrow('boom');
      expect(renderFn).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancellation', () => {
    it('rejects only the caller that cancelled', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const pending = deferred<Uint8Array>();
      const signals: AbortSignal[] = [];
      const renderFn: RenderFn = (signal) => {
        signals.push(signal);
        return pending.promise;
      };

      const controller = new AbortController();
      const cancelled = cache.resolve('fp', renderFn, { signal: controller.signal });
      const other = cache.resolve('fp', renderFn);

      controller.abort();
      await expect(cancelled).rejects.toBeInstanceOf(RenderCancelledError);
      expect(cache.isInFlight('fp')).toBe(true);

      const png = image(4);
      pending.resolve(png);
      await expect(other).resolves.toEqual({ image: png, source: 'coalesced' });
      expect(signals).toHaveLength(1);
      expect(signals[0].aborted).toBe(false);
    });

    it('keeps rendering and stores the result when every caller cancels', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const pending = deferred<Uint8Array>();
      const renderFn = vi.fn(() => pending.promise);

      const a = new AbortController();
      const b = new AbortController();
      const first = cache.resolve('fp', renderFn, { signal: a.signal });
      const second = cache.resolve('fp', renderFn, { signal: b.signal });
      a.abort();
      b.abort();
      await expect(first).rejects.toBeInstanceOf(RenderCancelledError);
      await expect(second).rejects.toBeInstanceOf(RenderCancelledError);

      pending.resolve(image(4));
      await vi.waitFor(() => expect(cache.has('fp')).toBe(true));
      expect((await cache.resolve('fp', renderFn)).source).toBe('hit');
      expect(renderFn).toHaveBeenCalledTimes(1);
    });

    it('rejects at once when the signal is already aborted', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const renderFn = vi.fn(async () => image(4));
      const controller = new AbortController();
      controller.abort();

      await expect(cache.resolve('fp', renderFn, { signal: controller.signal }))
        .rejects.toBeInstanceOf(RenderCancelledError);
      expect(renderFn).not.toHaveBeenCalled();
      expect(cache.getStats().misses).toBe(0);
    });

    it('answers hits for callers holding a signal', async () => {
      const cache = new RenderCache({ renderTimeoutMs: 0 });
      const png = image(4);
      await cache.getOrRender('fp', async () => png);

      const controller = new AbortController();
      await expect(cache.getOrRender('fp', async () => image(4), { signal: controller.signal })).resolves.toBe(png);
    });
  });
});
