/**
 * Content-addressed cache of rendered seat views.
 *
 * Guarantees:
 *   - Single flight: one render per fingerprint at a time; concurrent
 *     requests wait on it and all get the same image or the same error.
 *   - LRU eviction by total bytes and entry count, run right after each
 *     insertion.
 *   - Lazy TTL expiry: an entry past its TTL is dropped when next looked
 *     up and counts as a miss. There is no background sweep.
 *   - Bounded render attempts with retry and backoff for transient
 *     failures. A timeout ends the flight at once and reaches every
 *     waiter; retrying it is up to the caller.
 *   - An image larger than the byte limit is returned to its waiters but
 *     never stored, so it cannot push out other entries.
 *   - A caller can cancel its own wait without affecting the render or the
 *     other waiters.
 *
 * The "check entry, check in-flight, register in-flight" sequence in
 * `resolve` runs without yielding to the event loop, which makes it the
 * critical section. Renders themselves run outside it.
 */

import { RenderCancelledError, RenderTimeoutError, isRetryableRenderError } from '../errors.js';

export type RenderFn = (signal: AbortSignal) => Promise<Uint8Array>;

/** Where a result came from: a stored entry, a new render, or a render already in flight. */
export type RenderSource = 'hit' | 'render' | 'coalesced';

export interface RenderOutcome {
  image: Uint8Array;
  source: RenderSource;
}

export interface RetryPolicy {
  /** Extra attempts after the first, for transient failures only. Timeouts are never retried here. */
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RenderCacheEvent =
  | { type: 'hit'; fingerprint: string }
  | { type: 'miss'; fingerprint: string }
  | { type: 'coalesced'; fingerprint: string }
  | { type: 'expired'; fingerprint: string; ageMs: number }
  | { type: 'stored'; fingerprint: string; sizeBytes: number }
  | { type: 'oversized'; fingerprint: string; sizeBytes: number }
  | { type: 'evicted'; fingerprint: string; sizeBytes: number }
  | { type: 'retry'; fingerprint: string; attempt: number; delayMs: number; error: unknown }
  | { type: 'failed'; fingerprint: string; error: unknown };

export interface RenderCacheOptions {
  /** Upper bound on stored image bytes. 0 = unbounded. */
  maxBytes?: number;
  /** Upper bound on stored entries. 0 = unbounded. */
  maxEntries?: number;
  /** Entry lifetime in ms. 0 = never expires. */
  ttlMs?: number;
  /** Per-attempt render timeout in ms. 0 = no timeout. */
  renderTimeoutMs?: number;
  retry?: Partial<RetryPolicy>;
  clock?: () => number;
  /** Observability hook. Must not throw. */
  onEvent?: (event: RenderCacheEvent) => void;
}

export interface ResolveOptions {
  /** Aborting stops this caller's wait only. */
  signal?: AbortSignal;
}

export interface RenderCacheStats {
  hits: number;
  misses: number;
  coalesced: number;
  renders: number;
  retries: number;
  failures: number;
  evictions: number;
  expirations: number;
  entries: number;
  bytes: number;
  inFlight: number;
}

interface CacheEntry {
  fingerprint: string;
  image: Uint8Array;
  createdAt: number;
  lastAccessAt: number;
  sizeBytes: number;
}

type Settled = { ok: true; image: Uint8Array } | { ok: false; error: unknown };

export const DEFAULT_MAX_BYTES = 256 * 1024 * 1024;
export const DEFAULT_MAX_ENTRIES = 1000;
export const DEFAULT_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_RENDER_TIMEOUT_MS = 45_000;
export const DEFAULT_RETRY: RetryPolicy = { attempts: 2, baseDelayMs: 500, maxDelayMs: 8_000 };

export class RenderCache {
  private readonly maxBytes: number;
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly renderTimeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly clock: () => number;
  private readonly onEvent: ((event: RenderCacheEvent) => void) | null;

  /** Insertion order doubles as LRU order: oldest access first. */
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inFlight = new Map<string, Promise<Settled>>();
  private totalBytes = 0;
  private counters = {
    hits: 0,
    misses: 0,
    coalesced: 0,
    renders: 0,
    retries: 0,
    failures: 0,
    evictions: 0,
    expirations: 0,
  };

  constructor(options: RenderCacheOptions = {}) {
    this.maxBytes = Math.max(0, options.maxBytes ?? DEFAULT_MAX_BYTES);
    this.maxEntries = Math.max(0, Math.floor(options.maxEntries ?? DEFAULT_MAX_ENTRIES));
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_TTL_MS);
    this.renderTimeoutMs = Math.max(0, options.renderTimeoutMs ?? DEFAULT_RENDER_TIMEOUT_MS);
    this.retry = {
      attempts: Math.max(0, Math.floor(options.retry?.attempts ?? DEFAULT_RETRY.attempts)),
      baseDelayMs: Math.max(0, options.retry?.baseDelayMs ?? DEFAULT_RETRY.baseDelayMs),
      maxDelayMs: Math.max(0, options.retry?.maxDelayMs ?? DEFAULT_RETRY.maxDelayMs),
    };
    this.clock = options.clock ?? (() => Date.now());
    this.onEvent = options.onEvent ?? null;
  }

  /** Cached image for `fingerprint`, rendering it through `renderFn` on a miss. */
  getOrRender(fingerprint: string, renderFn: RenderFn, options: ResolveOptions = {}): Promise<Uint8Array> {
    return this.resolve(fingerprint, renderFn, options).then((outcome) => outcome.image);
  }

  /** Like `getOrRender`, but also reports where the image came from. */
  resolve(fingerprint: string, renderFn: RenderFn, options: ResolveOptions = {}): Promise<RenderOutcome> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new RenderCancelledError());
    }

    // Critical section: nothing below may await until the flight is registered.
    const entry = this.lookup(fingerprint);
    if (entry) {
      this.counters.hits++;
      this.emit({ type: 'hit', fingerprint });
      return Promise.resolve<RenderOutcome>({ image: entry.image, source: 'hit' });
    }

    let source: RenderSource;
    let flight = this.inFlight.get(fingerprint);
    if (flight) {
      source = 'coalesced';
      this.counters.coalesced++;
      this.emit({ type: 'coalesced', fingerprint });
    } else {
      source = 'render';
      this.counters.misses++;
      this.emit({ type: 'miss', fingerprint });
      flight = this.startFlight(fingerprint, renderFn);
      this.inFlight.set(fingerprint, flight);
    }
    // End of critical section.

    const settled = signal ? waitUnlessAborted(flight, signal) : flight;
    return settled.then((result) => {
      if (!result.ok) throw result.error;
      return { image: result.image, source };
    });
  }

  /** Whether a live entry exists. Does not count as an access. */
  has(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    return entry !== undefined && !this.isExpired(entry, this.clock());
  }

  isInFlight(fingerprint: string): boolean {
    return this.inFlight.has(fingerprint);
  }

  delete(fingerprint: string): boolean {
    const entry = this.entries.get(fingerprint);
    if (!entry) return false;
    this.removeEntry(entry);
    return true;
  }

  /** Drop every stored entry. Renders in flight still complete and are stored. */
  clear(): void {
    this.entries.clear();
    this.totalBytes = 0;
  }

  get size(): number {
    return this.entries.size;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  getStats(): RenderCacheStats {
    return {
      ...this.counters,
      entries: this.entries.size,
      bytes: this.totalBytes,
      inFlight: this.inFlight.size,
    };
  }

  // -- Entries --

  private lookup(fingerprint: string): CacheEntry | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;

    const now = this.clock();
    if (this.isExpired(entry, now)) {
      this.removeEntry(entry);
      this.counters.expirations++;
      this.emit({ type: 'expired', fingerprint, ageMs: now - entry.createdAt });
      return undefined;
    }

    entry.lastAccessAt = now;
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, entry);
    return entry;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return this.ttlMs > 0 && now - entry.createdAt > this.ttlMs;
  }

  private store(fingerprint: string, image: Uint8Array): void {
    const existing = this.entries.get(fingerprint);
    if (existing) this.removeEntry(existing);

    if (this.maxBytes > 0 && image.byteLength > this.maxBytes) {
      this.emit({ type: 'oversized', fingerprint, sizeBytes: image.byteLength });
      return;
    }

    const now = this.clock();
    const entry: CacheEntry = {
      fingerprint,
      image,
      createdAt: now,
      lastAccessAt: now,
      sizeBytes: image.byteLength,
    };
    this.entries.set(fingerprint, entry);
    this.totalBytes += entry.sizeBytes;
    this.emit({ type: 'stored', fingerprint, sizeBytes: entry.sizeBytes });

    this.evict();
  }

  /** Remove least-recently-used entries until both bounds hold. */
  private evict(): void {
    while (this.overBounds()) {
      const oldest = this.entries.values().next();
      if (oldest.done) break;
      this.removeEntry(oldest.value);
      this.counters.evictions++;
      this.emit({ type: 'evicted', fingerprint: oldest.value.fingerprint, sizeBytes: oldest.value.sizeBytes });
    }
  }

  private overBounds(): boolean {
    if (this.maxBytes > 0 && this.totalBytes > this.maxBytes) return true;
    return this.maxEntries > 0 && this.entries.size > this.maxEntries;
  }

  private removeEntry(entry: CacheEntry): void {
    this.entries.delete(entry.fingerprint);
    this.totalBytes -= entry.sizeBytes;
  }

  // -- Rendering --

  /**
   * Run the render and settle the flight. The returned promise never
   * rejects; each waiter turns a failure back into its own rejection.
   */
  private startFlight(fingerprint: string, renderFn: RenderFn): Promise<Settled> {
    return this.renderWithRetry(fingerprint, renderFn).then(
      (image): Settled => {
        this.inFlight.delete(fingerprint);
        this.store(fingerprint, image);
        return { ok: true, image };
      },
      (error: unknown): Settled => {
        this.inFlight.delete(fingerprint);
        this.counters.failures++;
        this.emit({ type: 'failed', fingerprint, error });
        return { ok: false, error };
      },
    );
  }

  private async renderWithRetry(fingerprint: string, renderFn: RenderFn): Promise<Uint8Array> {
    let attempt = 0;
    for (;;) {
      try {
        this.counters.renders++;
        return await this.renderOnce(renderFn);
      } catch (err) {
        if (attempt >= this.retry.attempts || err instanceof RenderTimeoutError || !isRetryableRenderError(err)) {
          throw err;
        }
        const delayMs = Math.min(this.retry.maxDelayMs, this.retry.baseDelayMs * 2 ** attempt);
        attempt++;
        this.counters.retries++;
        this.emit({ type: 'retry', fingerprint, attempt, delayMs, error: err });
        await delay(delayMs);
      }
    }
  }

  /** One render attempt, aborted and rejected with RenderTimeoutError past the timeout. */
  private renderOnce(renderFn: RenderFn): Promise<Uint8Array> {
    const controller = new AbortController();
    const timeoutMs = this.renderTimeoutMs;

    return new Promise<Uint8Array>((resolve, reject) => {
      const timer = timeoutMs > 0
        ? setTimeout(() => {
            const err = new RenderTimeoutError(timeoutMs);
            controller.abort(err);
            reject(err);
          }, timeoutMs)
        : null;

      void Promise.resolve()
        .then(() => renderFn(controller.signal))
        .then(
          (image) => {
            if (timer) clearTimeout(timer);
            resolve(image);
          },
          (err: unknown) => {
            if (timer) clearTimeout(timer);
            reject(err);
          },
        );
    });
  }

  private emit(event: RenderCacheEvent): void {
    if (this.onEvent) this.onEvent(event);
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Wait for the flight unless `signal` fires first. The flight itself keeps running. */
function waitUnlessAborted(flight: Promise<Settled>, signal: AbortSignal): Promise<Settled> {
  return new Promise<Settled>((resolve, reject) => {
    const onAbort = () => reject(new RenderCancelledError());
    signal.addEventListener('abort', onAbort, { once: true });
    void flight.then((result) => {
      signal.removeEventListener('abort', onAbort);
      resolve(result);
    });
  });
}
