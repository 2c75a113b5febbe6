/**
 * Process configuration, read once from the environment at startup.
 */

import { fileURLToPath } from 'url';
import type { RenderCacheOptions } from './cache/render-cache.js';
import {
  DEFAULT_MAX_BYTES,
  DEFAULT_MAX_ENTRIES,
  DEFAULT_RENDER_TIMEOUT_MS,
  DEFAULT_RETRY,
  DEFAULT_TTL_MS,
} from './cache/render-cache.js';
import { SeatViewError } from './errors.js';
import { RENDER_QUALITIES } from './render/render-client.js';
import type { RenderQuality } from './render/render-client.js';

export interface SeatViewConfig {
  port: number;
  venuesDir: string;
  /** Render backend root URL. Null when unset; the server refuses to start without it. */
  renderBackendUrl: string | null;
  quality: RenderQuality;
  cache: Required<Pick<RenderCacheOptions, 'maxBytes' | 'maxEntries' | 'ttlMs' | 'renderTimeoutMs'>> & {
    retry: { attempts: number; baseDelayMs: number };
  };
}

export class ConfigError extends SeatViewError {}

export const DEFAULT_PORT = 3000;
export const DEFAULT_VENUES_DIR = fileURLToPath(new URL('../data/venues/', import.meta.url));

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): SeatViewConfig {
  const port = readInteger(env, 'PORT', DEFAULT_PORT);
  if (port > 65535) throw new ConfigError(`PORT must be at most 65535, got ${port}`);

  return {
    port,
    venuesDir: readString(env, 'VENUES_DIR') ?? DEFAULT_VENUES_DIR,
    renderBackendUrl: readString(env, 'RENDER_BACKEND_URL'),
    quality: readQuality(env),
    cache: {
      maxBytes: readInteger(env, 'CACHE_MAX_BYTES', DEFAULT_MAX_BYTES),
      maxEntries: readInteger(env, 'CACHE_MAX_ENTRIES', DEFAULT_MAX_ENTRIES),
      ttlMs: readInteger(env, 'CACHE_TTL_MS', DEFAULT_TTL_MS),
      renderTimeoutMs: readInteger(env, 'RENDER_TIMEOUT_MS', DEFAULT_RENDER_TIMEOUT_MS),
      retry: {
        attempts: readInteger(env, 'RENDER_RETRY_ATTEMPTS', DEFAULT_RETRY.attempts),
        baseDelayMs: readInteger(env, 'RENDER_RETRY_BASE_MS', DEFAULT_RETRY.baseDelayMs),
      },
    },
  };
}

// -- Helpers --

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

/** Non-negative integer, or `fallback` when unset. */
function readInteger(env: Env, key: string, fallback: number): number {
  const raw = readString(env, key);
  if (raw === null) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

function readQuality(env: Env): RenderQuality {
  const raw = readString(env, 'RENDER_QUALITY');
  if (raw === null) return 'full';
  const quality = RENDER_QUALITIES.find((q) => q === raw);
  if (!quality) {
    throw new ConfigError(`RENDER_QUALITY must be one of ${RENDER_QUALITIES.join(', ')}, got "${raw}"`);
  }
  return quality;
}
